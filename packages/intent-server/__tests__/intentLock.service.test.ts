import { describe, expect, it } from 'vitest';
import { IntentLockService } from '../src/intents/intentLock.service';

describe('IntentLockService', () => {
  it('refuses a second lease on the same intent', () => {
    const locks = new IntentLockService();
    const lease = locks.tryAcquire('a', 'submit');
    expect(lease).not.toBeNull();
    expect(locks.tryAcquire('a', 'terminate')).toBeNull();
    expect(locks.currentEvent('a')).toBe('submit');
  });

  it('does not contend across intents', () => {
    const locks = new IntentLockService();
    expect(locks.tryAcquire('a', 'submit')).not.toBeNull();
    expect(locks.tryAcquire('b', 'submit')).not.toBeNull();
  });

  it('frees the id on release and ignores stale leases', () => {
    const locks = new IntentLockService();
    const first = locks.tryAcquire('a', 'submit');
    if (!first) throw new Error('lease expected');
    locks.release(first);
    expect(locks.currentEvent('a')).toBeNull();

    const second = locks.tryAcquire('a', 'query');
    if (!second) throw new Error('lease expected');
    // releasing the old lease again must not drop the new holder
    locks.release(first);
    expect(locks.currentEvent('a')).toBe('query');
    locks.release(second);
    expect(locks.currentEvent('a')).toBeNull();
  });
});
