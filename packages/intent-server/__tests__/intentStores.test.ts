import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Intent } from '../src/intents/intent.types';
import { FsIntentStore } from '../src/intents/store/fsIntent.store';
import type { IntentStore } from '../src/intents/store/intent.store';
import { MemoryIntentStore } from '../src/intents/store/memoryIntent.store';

const record = (id: string, createdAt: string, overrides: Partial<Intent> = {}): Intent => ({
  id,
  name: `intent ${id}`,
  description: '',
  specification: { quality: '4K', participants: 100 },
  state: 'Draft',
  createdAt,
  updatedAt: createdAt,
  ...overrides,
});

const ID_A = '00000000-0000-4000-8000-00000000000a';
const ID_B = '00000000-0000-4000-8000-00000000000b';
const ID_C = '00000000-0000-4000-8000-00000000000c';

function storeContract(name: string, makeStore: () => Promise<IntentStore>) {
  describe(`${name} contract`, () => {
    let store: IntentStore;

    beforeEach(async () => {
      store = await makeStore();
    });

    it('returns copies that do not alias stored records', async () => {
      const intent = record(ID_A, '2026-01-01T00:00:00.000Z');
      await store.put(intent);
      intent.specification.quality = 'SD';

      const fetched = await store.get(ID_A);
      expect(fetched?.specification.quality).toBe('4K');
      if (!fetched) throw new Error('record expected');
      fetched.name = 'changed';
      expect((await store.get(ID_A))?.name).toBe(`intent ${ID_A}`);
    });

    it('lists by creation time and filters by state', async () => {
      await store.put(record(ID_B, '2026-01-02T00:00:00.000Z', { state: 'Active', backendReference: 'intent-b' }));
      await store.put(record(ID_A, '2026-01-01T00:00:00.000Z'));
      await store.put(record(ID_C, '2026-01-03T00:00:00.000Z', { state: 'Failed' }));

      expect((await store.list()).map((i) => i.id)).toEqual([ID_A, ID_B, ID_C]);
      expect((await store.list({ state: 'Active' })).map((i) => i.id)).toEqual([ID_B]);
      expect((await store.list({ state: ['Draft', 'Failed'] })).map((i) => i.id)).toEqual([ID_A, ID_C]);
    });

    it('deletes records and reports whether anything was removed', async () => {
      await store.put(record(ID_A, '2026-01-01T00:00:00.000Z'));
      expect(await store.delete(ID_A)).toBe(true);
      expect(await store.get(ID_A)).toBeUndefined();
      expect(await store.delete(ID_A)).toBe(false);
    });
  });
}

storeContract('MemoryIntentStore', async () => new MemoryIntentStore());

describe('FsIntentStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'intent-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  storeContract('FsIntentStore', async () => {
    const store = new FsIntentStore(await fs.mkdtemp(path.join(os.tmpdir(), 'intent-store-contract-')));
    await store.initIfNeeded();
    return store;
  });

  it('persists records across instances as YAML', async () => {
    const first = new FsIntentStore(dir);
    await first.initIfNeeded();
    await first.put(
      record(ID_A, '2026-01-01T00:00:00.000Z', {
        state: 'Failed',
        lastError: { code: 'BackendRejected', message: 'no capacity', at: '2026-01-01T00:00:01.000Z' },
      }),
    );

    const raw = await fs.readFile(path.join(dir, 'intents', `${ID_A}.yaml`), 'utf8');
    expect(raw).toContain('state: Failed');

    const second = new FsIntentStore(dir);
    await second.initIfNeeded();
    expect(await second.get(ID_A)).toEqual(
      record(ID_A, '2026-01-01T00:00:00.000Z', {
        state: 'Failed',
        lastError: { code: 'BackendRejected', message: 'no capacity', at: '2026-01-01T00:00:01.000Z' },
      }),
    );
  });

  it('skips malformed files on load', async () => {
    await fs.mkdir(path.join(dir, 'intents'), { recursive: true });
    await fs.writeFile(path.join(dir, 'intents', 'broken.yaml'), 'id: [unterminated', 'utf8');
    await fs.writeFile(path.join(dir, 'intents', 'partial.yaml'), 'id: partial\nstate: Unknown\n', 'utf8');

    const store = new FsIntentStore(dir);
    await store.initIfNeeded();
    expect(await store.list()).toEqual([]);
  });

  it('removes the file on delete', async () => {
    const store = new FsIntentStore(dir);
    await store.initIfNeeded();
    await store.put(record(ID_A, '2026-01-01T00:00:00.000Z'));
    await store.delete(ID_A);
    expect(await fs.readdir(path.join(dir, 'intents'))).toEqual([]);
  });

  it('refuses use before initialization', async () => {
    const store = new FsIntentStore(dir);
    await expect(store.get(ID_A)).rejects.toThrow('FsIntentStore used before initialization');
  });
});
