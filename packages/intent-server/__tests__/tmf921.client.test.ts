import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Intent } from '../src/intents/intent.types';
import { Tmf921Client } from '../src/tmf921/tmf921.client';
import { PasswordGrantTokenProvider, TokenAcquisitionError, TokenProvider } from '../src/tmf921/token.provider';
import { createClient, createMockBackend, MOCK_BASE_URL, type MockBackend } from './helpers/fixtures';
import { hangingFetch } from './helpers/injectFetch';

const submitted = (id: string): Intent => ({
  id,
  name: 'Concert uplink',
  description: '',
  specification: { quality: '4K', participants: 500 },
  state: 'Submitted',
  createdAt: '2026-02-01T12:00:00.000Z',
  updatedAt: '2026-02-01T12:00:00.000Z',
});

const INTENT_ID = 'c1d2e3f4-a5b6-4c7d-8e9f-0a1b2c3d4e5f';

describe('Tmf921Client', () => {
  let backend: MockBackend;

  beforeEach(() => {
    backend = createMockBackend();
  });

  afterEach(async () => {
    await backend.app.close();
  });

  it('submits an intent and returns the backend reference', async () => {
    const client = createClient(backend.fetchImpl);
    const result = await client.submit(submitted(INTENT_ID));

    if (result.kind !== 'accepted') throw new Error(`accepted expected, got ${result.kind}`);
    expect(result.value.backendReference).toMatch(/^intent-[0-9a-f]{10}$/);
    expect(result.value.backendState).toBe('pending');
    expect(backend.calls).toEqual([{ method: 'POST', path: '/intents' }]);
    expect(backend.registry.list()[0]).toMatchObject({ externalId: INTENT_ID, '@type': 'Intent', name: 'Concert uplink' });
  });

  it('replays the same backend entity for a repeated idempotency key', async () => {
    const client = createClient(backend.fetchImpl);
    const first = await client.submit(submitted(INTENT_ID));
    const second = await client.submit(submitted(INTENT_ID));

    expect(second).toEqual(first);
    expect(backend.registry.list()).toHaveLength(1);
  });

  it('reads and maps the backend status', async () => {
    const client = createClient(backend.fetchImpl);
    const created = await client.submit(submitted(INTENT_ID));
    if (created.kind !== 'accepted') throw new Error('accepted expected');

    expect(await client.fetchStatus(created.value.backendReference)).toEqual({
      kind: 'accepted',
      value: { backendState: 'active' },
    });
    expect(backend.calls.at(-1)).toEqual({ method: 'GET', path: `/intents/${created.value.backendReference}` });
  });

  it('surfaces a 404 on status reads as rejected', async () => {
    const client = createClient(backend.fetchImpl);
    expect(await client.fetchStatus('intent-missing')).toEqual({
      kind: 'rejected',
      reason: 'Intent intent-missing not found',
      status: 404,
    });
  });

  it('retries 5xx responses with backoff', async () => {
    backend.registry.injectFault({ method: 'POST', path: '/intents', status: 503, times: 2 });
    const client = createClient(backend.fetchImpl);

    const result = await client.submit(submitted(INTENT_ID));
    expect(result.kind).toBe('accepted');
    expect(backend.calls).toHaveLength(3);
  });

  it('gives up after the configured attempts', async () => {
    backend.registry.injectFault({ method: 'GET', status: 502, times: 5 });
    const client = createClient(backend.fetchImpl, { maxAttempts: 3 });

    expect(await client.fetchStatus('intent-any')).toEqual({ kind: 'unavailable', reason: 'HTTP 502' });
    expect(backend.calls).toHaveLength(3);
  });

  it('never retries a 4xx', async () => {
    backend.registry.injectFault({ method: 'POST', path: '/intents', status: 422, times: 1 });
    const client = createClient(backend.fetchImpl);

    expect(await client.submit(submitted(INTENT_ID))).toEqual({
      kind: 'rejected',
      reason: 'Injected fault (HTTP 422)',
      status: 422,
    });
    expect(backend.calls).toHaveLength(1);
  });

  it('reports a wrong bearer token as rejected', async () => {
    const client = createClient(backend.fetchImpl, { token: 'wrong-token' });
    expect(await client.submit(submitted(INTENT_ID))).toEqual({
      kind: 'rejected',
      reason: 'Valid bearer token required',
      status: 401,
    });
    expect(backend.calls).toEqual([
      { method: 'POST', path: '/intents' },
      { method: 'POST', path: '/intents' },
    ]);
  });

  it('fetches a fresh token when the cached one expired downstream', async () => {
    let now = 1_000;
    const passwordBackend = createMockBackend({
      now: () => now,
      config: {
        clientId: 'netintent',
        clientSecret: 'test-secret',
        username: 'operator',
        password: 'test-password',
        tokenTtlSeconds: 60,
      },
    });
    // The provider's clock stands still, so it keeps serving its cached token.
    const tokens = new PasswordGrantTokenProvider({
      tokenUrl: `${MOCK_BASE_URL}/auth/token`,
      clientId: 'netintent',
      clientSecret: 'test-secret',
      username: 'operator',
      password: 'test-password',
      timeoutMs: 1000,
      fetchImpl: passwordBackend.fetchImpl,
      now: () => 0,
    });
    const client = new Tmf921Client({
      baseUrl: MOCK_BASE_URL,
      tokenProvider: tokens,
      maxAttempts: 1,
      baseDelayMs: 1,
      timeoutMs: 1000,
      fetchImpl: passwordBackend.fetchImpl,
    });

    try {
      expect((await client.submit(submitted(INTENT_ID))).kind).toBe('accepted');
      now += 120_000;

      const second = await client.submit(submitted('d2e3f4a5-b6c7-4d8e-9f0a-1b2c3d4e5f60'));
      expect(second.kind).toBe('accepted');
      expect(passwordBackend.calls).toEqual([
        { method: 'POST', path: '/auth/token' },
        { method: 'POST', path: '/intents' },
        { method: 'POST', path: '/intents' },
        { method: 'POST', path: '/auth/token' },
        { method: 'POST', path: '/intents' },
      ]);
      expect(passwordBackend.registry.list()).toHaveLength(2);
    } finally {
      await passwordBackend.app.close();
    }
  });

  it('treats cancel of a missing entity as done', async () => {
    const client = createClient(backend.fetchImpl);
    const created = await client.submit(submitted(INTENT_ID));
    if (created.kind !== 'accepted') throw new Error('accepted expected');

    expect(await client.cancel(created.value.backendReference)).toEqual({ kind: 'accepted', value: undefined });
    expect(backend.registry.list()[0].lifecycleStatus).toBe('terminated');
    expect(await client.cancel('intent-missing')).toEqual({ kind: 'accepted', value: undefined });
  });

  it('reports reachability through ping', async () => {
    const client = createClient(backend.fetchImpl);
    expect(await client.ping()).toEqual({ reachable: true, status: 200 });
  });
});

describe('Tmf921Client transport failures', () => {
  it('marks a timed out submit as unknown and a timed out read as unavailable', async () => {
    const client = createClient(hangingFetch, { maxAttempts: 2, timeoutMs: 20 });

    expect(await client.submit(submitted(INTENT_ID))).toEqual({
      kind: 'unknown',
      reason: 'request timed out after 20ms',
    });
    expect(await client.fetchStatus('intent-any')).toEqual({
      kind: 'unavailable',
      reason: 'request timed out after 20ms',
    });
  });

  it('retries network errors', async () => {
    let attempts = 0;
    const failing: typeof fetch = async () => {
      attempts += 1;
      throw new TypeError('fetch failed');
    };
    const client = createClient(failing, { maxAttempts: 3 });

    expect(await client.cancel('intent-any')).toEqual({ kind: 'unavailable', reason: 'fetch failed' });
    expect(attempts).toBe(3);
  });

  it('treats an unparseable success body as unknown', async () => {
    const plain: typeof fetch = async () => new Response('created', { status: 201, headers: { 'content-type': 'text/plain' } });
    const client = createClient(plain);

    expect(await client.submit(submitted(INTENT_ID))).toEqual({
      kind: 'unknown',
      reason: 'unparseable submit response (HTTP 201)',
    });
  });

  it('maps a terminal token failure to rejected without calling the backend', async () => {
    class DeniedTokens extends TokenProvider {
      async getToken(): Promise<string> {
        throw new TokenAcquisitionError('Token endpoint responded with HTTP 401', 401);
      }
      invalidate(): void {}
    }
    let called = false;
    const client = new Tmf921Client({
      baseUrl: MOCK_BASE_URL,
      tokenProvider: new DeniedTokens(),
      maxAttempts: 3,
      baseDelayMs: 1,
      timeoutMs: 1000,
      fetchImpl: async () => {
        called = true;
        return new Response(null, { status: 204 });
      },
    });

    expect(await client.submit(submitted(INTENT_ID))).toEqual({
      kind: 'rejected',
      reason: 'Token endpoint responded with HTTP 401',
      status: 401,
    });
    expect(called).toBe(false);
  });
});
