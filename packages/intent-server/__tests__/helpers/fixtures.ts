import { createMockTmf921App, MockIntentRegistry, parseMockConfig, type MockConfigInput } from '@netintent/tmf921-mock';
import type { FastifyInstance } from 'fastify';
import { IntentEventsBus } from '../../src/intents/intentEvents.bus';
import { IntentLifecycleEngine } from '../../src/intents/intentLifecycle.engine';
import { IntentLockService } from '../../src/intents/intentLock.service';
import { MemoryIntentStore } from '../../src/intents/store/memoryIntent.store';
import { Tmf921Client } from '../../src/tmf921/tmf921.client';
import { StaticTokenProvider } from '../../src/tmf921/token.provider';
import { injectFetch } from './injectFetch';

export const TEST_TOKEN = 'test-token';
export const MOCK_BASE_URL = 'http://tmf921.test/tmf-api/intentManagement/v5';

export type MockBackend = {
  app: FastifyInstance;
  registry: MockIntentRegistry;
  fetchImpl: typeof fetch;
  calls: Array<{ method: string; path: string }>;
};

export function createMockBackend(options: { now?: () => number; config?: MockConfigInput } = {}): MockBackend {
  const registry = new MockIntentRegistry(options.now);
  const app = createMockTmf921App(
    parseMockConfig({ logLevel: 'silent', staticToken: TEST_TOKEN, ...options.config }),
    registry,
  );
  const calls: Array<{ method: string; path: string }> = [];
  // The mock serves the API at its root; strip the base path the client prefixes.
  const basePath = new URL(MOCK_BASE_URL).pathname;
  const routed = injectFetch(app, (method, path) => calls.push({ method, path }));
  const fetchImpl: typeof fetch = (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    url.pathname = url.pathname.replace(basePath, '');
    return routed(url.toString(), init);
  };
  return { app, registry, fetchImpl, calls };
}

export function createClient(fetchImpl: typeof fetch, overrides: { maxAttempts?: number; timeoutMs?: number; token?: string } = {}) {
  return new Tmf921Client({
    baseUrl: MOCK_BASE_URL,
    tokenProvider: new StaticTokenProvider(overrides.token ?? TEST_TOKEN),
    maxAttempts: overrides.maxAttempts ?? 3,
    baseDelayMs: 1,
    timeoutMs: overrides.timeoutMs ?? 1000,
    fetchImpl,
  });
}

export function createEngine(client: Tmf921Client) {
  const store = new MemoryIntentStore();
  const locks = new IntentLockService();
  const events = new IntentEventsBus();
  const engine = new IntentLifecycleEngine(store, client, locks, events);
  return { engine, store, locks, events };
}

export const broadcastSpecification = {
  intentType: 'EventLiveBroadcast',
  participants: 1000,
  quality: '4K',
};
