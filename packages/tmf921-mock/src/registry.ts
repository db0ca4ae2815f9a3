import { randomBytes } from 'node:crypto';

export const MOCK_LIFECYCLE_STATUSES = ['acknowledged', 'inProgress', 'active', 'rejected', 'failed', 'terminated'] as const;
export type MockLifecycleStatus = (typeof MOCK_LIFECYCLE_STATUSES)[number];

export type MockIntentEntity = Record<string, unknown> & {
  id: string;
  href: string;
  name: string;
  lifecycleStatus: MockLifecycleStatus;
  creationDate: string;
  lastUpdate: string;
};

export type MockFault = {
  method: string;
  // Exact request path (without query); matches every path when omitted
  path?: string;
  status: number;
  // Number of requests the fault applies to
  times: number;
};

type StoredIntent = {
  entity: MockIntentEntity;
  reads: number;
};

/** In-memory state of the mock TMF921 backend; tests drive it directly. */
export class MockIntentRegistry {
  private readonly intents = new Map<string, StoredIntent>();
  private readonly idempotency = new Map<string, string>();
  private readonly tokens = new Map<string, number>();
  private faults: MockFault[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  create(body: Record<string, unknown>, idempotencyKey?: string): { entity: MockIntentEntity; replayed: boolean } {
    if (idempotencyKey) {
      const existing = this.idempotency.get(idempotencyKey);
      const stored = existing ? this.intents.get(existing) : undefined;
      if (stored) return { entity: structuredClone(stored.entity), replayed: true };
    }

    const id = `intent-${randomBytes(5).toString('hex')}`;
    const at = new Date(this.now()).toISOString();
    const entity: MockIntentEntity = {
      ...structuredClone(body),
      id,
      href: `/intents/${id}`,
      name: typeof body.name === 'string' ? body.name : id,
      lifecycleStatus: 'acknowledged',
      creationDate: at,
      lastUpdate: at,
    };
    this.intents.set(id, { entity, reads: 0 });
    if (idempotencyKey) this.idempotency.set(idempotencyKey, id);
    return { entity: structuredClone(entity), replayed: false };
  }

  /** The first read after creation promotes acknowledged -> active. */
  read(id: string): MockIntentEntity | undefined {
    const stored = this.intents.get(id);
    if (!stored) return undefined;
    stored.reads += 1;
    if (stored.reads === 1 && stored.entity.lifecycleStatus === 'acknowledged') {
      this.updateStatus(stored, 'active');
    }
    return structuredClone(stored.entity);
  }

  list(): MockIntentEntity[] {
    return [...this.intents.values()].map((stored) => structuredClone(stored.entity));
  }

  cancel(id: string): boolean {
    const stored = this.intents.get(id);
    if (!stored) return false;
    this.updateStatus(stored, 'terminated');
    return true;
  }

  setStatus(id: string, status: MockLifecycleStatus): boolean {
    const stored = this.intents.get(id);
    if (!stored) return false;
    this.updateStatus(stored, status);
    // An explicit status is not overridden by the first-read promotion
    stored.reads = Math.max(stored.reads, 1);
    return true;
  }

  injectFault(fault: MockFault): void {
    if (fault.times > 0) this.faults.push({ ...fault, method: fault.method.toUpperCase() });
  }

  /** Consumes one matching fault and returns its status. */
  takeFault(method: string, path: string): number | undefined {
    const upper = method.toUpperCase();
    const index = this.faults.findIndex((f) => f.method === upper && (f.path === undefined || f.path === path));
    if (index < 0) return undefined;
    const fault = this.faults[index];
    fault.times -= 1;
    if (fault.times <= 0) this.faults.splice(index, 1);
    return fault.status;
  }

  issueToken(ttlSeconds: number): string {
    const token = randomBytes(24).toString('hex');
    this.tokens.set(token, this.now() + ttlSeconds * 1000);
    return token;
  }

  isTokenValid(token: string): boolean {
    const expiresAt = this.tokens.get(token);
    if (expiresAt === undefined) return false;
    if (this.now() >= expiresAt) {
      this.tokens.delete(token);
      return false;
    }
    return true;
  }

  snapshot(): { intents: MockIntentEntity[]; idempotencyKeys: number; pendingFaults: MockFault[] } {
    return {
      intents: this.list(),
      idempotencyKeys: this.idempotency.size,
      pendingFaults: this.faults.map((f) => ({ ...f })),
    };
  }

  reset(): void {
    this.intents.clear();
    this.idempotency.clear();
    this.tokens.clear();
    this.faults = [];
  }

  private updateStatus(stored: StoredIntent, status: MockLifecycleStatus): void {
    stored.entity.lifecycleStatus = status;
    stored.entity.lastUpdate = new Date(this.now()).toISOString();
  }
}
