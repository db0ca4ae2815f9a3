import type { Intent, IntentFilter } from '../intent.types';

// Abstract store token for DI and implementation unification.
// Implementations hand out copies: callers never hold a live reference into the store.
export abstract class IntentStore {
  abstract initIfNeeded(): Promise<void>;
  abstract put(intent: Intent): Promise<void>;
  abstract get(id: string): Promise<Intent | undefined>;
  abstract list(filter?: IntentFilter): Promise<Intent[]>;
  abstract delete(id: string): Promise<boolean>;
}

export function compareIntents(a: Intent, b: Intent): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}
