import { matchesFilter, type Intent, type IntentFilter } from '../intent.types';
import { IntentStore, compareIntents } from './intent.store';

export class MemoryIntentStore extends IntentStore {
  private readonly records = new Map<string, Intent>();

  async initIfNeeded(): Promise<void> {}

  async put(intent: Intent): Promise<void> {
    this.records.set(intent.id, structuredClone(intent));
  }

  async get(id: string): Promise<Intent | undefined> {
    const found = this.records.get(id);
    return found ? structuredClone(found) : undefined;
  }

  async list(filter: IntentFilter = {}): Promise<Intent[]> {
    const out: Intent[] = [];
    for (const intent of this.records.values()) {
      if (matchesFilter(intent, filter)) out.push(structuredClone(intent));
    }
    return out.sort(compareIntents);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}
