import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml, stringify } from 'yaml';
import { z } from 'zod';
import { intentStateSchema, matchesFilter, type Intent, type IntentFilter } from '../intent.types';
import { IntentStore, compareIntents } from './intent.store';

const persistedIntentSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  specification: z.record(z.string(), z.unknown()),
  state: intentStateSchema,
  backendReference: z.string().min(1).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  lastError: z.object({ code: z.string(), message: z.string(), at: z.string() }).optional(),
});

function stringifyYaml(input: unknown): string {
  const out = stringify(input, { indent: 2, lineWidth: 0 });
  return out.endsWith('\n') ? out : `${out}\n`;
}

/**
 * One YAML document per intent under `<root>/intents/<id>.yaml`.
 *
 * Records are loaded once by initIfNeeded() and served from memory afterwards; every
 * put/delete writes through to disk before the in-memory copy changes.
 */
export class FsIntentStore extends IntentStore {
  private readonly logger = new Logger(FsIntentStore.name);
  private readonly records = new Map<string, Intent>();
  private ready = false;

  constructor(private readonly rootPath: string) {
    super();
  }

  async initIfNeeded(): Promise<void> {
    if (this.ready) return;
    const dir = this.intentsDir();
    await fs.mkdir(dir, { recursive: true });
    const entries = await fs.readdir(dir);
    for (const entry of entries) {
      if (!entry.endsWith('.yaml')) continue;
      const file = path.join(dir, entry);
      try {
        const raw = await fs.readFile(file, 'utf8');
        const parsed = persistedIntentSchema.safeParse(parseYaml(raw));
        if (!parsed.success) {
          this.logger.warn(`Skipping malformed intent file ${JSON.stringify({ file, issues: parsed.error.issues.length })}`);
          continue;
        }
        this.records.set(parsed.data.id, parsed.data);
      } catch (err) {
        this.logger.warn(`Skipping unreadable intent file ${JSON.stringify({ file, error: String(err) })}`);
      }
    }
    this.ready = true;
    this.logger.log(`Loaded ${this.records.size} intents from ${dir}`);
  }

  async put(intent: Intent): Promise<void> {
    this.assertReady();
    const copy = structuredClone(intent);
    await this.atomicWriteFile(this.filePath(intent.id), stringifyYaml(copy));
    this.records.set(intent.id, copy);
  }

  async get(id: string): Promise<Intent | undefined> {
    this.assertReady();
    const found = this.records.get(id);
    return found ? structuredClone(found) : undefined;
  }

  async list(filter: IntentFilter = {}): Promise<Intent[]> {
    this.assertReady();
    const out: Intent[] = [];
    for (const intent of this.records.values()) {
      if (matchesFilter(intent, filter)) out.push(structuredClone(intent));
    }
    return out.sort(compareIntents);
  }

  async delete(id: string): Promise<boolean> {
    this.assertReady();
    if (!this.records.has(id)) return false;
    try {
      await fs.unlink(this.filePath(id));
    } catch (err) {
      if ((err as NodeJS.ErrnoException)?.code !== 'ENOENT') throw err;
    }
    this.records.delete(id);
    return true;
  }

  private intentsDir(): string {
    return path.join(this.rootPath, 'intents');
  }

  private filePath(id: string): string {
    // ids are generated server-side (uuid); reject anything that could escape the directory
    if (!/^[A-Za-z0-9-]+$/.test(id)) throw new Error(`Invalid intent id for file storage: ${id}`);
    return path.join(this.intentsDir(), `${id}.yaml`);
  }

  private assertReady(): void {
    if (!this.ready) {
      throw new Error('FsIntentStore used before initialization');
    }
  }

  private async atomicWriteFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(filePath)}.tmp-${process.pid}-${Date.now()}`);
    const fd = await fs.open(tmp, 'w');
    try {
      await fd.writeFile(content);
      await fd.sync();
    } finally {
      await fd.close();
    }
    await fs.rename(tmp, filePath);
  }
}
