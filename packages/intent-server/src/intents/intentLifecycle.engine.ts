import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Tmf921Client } from '../tmf921/tmf921.client';
import type { BackendState } from '../tmf921/tmf921.types';
import { Errors, IntentError } from './errors';
import { IntentEventsBus } from './intentEvents.bus';
import { IntentLockService } from './intentLock.service';
import { resolveTransition, type IntentEvent } from './intentTransitions';
import type {
  Intent,
  IntentDraftFields,
  IntentFilter,
  IntentLastError,
  IntentSpecification,
  IntentState,
} from './intent.types';
import { IntentStore } from './store/intent.store';

export type CreateIntentInput = {
  name: string;
  description?: string;
  specification: IntentSpecification;
};

const ADOPTED_STATE: Record<BackendState, IntentState> = {
  pending: 'Submitted',
  active: 'Active',
  failed: 'Failed',
  terminated: 'Terminated',
};

/**
 * Intent lifecycle state machine.
 *
 * Every mutation runs under a per-intent lease; reads go straight to the store.
 * Transitions are resolved against the TRANSITIONS table before anything is written,
 * so a refused event leaves the record untouched.
 */
@Injectable()
export class IntentLifecycleEngine {
  private readonly logger = new Logger(IntentLifecycleEngine.name);

  constructor(
    @Inject(IntentStore) private readonly store: IntentStore,
    @Inject(Tmf921Client) private readonly backend: Tmf921Client,
    @Inject(IntentLockService) private readonly locks: IntentLockService,
    @Inject(IntentEventsBus) private readonly events: IntentEventsBus,
  ) {}

  async create(input: CreateIntentInput): Promise<Intent> {
    const name = input.name.trim();
    if (!name) throw Errors.validation('name must not be empty', { field: 'name' });
    this.assertSpecification(input.specification);

    const at = new Date().toISOString();
    const intent: Intent = {
      id: uuidv4(),
      name,
      description: input.description ?? '',
      specification: structuredClone(input.specification),
      state: 'Draft',
      createdAt: at,
      updatedAt: at,
    };
    await this.store.put(intent);
    this.events.emitCreated({ intentId: intent.id, name: intent.name, at });
    this.logger.log(`Intent created ${JSON.stringify({ intentId: intent.id, name: intent.name })}`);
    return intent;
  }

  async get(id: string): Promise<Intent> {
    const intent = await this.store.get(id);
    if (!intent) throw Errors.notFound(id);
    return intent;
  }

  async list(filter: IntentFilter = {}): Promise<Intent[]> {
    return this.store.list(filter);
  }

  async update(id: string, fields: IntentDraftFields): Promise<Intent> {
    if (fields.name === undefined && fields.description === undefined && fields.specification === undefined) {
      throw Errors.validation('at least one of name, description or specification is required');
    }
    if (fields.name !== undefined && !fields.name.trim()) {
      throw Errors.validation('name must not be empty', { field: 'name' });
    }
    if (fields.specification !== undefined) this.assertSpecification(fields.specification);

    return this.withLease(id, 'update', async (intent) => {
      const next: Intent = { ...intent, state: this.targetOf(intent, 'update') };
      if (fields.name !== undefined) next.name = fields.name.trim();
      if (fields.description !== undefined) next.description = fields.description;
      // Replaced wholesale, never merged
      if (fields.specification !== undefined) next.specification = structuredClone(fields.specification);
      return this.persist(intent, next, 'update');
    });
  }

  /**
   * Draft -> Submitted, then one backend create. A Submitted intent that never got a
   * backend reference may be submitted again; the intent id doubles as idempotency key.
   */
  async submit(id: string): Promise<Intent> {
    return this.withLease(id, 'submit', async (current) => {
      const submittedState = this.targetOf(current, 'submit');
      let intent =
        current.state === submittedState ? current : await this.persist(current, { ...current, state: submittedState }, 'submit');

      const result = await this.backend.submit(intent);
      switch (result.kind) {
        case 'accepted': {
          const { backendReference, backendState } = result.value;
          const recordedState = this.targetOf(intent, 'submit');
          intent = await this.persist(intent, this.clearError({ ...intent, state: recordedState, backendReference }), 'submit');
          if (backendState === 'active') {
            return this.persist(intent, { ...intent, state: this.targetOf(intent, 'confirm') }, 'confirm');
          }
          // Settled downstream already: adopt it as a reconciliation
          if (backendState !== 'pending') return this.adopt(intent, backendState);
          // Not active yet: reconcile once. A failed read leaves the intent Submitted with lastError.
          const reconciled = await this.reconcile(intent, backendReference);
          return reconciled.intent;
        }
        case 'rejected': {
          const failedState = this.targetOf(intent, 'reject');
          const error = Errors.backendRejected(intent.id, result.reason, result.status);
          await this.persist(intent, { ...intent, state: failedState, lastError: this.lastErrorOf(error) }, 'reject');
          throw error;
        }
        case 'unavailable':
        case 'unknown': {
          const pendingState = this.targetOf(intent, 'unavailable');
          const error = Errors.backendUnavailable(intent.id, result.reason, result.kind);
          await this.persist(intent, { ...intent, state: pendingState, lastError: this.lastErrorOf(error) }, 'unavailable');
          throw error;
        }
      }
    });
  }

  /** Active -> Terminated whatever the cancel outcome; a failed cancel stays visible in lastError. */
  async terminate(id: string): Promise<Intent> {
    return this.withLease(id, 'terminate', async (intent) => {
      const terminatedState = this.targetOf(intent, 'terminate');
      if (!intent.backendReference) {
        this.logger.warn(`Terminating intent without backend reference ${JSON.stringify({ intentId: intent.id })}`);
        return this.persist(intent, this.clearError({ ...intent, state: terminatedState }), 'terminate');
      }

      const result = await this.backend.cancel(intent.backendReference);
      if (result.kind === 'accepted') {
        return this.persist(intent, this.clearError({ ...intent, state: terminatedState }), 'terminate');
      }
      const error =
        result.kind === 'rejected'
          ? Errors.backendRejected(intent.id, result.reason, result.status)
          : Errors.backendUnavailable(intent.id, result.reason, result.kind);
      this.logger.warn(
        `Backend cancel failed; intent terminated locally ${JSON.stringify({ intentId: intent.id, code: error.code, reason: result.reason })}`,
      );
      return this.persist(intent, { ...intent, state: terminatedState, lastError: this.lastErrorOf(error) }, 'terminate');
    });
  }

  async delete(id: string): Promise<{ id: string; deleted: true }> {
    return this.withLease(id, 'delete', async (intent) => {
      if (resolveTransition(intent, 'delete') !== 'removed') {
        throw Errors.internal(new Error(`delete from ${intent.state} does not remove the record`));
      }
      await this.store.delete(intent.id);
      const at = new Date().toISOString();
      this.events.emitDeleted({ intentId: intent.id, state: intent.state, at });
      this.logger.log(`Intent deleted ${JSON.stringify({ intentId: intent.id, state: intent.state })}`);
      return { id: intent.id, deleted: true as const };
    });
  }

  /** Pulls the backend status and adopts it when it differs from the local state. */
  async checkStatus(id: string): Promise<Intent> {
    return this.withLease(id, 'query', async (intent) => {
      resolveTransition(intent, 'query');
      if (!intent.backendReference) return intent;
      const { intent: reconciled, error } = await this.reconcile(intent, intent.backendReference);
      if (error) throw error;
      return reconciled;
    });
  }

  private async reconcile(intent: Intent, backendReference: string): Promise<{ intent: Intent; error?: IntentError }> {
    const result = await this.backend.fetchStatus(backendReference);
    if (result.kind === 'accepted') {
      return { intent: await this.adopt(intent, result.value.backendState) };
    }
    const error =
      result.kind === 'rejected'
        ? Errors.backendRejected(intent.id, result.reason, result.status)
        : Errors.backendUnavailable(intent.id, result.reason, result.kind);
    const recorded = await this.persist(intent, { ...intent, lastError: this.lastErrorOf(error) }, 'query');
    return { intent: recorded, error };
  }

  // The backend is authoritative for intents it knows about; adoption always runs through the query rule.
  private async adopt(intent: Intent, backendState: BackendState): Promise<Intent> {
    const rule = resolveTransition(intent, 'query');
    const target = rule === 'backend' ? ADOPTED_STATE[backendState] : rule;
    if (target === 'removed') throw Errors.internal(new Error(`query from ${intent.state} removes the record`));
    if (target === intent.state) return intent;
    if (target === 'Failed') {
      const error = Errors.backendRejected(intent.id, `backend reported ${backendState}`);
      return this.persist(intent, { ...intent, state: target, lastError: this.lastErrorOf(error) }, 'query');
    }
    return this.persist(intent, this.clearError({ ...intent, state: target }), 'query');
  }

  /** Target state of `event` as the transition table declares it. */
  private targetOf(intent: Intent, event: IntentEvent): IntentState {
    const to = resolveTransition(intent, event);
    if (to === 'removed' || to === 'backend') {
      throw Errors.internal(new Error(`"${event}" from ${intent.state} has no fixed target state`));
    }
    return to;
  }

  private async withLease<T>(id: string, event: IntentEvent, fn: (intent: Intent) => Promise<T>): Promise<T> {
    const lease = this.locks.tryAcquire(id, event);
    if (!lease) {
      this.logger.warn(`Intent transition refused ${JSON.stringify({ intentId: id, event, inProgress: this.locks.currentEvent(id) })}`);
      throw Errors.conflict(id, event, this.locks.currentEvent(id));
    }
    try {
      const intent = await this.store.get(id);
      if (!intent) throw Errors.notFound(id);
      return await fn(intent);
    } finally {
      this.locks.release(lease);
    }
  }

  private async persist(prev: Intent, next: Intent, event: IntentEvent): Promise<Intent> {
    const record: Intent = { ...next, updatedAt: this.nextTimestamp(prev.updatedAt) };
    await this.store.put(record);

    const transition = {
      intentId: record.id,
      event,
      from: prev.state,
      to: record.state,
      at: record.updatedAt,
      ...(record.lastError ? { lastError: { code: record.lastError.code, message: record.lastError.message } } : {}),
    };
    this.events.emitTransition(transition);
    this.logger.log(`Intent transition ${JSON.stringify(transition)}`);
    return record;
  }

  // Per-record monotonic clock
  private nextTimestamp(previous: string): string {
    const prevMs = Date.parse(previous);
    const now = Date.now();
    return new Date(Number.isFinite(prevMs) ? Math.max(now, prevMs + 1) : now).toISOString();
  }

  private lastErrorOf(error: IntentError): IntentLastError {
    return { code: error.code, message: error.message, at: new Date().toISOString() };
  }

  private clearError(intent: Intent): Intent {
    const next: Intent = { ...intent };
    delete next.lastError;
    return next;
  }

  private assertSpecification(specification: IntentSpecification): void {
    if (Object.keys(specification).length === 0) {
      throw Errors.validation('specification must not be empty', { field: 'specification' });
    }
  }
}
