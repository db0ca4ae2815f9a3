import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter } from 'node:events';
import type { IntentEvent } from './intentTransitions';
import type { IntentState } from './intent.types';

export type IntentCreatedEvent = {
  intentId: string;
  name: string;
  at: string;
};

export type IntentTransitionEvent = {
  intentId: string;
  event: IntentEvent;
  from: IntentState;
  to: IntentState;
  at: string;
  lastError?: { code: string; message: string };
};

export type IntentDeletedEvent = {
  intentId: string;
  state: IntentState;
  at: string;
};

type IntentBusEvents = {
  intent_created: [IntentCreatedEvent];
  intent_transition: [IntentTransitionEvent];
  intent_deleted: [IntentDeletedEvent];
};

@Injectable()
export class IntentEventsBus implements OnModuleDestroy {
  private readonly emitter = new EventEmitter<IntentBusEvents>();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  emitCreated(payload: IntentCreatedEvent): void {
    this.emitter.emit('intent_created', payload);
  }

  emitTransition(payload: IntentTransitionEvent): void {
    this.emitter.emit('intent_transition', payload);
  }

  emitDeleted(payload: IntentDeletedEvent): void {
    this.emitter.emit('intent_deleted', payload);
  }

  subscribeToCreated(listener: (payload: IntentCreatedEvent) => void): () => void {
    this.emitter.on('intent_created', listener);
    return () => {
      this.emitter.off('intent_created', listener);
    };
  }

  subscribeToTransitions(listener: (payload: IntentTransitionEvent) => void): () => void {
    this.emitter.on('intent_transition', listener);
    return () => {
      this.emitter.off('intent_transition', listener);
    };
  }

  subscribeToDeleted(listener: (payload: IntentDeletedEvent) => void): () => void {
    this.emitter.on('intent_deleted', listener);
    return () => {
      this.emitter.off('intent_deleted', listener);
    };
  }

  onModuleDestroy(): void {
    this.emitter.removeAllListeners();
  }
}
