import type { IntentState } from './intent.types';

export const INTENT_ERROR_CODES = [
  'ValidationError',
  'NotFound',
  'InvalidTransition',
  'Conflict',
  'BackendUnavailable',
  'BackendRejected',
  'Unauthorized',
  'InternalError',
] as const;

export type IntentErrorCode = (typeof INTENT_ERROR_CODES)[number];

export interface IntentErrorDetails {
  code: IntentErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class IntentError extends Error {
  readonly code: IntentErrorCode;
  readonly details?: Record<string, unknown>;
  cause?: unknown;

  constructor(init: IntentErrorDetails) {
    super(init.message);
    this.name = 'IntentError';
    this.code = init.code;
    this.details = init.details;
    this.cause = init.cause;
  }

  toJSON(): { code: IntentErrorCode; message: string; details?: Record<string, unknown> } {
    const out: { code: IntentErrorCode; message: string; details?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.details) out.details = this.details;
    return out;
  }
}

export function isIntentError(err: unknown): err is IntentError {
  return err instanceof IntentError;
}

// Helper constructors for consistent error creation
export const Errors = {
  validation: (message: string, details?: Record<string, unknown>) =>
    new IntentError({ code: 'ValidationError', message, details }),
  notFound: (intentId: string) =>
    new IntentError({ code: 'NotFound', message: `Intent ${intentId} not found`, details: { intentId } }),
  invalidTransition: (intentId: string, state: IntentState, event: string) =>
    new IntentError({
      code: 'InvalidTransition',
      message: `Event "${event}" is not permitted for intent ${intentId} in state ${state}`,
      details: { intentId, state, event },
    }),
  conflict: (intentId: string, event: string, inProgress?: string | null) =>
    new IntentError({
      code: 'Conflict',
      message: `Another transition is in progress for intent ${intentId}`,
      details: inProgress ? { intentId, event, inProgress } : { intentId, event },
    }),
  backendUnavailable: (intentId: string, reason: string, outcome: 'unavailable' | 'unknown' = 'unavailable') =>
    new IntentError({
      code: 'BackendUnavailable',
      message: `Intent backend unavailable: ${reason}`,
      details: { intentId, outcome },
    }),
  backendRejected: (intentId: string, reason: string, status?: number) =>
    new IntentError({
      code: 'BackendRejected',
      message: `Intent backend rejected the request: ${reason}`,
      details: status === undefined ? { intentId } : { intentId, status },
    }),
  unauthorized: (message = 'Bearer credential required') => new IntentError({ code: 'Unauthorized', message }),
  internal: (cause: unknown) => new IntentError({ code: 'InternalError', message: 'Internal error', cause }),
};
