import { Errors } from './errors';
import type { Intent, IntentState } from './intent.types';

export const INTENT_EVENTS = [
  'submit',
  'confirm',
  'reject',
  'unavailable',
  'terminate',
  'query',
  'update',
  'delete',
] as const;

export type IntentEvent = (typeof INTENT_EVENTS)[number];

/**
 * Target of a transition:
 * - a concrete state
 * - 'removed' for a physical delete
 * - 'backend' when the target is whatever the backend reports (reconciliation)
 */
export type TransitionTarget = IntentState | 'removed' | 'backend';

type TransitionRule = {
  to: TransitionTarget;
  guard?: (intent: Intent) => boolean;
};

const notYetAccepted = (intent: Intent): boolean => intent.backendReference === undefined;

export const TRANSITIONS: { readonly [S in IntentState]: Readonly<Partial<Record<IntentEvent, TransitionRule>>> } = {
  Draft: {
    submit: { to: 'Submitted' },
    update: { to: 'Draft' },
    delete: { to: 'removed' },
  },
  Submitted: {
    // Re-submission is only meaningful while the backend has not acknowledged the intent.
    submit: { to: 'Submitted', guard: notYetAccepted },
    confirm: { to: 'Active' },
    reject: { to: 'Failed' },
    unavailable: { to: 'Submitted' },
    query: { to: 'backend' },
  },
  Active: {
    terminate: { to: 'Terminated' },
    query: { to: 'backend' },
  },
  Failed: {
    query: { to: 'backend' },
    delete: { to: 'removed' },
  },
  Terminated: {
    delete: { to: 'removed' },
  },
};

/** Resolves the target for `event`, or throws InvalidTransition. */
export function resolveTransition(intent: Intent, event: IntentEvent): TransitionTarget {
  const rule = TRANSITIONS[intent.state][event];
  if (!rule || (rule.guard && !rule.guard(intent))) {
    throw Errors.invalidTransition(intent.id, intent.state, event);
  }
  return rule.to;
}
