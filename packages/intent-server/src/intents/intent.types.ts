import { z } from 'zod';

export const INTENT_STATES = ['Draft', 'Submitted', 'Active', 'Failed', 'Terminated'] as const;
export type IntentState = (typeof INTENT_STATES)[number];

export const intentStateSchema = z.enum(INTENT_STATES);

// Free-form attributes; the backend owns the schema.
export type IntentSpecification = Record<string, unknown>;

export type IntentLastError = {
  code: string;
  message: string;
  at: string;
};

export interface Intent {
  id: string;
  name: string;
  description: string;
  specification: IntentSpecification;
  state: IntentState;
  backendReference?: string;
  createdAt: string;
  updatedAt: string;
  lastError?: IntentLastError;
}

export type IntentFilter = {
  state?: IntentState | IntentState[];
};

export type IntentSummary = {
  id: string;
  name: string;
  state: IntentState;
  backendReference?: string;
  updatedAt: string;
  lastError?: IntentLastError;
};

export type IntentDetail = IntentSummary & {
  description: string;
  specification: IntentSpecification;
  createdAt: string;
};

export type IntentDraftFields = {
  name?: string;
  description?: string;
  specification?: IntentSpecification;
};

export function toSummary(intent: Intent): IntentSummary {
  const summary: IntentSummary = {
    id: intent.id,
    name: intent.name,
    state: intent.state,
    updatedAt: intent.updatedAt,
  };
  if (intent.backendReference !== undefined) summary.backendReference = intent.backendReference;
  if (intent.lastError) summary.lastError = { ...intent.lastError };
  return summary;
}

export function toDetail(intent: Intent): IntentDetail {
  return {
    ...toSummary(intent),
    description: intent.description,
    specification: structuredClone(intent.specification),
    createdAt: intent.createdAt,
  };
}

export function matchesFilter(intent: Intent, filter: IntentFilter = {}): boolean {
  if (filter.state === undefined) return true;
  const states = Array.isArray(filter.state) ? filter.state : [filter.state];
  if (states.length === 0) return true;
  return states.includes(intent.state);
}
