import { z } from 'zod';

export type BackendState = 'pending' | 'active' | 'failed' | 'terminated';

/** Internal result taxonomy; every backend response is folded into one of these. */
export type BackendResult<T> =
  | { kind: 'accepted'; value: T }
  | { kind: 'rejected'; reason: string; status: number }
  | { kind: 'unavailable'; reason: string }
  | { kind: 'unknown'; reason: string };

export type SubmitOutcome = {
  backendReference: string;
  backendState: BackendState;
};

export type StatusOutcome = {
  backendState: BackendState;
};

export const accepted = <T>(value: T): BackendResult<T> => ({ kind: 'accepted', value });
export const rejected = <T>(reason: string, status: number): BackendResult<T> => ({ kind: 'rejected', reason, status });
export const unavailable = <T>(reason: string): BackendResult<T> => ({ kind: 'unavailable', reason });
export const unknown = <T>(reason: string): BackendResult<T> => ({ kind: 'unknown', reason });

// Entity returned by POST/GET /intents; only the fields the client relies on are required.
export const backendIntentSchema = z
  .object({
    id: z.string().min(1),
    lifecycleStatus: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export type BackendIntent = z.infer<typeof backendIntentSchema>;

export const backendErrorSchema = z
  .object({
    error: z.string().optional(),
    error_description: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive().optional(),
  token_type: z.string().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
