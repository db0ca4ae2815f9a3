import { Logger } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import { URL } from 'url';
import type { Intent } from '../intents/intent.types';
import { buildIntentPayload } from './tmf921.payload';
import { backendStatusOf, mapBackendStatus } from './tmf921.status';
import {
  accepted,
  backendErrorSchema,
  backendIntentSchema,
  rejected,
  unavailable,
  unknown,
  type BackendResult,
  type StatusOutcome,
  type SubmitOutcome,
} from './tmf921.types';
import { TokenAcquisitionError, type TokenProvider } from './token.provider';

interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  maxAttempts?: number;
}

interface RawResponse {
  status: number;
  json?: unknown;
  text?: string;
}

// Outcome of the transport loop, before any TMF921-specific interpretation.
type Attempted =
  | { kind: 'response'; response: RawResponse }
  | { kind: 'exhausted'; reason: string; timedOut: boolean }
  | { kind: 'auth'; reason: string; status?: number };

export interface Tmf921ClientOptions {
  baseUrl: string;
  tokenProvider: TokenProvider;
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class Tmf921Client {
  private readonly logger = new Logger(Tmf921Client.name);
  private readonly base: string;
  private readonly fetchImpl: typeof fetch;
  private readonly tokens: TokenProvider;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;

  constructor(options: Tmf921ClientOptions) {
    const normalized = options.baseUrl.replace(/\/+$/, '');
    this.base = normalized.length > 0 ? `${normalized}/` : '/';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.tokens = options.tokenProvider;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = Math.max(1, options.baseDelayMs);
    this.timeoutMs = Math.max(1, options.timeoutMs);
  }

  get baseUrl(): string {
    return this.base.replace(/\/$/, '');
  }

  /** POST /intents with the intent id as idempotency key. */
  async submit(intent: Intent): Promise<BackendResult<SubmitOutcome>> {
    const attempted = await this.request('POST', 'intents', {
      body: buildIntentPayload(intent),
      headers: { 'idempotency-key': intent.id },
    });
    if (attempted.kind !== 'response') return this.fromFailure(attempted, 'unknown');

    const { response } = attempted;
    // 409: the idempotency key was already used; the body carries the existing entity.
    if (this.isSuccess(response.status) || response.status === 409) {
      const entity = backendIntentSchema.safeParse(response.json);
      if (!entity.success) {
        if (response.status === 409) return rejected(this.reasonFrom(response), response.status);
        return unknown(`unparseable submit response (HTTP ${response.status})`);
      }
      const raw = backendStatusOf(entity.data);
      const backendState = mapBackendStatus(raw);
      if (!backendState && raw) {
        this.logger.warn(`Unrecognised backend status on submit ${JSON.stringify({ intentId: intent.id, status: raw })}`);
      }
      // The entity exists downstream; an unrecognised status is settled by the next reconciliation.
      return accepted({ backendReference: entity.data.id, backendState: backendState ?? 'pending' });
    }
    return rejected(this.reasonFrom(response), response.status);
  }

  /** GET /intents/{ref}. */
  async fetchStatus(backendReference: string): Promise<BackendResult<StatusOutcome>> {
    const attempted = await this.request('GET', `intents/${encodeURIComponent(backendReference)}`);
    // A read that timed out changed nothing downstream.
    if (attempted.kind !== 'response') return this.fromFailure(attempted, 'unavailable');

    const { response } = attempted;
    if (!this.isSuccess(response.status)) return rejected(this.reasonFrom(response), response.status);

    const entity = backendIntentSchema.safeParse(response.json);
    if (!entity.success) return unknown(`unparseable status response (HTTP ${response.status})`);
    const raw = backendStatusOf(entity.data);
    const backendState = mapBackendStatus(raw);
    if (!backendState) return unknown(`unrecognised backend status "${raw ?? ''}"`);
    return accepted({ backendState });
  }

  /** DELETE /intents/{ref}. A 404 means the entity is already gone. */
  async cancel(backendReference: string): Promise<BackendResult<void>> {
    const attempted = await this.request('DELETE', `intents/${encodeURIComponent(backendReference)}`);
    if (attempted.kind !== 'response') return this.fromFailure(attempted, 'unknown');

    const { response } = attempted;
    if (this.isSuccess(response.status) || response.status === 404) return accepted(undefined);
    return rejected(this.reasonFrom(response), response.status);
  }

  /** Single-attempt reachability check for health reporting. */
  async ping(): Promise<{ reachable: boolean; status?: number }> {
    const attempted = await this.request('GET', 'intents', { maxAttempts: 1 });
    if (attempted.kind === 'response') return { reachable: true, status: attempted.response.status };
    if (attempted.kind === 'auth' && attempted.status !== undefined) return { reachable: true, status: attempted.status };
    return { reachable: false };
  }

  private fromFailure<T>(
    attempted: Exclude<Attempted, { kind: 'response' }>,
    onTimeout: 'unknown' | 'unavailable',
  ): BackendResult<T> {
    if (attempted.kind === 'auth') {
      if (attempted.status !== undefined && attempted.status >= 400 && attempted.status < 500) {
        return rejected(attempted.reason, attempted.status);
      }
      return unavailable(attempted.reason);
    }
    if (attempted.timedOut && onTimeout === 'unknown') return unknown(attempted.reason);
    return unavailable(attempted.reason);
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<Attempted> {
    const url = new URL(path, this.base).toString();
    const maxAttempts = options.maxAttempts ?? this.maxAttempts;
    const payload = options.body !== undefined ? JSON.stringify(options.body) : undefined;

    let lastReason = 'no attempt made';
    let lastTimedOut = false;
    let reauthenticated = false;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let token: string;
      try {
        token = await this.tokens.getToken();
      } catch (error) {
        if (error instanceof TokenAcquisitionError && error.terminal) {
          return { kind: 'auth', reason: error.message, status: error.status };
        }
        lastReason = this.toErrorMessage(error);
        lastTimedOut = false;
        if (attempt >= maxAttempts) break;
        this.logger.warn(`TMF921 token error (retrying) ${JSON.stringify({ method, path, attempt, error: lastReason })}`);
        await this.backoff(attempt);
        continue;
      }

      const headers: Record<string, string> = { accept: 'application/json', ...options.headers };
      if (token) headers.authorization = `Bearer ${token}`;
      if (payload) headers['content-type'] = 'application/json';

      const controller = new AbortController();
      const timer = setTimeout(() => {
        controller.abort();
      }, this.timeoutMs);
      try {
        const response = await this.fetchImpl(url, { method, headers, body: payload, signal: controller.signal });
        const raw = await this.toRawResponse(response);
        clearTimeout(timer);
        if (raw.status === 401) {
          this.tokens.invalidate();
          // A cached credential may have expired downstream: one more try with a fresh token, not counted as an attempt.
          if (!reauthenticated) {
            reauthenticated = true;
            this.logger.warn(`TMF921 credential refused; retrying with a fresh token ${JSON.stringify({ method, path })}`);
            attempt -= 1;
            continue;
          }
        }
        if (raw.status < 500) return { kind: 'response', response: raw };

        lastReason = `HTTP ${raw.status}`;
        lastTimedOut = false;
        if (attempt >= maxAttempts) break;
        this.logger.warn(`TMF921 request failed (retrying) ${JSON.stringify({ method, path, status: raw.status, attempt })}`);
        await this.backoff(attempt);
      } catch (error) {
        clearTimeout(timer);
        lastTimedOut = this.isAbortError(error);
        lastReason = lastTimedOut ? `request timed out after ${this.timeoutMs}ms` : this.toErrorMessage(error);
        if (attempt >= maxAttempts) break;
        this.logger.warn(`TMF921 request error (retrying) ${JSON.stringify({ method, path, attempt, error: lastReason })}`);
        await this.backoff(attempt);
      }
    }

    this.logger.error(`TMF921 request exhausted retries ${JSON.stringify({ method, path, attempts: maxAttempts, error: lastReason })}`);
    return { kind: 'exhausted', reason: lastReason, timedOut: lastTimedOut };
  }

  private async toRawResponse(response: Response): Promise<RawResponse> {
    const contentType = response.headers.get('content-type') || '';
    if (contentType.includes('application/json')) {
      try {
        return { status: response.status, json: await response.json() };
      } catch {
        return { status: response.status };
      }
    }
    return { status: response.status, text: await this.safeText(response) };
  }

  private async safeText(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch {
      return '';
    }
  }

  private reasonFrom(response: RawResponse): string {
    const parsed = backendErrorSchema.safeParse(response.json);
    if (parsed.success) {
      const reason = parsed.data.error_description ?? parsed.data.message ?? parsed.data.error;
      if (reason) return reason;
    }
    if (response.text && response.text.trim().length > 0) return response.text.trim().slice(0, 500);
    return `HTTP ${response.status}`;
  }

  private isSuccess(status: number): boolean {
    return status >= 200 && status < 300;
  }

  private async backoff(attempt: number): Promise<void> {
    const delayMs = this.baseDelayMs * Math.pow(2, attempt - 1);
    await delay(delayMs);
  }

  private isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
  }

  private toErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return JSON.stringify(error);
  }
}
