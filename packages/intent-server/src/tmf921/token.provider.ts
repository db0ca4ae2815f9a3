import { Logger } from '@nestjs/common';
import { tokenResponseSchema } from './tmf921.types';

export abstract class TokenProvider {
  abstract getToken(): Promise<string>;
  abstract invalidate(): void;
}

export class TokenAcquisitionError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'TokenAcquisitionError';
  }

  /** 4xx from the identity provider: retrying with the same credentials will not help. */
  get terminal(): boolean {
    return this.status !== undefined && this.status >= 400 && this.status < 500;
  }
}

export class StaticTokenProvider extends TokenProvider {
  constructor(private readonly token: string) {
    super();
  }

  async getToken(): Promise<string> {
    return this.token;
  }

  invalidate(): void {}
}

export interface PasswordGrantOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
  scope?: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

// Refresh this long before the advertised expiry.
const EXPIRY_SKEW_MS = 30_000;
const DEFAULT_EXPIRES_IN_S = 3600;

/** OAuth2 password grant with an in-memory cached token. */
export class PasswordGrantTokenProvider extends TokenProvider {
  private readonly logger = new Logger(PasswordGrantTokenProvider.name);
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private token?: string;
  private expiresAt = 0;
  private inflight?: Promise<string>;

  constructor(private readonly options: PasswordGrantOptions) {
    super();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.token && this.now() < this.expiresAt) return this.token;
    // Coalesce concurrent refreshes into one request
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  invalidate(): void {
    this.token = undefined;
    this.expiresAt = 0;
  }

  private async refresh(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'password',
      username: this.options.username,
      password: this.options.password,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });
    if (this.options.scope) form.set('scope', this.options.scope);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.tokenUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: form.toString(),
        signal: controller.signal,
      });
    } catch (err) {
      throw new TokenAcquisitionError(`Token request failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      this.logger.warn(`Token request rejected ${JSON.stringify({ status: response.status, tokenUrl: this.options.tokenUrl })}`);
      throw new TokenAcquisitionError(`Token endpoint responded with HTTP ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new TokenAcquisitionError('Token endpoint returned a non-JSON body', response.status);
    }
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TokenAcquisitionError('Token endpoint returned an unexpected body', response.status);
    }

    const expiresInMs = (parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_S) * 1000;
    this.token = parsed.data.access_token;
    this.expiresAt = this.now() + Math.max(0, expiresInMs - EXPIRY_SKEW_MS);
    this.logger.log('Backend access token acquired');
    return this.token;
  }
}
