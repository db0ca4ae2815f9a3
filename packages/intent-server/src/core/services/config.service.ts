import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { z } from 'zod';
dotenv.config();

const numberWithDefault = (fallback: number) =>
  z
    .union([z.string(), z.number()])
    .default(String(fallback))
    .transform((v) => {
      if (typeof v === 'string' && v.trim() === '') return fallback;
      const n = typeof v === 'number' ? v : Number(v);
      return Number.isFinite(n) ? n : fallback;
    });

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const configSchema = z.object({
  port: numberWithDefault(3010),
  // Downstream TMF921 Intent Management API
  tmf921BaseUrl: z.string().min(1).default('http://localhost:8080'),
  tmf921Token: optionalString,
  // When set, tokens come from an OAuth2 password grant instead of TMF921_TOKEN
  tmf921TokenUrl: optionalString,
  tmf921ClientId: optionalString,
  tmf921ClientSecret: optionalString,
  tmf921Username: optionalString,
  tmf921Password: optionalString,
  tmf921Scope: optionalString,
  tmf921MaxAttempts: numberWithDefault(3),
  tmf921RetryBaseDelayMs: numberWithDefault(200),
  tmf921RequestTimeoutMs: numberWithDefault(10_000),
  // Intent persistence
  intentStore: z.enum(['memory', 'fs']).default('memory'),
  intentStorePath: z.string().min(1).default('./data'),
  corsOrigins: z
    .string()
    .default('')
    .transform((s) =>
      s
        .split(',')
        .map((x) => x.trim())
        .filter((x) => !!x),
    ),
});

export type Config = z.infer<typeof configSchema>;

export type BackendAuthMode = 'static' | 'password' | 'none';

@Injectable()
export class ConfigService implements Config {
  private _params?: Config;

  private get params(): Config {
    if (!this._params) {
      throw new Error('ConfigService not initialized with parameters');
    }
    return this._params;
  }

  init(params: Config): this {
    this._params = params;
    return this;
  }

  get port(): number {
    return this.params.port;
  }

  // TMF921 backend
  get tmf921BaseUrl(): string {
    return this.params.tmf921BaseUrl;
  }
  get tmf921Token(): string | undefined {
    return this.params.tmf921Token;
  }
  get tmf921TokenUrl(): string | undefined {
    return this.params.tmf921TokenUrl;
  }
  get tmf921ClientId(): string | undefined {
    return this.params.tmf921ClientId;
  }
  get tmf921ClientSecret(): string | undefined {
    return this.params.tmf921ClientSecret;
  }
  get tmf921Username(): string | undefined {
    return this.params.tmf921Username;
  }
  get tmf921Password(): string | undefined {
    return this.params.tmf921Password;
  }
  get tmf921Scope(): string | undefined {
    return this.params.tmf921Scope;
  }
  get tmf921MaxAttempts(): number {
    return this.params.tmf921MaxAttempts;
  }
  get tmf921RetryBaseDelayMs(): number {
    return this.params.tmf921RetryBaseDelayMs;
  }
  get tmf921RequestTimeoutMs(): number {
    return this.params.tmf921RequestTimeoutMs;
  }

  get backendAuthMode(): BackendAuthMode {
    if (this.params.tmf921TokenUrl) return 'password';
    if (this.params.tmf921Token) return 'static';
    return 'none';
  }

  get intentStore(): 'memory' | 'fs' {
    return this.params.intentStore;
  }
  get intentStorePath(): string {
    return this.params.intentStorePath;
  }

  get corsOrigins(): string[] {
    return this.params.corsOrigins ?? [];
  }

  static fromEnv(): ConfigService {
    const parsed = configSchema.parse({
      port: process.env.PORT,
      tmf921BaseUrl: process.env.TMF921_BASE_URL || undefined,
      tmf921Token: process.env.TMF921_TOKEN,
      tmf921TokenUrl: process.env.TMF921_TOKEN_URL,
      tmf921ClientId: process.env.TMF921_CLIENT_ID,
      tmf921ClientSecret: process.env.TMF921_CLIENT_SECRET,
      tmf921Username: process.env.TMF921_USERNAME,
      tmf921Password: process.env.TMF921_PASSWORD,
      tmf921Scope: process.env.TMF921_SCOPE,
      tmf921MaxAttempts: process.env.TMF921_MAX_ATTEMPTS,
      tmf921RetryBaseDelayMs: process.env.TMF921_RETRY_BASE_DELAY_MS,
      tmf921RequestTimeoutMs: process.env.TMF921_REQUEST_TIMEOUT_MS,
      // Pass raw env; schema will validate/assign default
      intentStore: process.env.INTENT_STORE || undefined,
      intentStorePath: process.env.INTENT_STORE_PATH || undefined,
      corsOrigins: process.env.CORS_ORIGINS,
    });
    return new ConfigService().init(parsed);
  }
}
