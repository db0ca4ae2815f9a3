import { Logger, Module } from '@nestjs/common';
import { CoreModule } from '../core/core.module';
import { ConfigService } from '../core/services/config.service';
import { Tmf921Client } from './tmf921.client';
import { PasswordGrantTokenProvider, StaticTokenProvider, TokenProvider } from './token.provider';

export function createTokenProvider(config: ConfigService): TokenProvider {
  switch (config.backendAuthMode) {
    case 'password': {
      const { tmf921TokenUrl, tmf921ClientId, tmf921ClientSecret, tmf921Username, tmf921Password } = config;
      if (!tmf921TokenUrl || !tmf921ClientId || !tmf921ClientSecret || !tmf921Username || !tmf921Password) {
        throw new Error(
          'TMF921_TOKEN_URL requires TMF921_CLIENT_ID, TMF921_CLIENT_SECRET, TMF921_USERNAME and TMF921_PASSWORD',
        );
      }
      return new PasswordGrantTokenProvider({
        tokenUrl: tmf921TokenUrl,
        clientId: tmf921ClientId,
        clientSecret: tmf921ClientSecret,
        username: tmf921Username,
        password: tmf921Password,
        scope: config.tmf921Scope,
        timeoutMs: config.tmf921RequestTimeoutMs,
      });
    }
    case 'static':
      return new StaticTokenProvider(config.tmf921Token ?? '');
    case 'none':
      new Logger('Tmf921Module').warn('No TMF921 credentials configured; backend requests are sent without a token');
      return new StaticTokenProvider('');
  }
}

@Module({
  imports: [CoreModule],
  providers: [
    {
      provide: TokenProvider,
      useFactory: (config: ConfigService) => createTokenProvider(config),
      inject: [ConfigService],
    },
    {
      provide: Tmf921Client,
      useFactory: (config: ConfigService, tokens: TokenProvider) =>
        new Tmf921Client({
          baseUrl: config.tmf921BaseUrl,
          tokenProvider: tokens,
          maxAttempts: config.tmf921MaxAttempts,
          baseDelayMs: config.tmf921RetryBaseDelayMs,
          timeoutMs: config.tmf921RequestTimeoutMs,
        }),
      inject: [ConfigService, TokenProvider],
    },
  ],
  exports: [Tmf921Client, TokenProvider],
})
export class Tmf921Module {}
