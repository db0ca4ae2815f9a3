import { DynamicModule, Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { CoreModule } from '../core/core.module';
import { InfraModule } from '../infra/infra.module';
import { IntentsModule } from '../intents/intents.module';
import { McpModule } from '../mcp/mcp.module';

export const createLoggerModule = (): DynamicModule =>
  LoggerModule.forRoot({
    pinoHttp: {
      level: process.env.LOG_LEVEL ?? 'info',
      customLogLevel: (_req, res, error) => {
        if (error instanceof Error) return 'error';
        if (typeof res.statusCode === 'number' && res.statusCode >= 500) return 'error';
        return 'silent';
      },
      redact: {
        paths: [
          'req.headers.authorization',
          'req.headers.cookie',
          'req.headers.set-cookie',
          'req.headers["set-cookie"]',
        ],
        censor: '[REDACTED]',
      },
    },
  });

@Module({
  imports: [createLoggerModule(), CoreModule, IntentsModule, McpModule, InfraModule],
})
export class AppModule {}
