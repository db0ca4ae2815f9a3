import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger as PinoLogger } from 'nestjs-pino';

import { AppModule } from './bootstrap/app.module';
import { TOOLSET_VERSION } from './core/constants';
import { ConfigService } from './core/services/config.service';

const bootstrapLogger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  bootstrapLogger.log('Nest application created');

  const cfg = app.get(ConfigService);
  // origins from CORS_ORIGINS; if unset, keep permissive true
  app.enableCors({
    origin: cfg.corsOrigins.length ? cfg.corsOrigins : true,
    methods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Mcp-Session-Id', 'Mcp-Protocol-Version'],
    credentials: false,
  });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  await app.listen(cfg.port, '0.0.0.0');
  bootstrapLogger.log(
    `HTTP server listening ${JSON.stringify({ port: cfg.port, toolsetVersion: TOOLSET_VERSION, backend: cfg.tmf921BaseUrl, store: cfg.intentStore })}`,
  );
}

bootstrap().catch((error: unknown) => {
  const context =
    error instanceof Error
      ? {
          name: error.name,
          message: error.message,
          stack: error.stack,
        }
      : { error };
  bootstrapLogger.error(`Bootstrap failure ${JSON.stringify(context)}`);
  process.exit(1);
});
