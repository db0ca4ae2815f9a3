import 'dotenv/config';

import type { FastifyInstance } from 'fastify';

import { createMockTmf921App } from './app';
import { loadMockConfig } from './config';

async function bootstrap(): Promise<void> {
  let app: FastifyInstance | undefined;

  try {
    const config = loadMockConfig();
    app = createMockTmf921App(config);
    await app.listen({ port: config.port, host: config.host });

    const shutdown = () => {
      const closing = app ? app.close() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('tmf921-mock failed to stop cleanly', error);
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    console.error('tmf921-mock failed to start', error);
    if (app) {
      await app.close();
    }
    process.exit(1);
  }
}

void bootstrap();
