import { env } from './config/env.js';
import { redis } from './config/redis.js';
import { createApp } from './app.js';
import { createDefaultEngine } from './engine.js';
import { closeQueues } from './jobs/queues.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  await redis.connect();

  const app = createApp(createDefaultEngine());
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Feed engine listening');
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    server.close(() => {
      Promise.all([closeQueues(), redis.quit()])
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start feed engine');
  process.exit(1);
});
