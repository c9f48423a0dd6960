import { createApp } from './app.js';
import { createConfigValidator, getConfig } from './config/env.js';
import { scoringOptionsFromEnv } from './config/scoring.config.js';
import { createContainer } from './container.js';
import { logger } from './lib/logger/structured-logger.js';
import { closeRedisClient } from './lib/redis/redis-client.js';

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  // Fatal before listening: bad env or scoring weights must prevent start
  const config = getConfig();
  createConfigValidator(config).validateOrThrow(logger);
  const scoringOptions = scoringOptionsFromEnv();

  const container = await createContainer(config, scoringOptions, logger);
  const app = createApp(container.appDeps);
  container.resetJob?.start();

  const server = app.listen(config.port, () => {
    logger.info({ event: 'server_started', port: config.port, env: config.env }, `Server listening on http://localhost:${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: 'shutdown_started', signal }, `Received ${signal}. Shutting down gracefully...`);

    container.resetJob?.stop();
    const forceExit = setTimeout(() => {
      logger.error({ event: 'shutdown_forced' }, 'Graceful shutdown timed out');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    forceExit.unref();

    server.close(() => {
      container.notifier.drain()
        .then(() => closeRedisClient())
        .then(() => {
          logger.info({ event: 'shutdown_complete' }, 'Server closed');
          process.exit(0);
        })
        .catch(err => {
          logger.error({ event: 'shutdown_error', error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  logger.fatal({
    event: 'startup_failed',
    error: err instanceof Error ? err.message : String(err)
  }, 'Server failed to start');
  process.exit(1);
});
