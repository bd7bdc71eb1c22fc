import 'dotenv/config';
import { loadConfig } from './config';
import { createStore } from './db';
import { HttpClient } from './http';
import { createLogger } from './logger';
import { steamCollectors, trackGames } from './tracker';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const store = createStore(config.db, logger);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    store.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Failed to close store');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  logger.info({ env: config.nodeEnv, driver: config.db.driver, games: config.games.length }, 'Steam stats tracker started');

  try {
    await store.ensureSchema(config.games);
    const http = new HttpClient({ timeoutMs: config.requestTimeoutMs });
    await trackGames(config.games, {
      store,
      logger,
      collectors: steamCollectors({ http, logger, apiKey: config.steamApiKey }),
      concurrency: config.collectorConcurrency,
    });
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
