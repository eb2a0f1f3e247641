import { Redis } from 'ioredis';
import { Pool } from 'pg';
import { createApp } from './app.js';
import { InMemoryMetricsCache, RedisMetricsCache, type MetricsCacheStore } from './cache.js';
import { config } from './config.js';
import {
  InMemoryCheckpointStore,
  InMemoryHistoricalStore,
  type CheckpointStore,
  type HistoricalStore,
} from './historical.js';
import { logger } from './logger.js';
import { MetricsPipeline } from './pipeline.js';
import { PostgresCheckpointStore, PostgresHistoricalStore } from './postgres.js';

const buildCache = (): MetricsCacheStore => {
  if (!config.redisUrl) {
    logger.warn('REDIS_URL not set, using in-process cache');
    return new InMemoryMetricsCache();
  }
  const client = new Redis(config.redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
  });
  client.on('error', (error: Error) => logger.warn('Redis client error', { error: error.message }));
  return new RedisMetricsCache(client, config.cacheKeyPrefix);
};

const buildStores = async (): Promise<{ store: HistoricalStore; checkpoints: CheckpointStore }> => {
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set, history is kept in process memory only');
    return { store: new InMemoryHistoricalStore(), checkpoints: new InMemoryCheckpointStore() };
  }
  const pool = new Pool({
    connectionString: config.databaseUrl,
    connectionTimeoutMillis: config.dbConnectTimeoutMs,
    query_timeout: config.commitTimeoutMs,
    statement_timeout: config.commitTimeoutMs,
  });
  pool.on('error', (error: Error) => logger.error('Postgres pool error', error));

  const store = new PostgresHistoricalStore(pool);
  const checkpoints = new PostgresCheckpointStore(pool);
  await store.ensureSchema();
  await checkpoints.ensureSchema();
  return { store, checkpoints };
};

const main = async (): Promise<void> => {
  const cache = buildCache();
  const { store, checkpoints } = await buildStores();
  const pipeline = new MetricsPipeline({ settings: config, cache, store, checkpoints });
  await pipeline.start();

  const app = createApp(pipeline);
  const server = app.listen(config.port, () => {
    logger.info(`Server is running on http://localhost:${config.port}`, {
      windowSizeSec: config.windowSizeSec,
      allowedLatenessSec: config.allowedLatenessSec,
      gracePeriodSec: config.gracePeriodSec,
    });
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pipeline.stop();
    await Promise.all([cache.close(), checkpoints.close(), store.close()]);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        },
      );
    });
  }
};

main().catch((error: unknown) => {
  logger.error('Failed to start', error);
  process.exit(1);
});
