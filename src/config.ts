import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  WINDOW_SIZE_SECONDS: positiveInt(300),
  ALLOWED_LATENESS_SECONDS: nonNegativeInt(60),
  GRACE_PERIOD_SECONDS: z.coerce.number().int().min(0).optional(),
  CACHE_TTL_SECONDS: positiveInt(3600),
  CACHE_KEY_PREFIX: z.string().min(1).default('metrics'),

  BATCH_SIZE: positiveInt(1000),
  MAX_RETRIES: nonNegativeInt(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(100),
  COMMIT_TIMEOUT_MS: positiveInt(10000),
  DB_CONNECT_TIMEOUT_MS: positiveInt(5000),
  FLUSH_INTERVAL_MS: positiveInt(5000),
  CHECKPOINT_INTERVAL_MS: positiveInt(30000),

  CARDINALITY_EXACT_THRESHOLD: positiveInt(1000),
  HLL_PRECISION: z.coerce.number().int().min(4).max(16).default(12),

  REDIS_URL: z.string().url().optional(),
  DATABASE_URL: z.string().min(1).optional(),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export type AppConfig = {
  port: number;
  env: string;
  logLevel: LogLevel;
  windowSizeSec: number;
  allowedLatenessSec: number;
  gracePeriodSec: number;
  cacheTtlSec: number;
  cacheKeyPrefix: string;
  batchSize: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  commitTimeoutMs: number;
  dbConnectTimeoutMs: number;
  flushIntervalMs: number;
  checkpointIntervalMs: number;
  cardinalityExactThreshold: number;
  hllPrecision: number;
  redisUrl?: string;
  databaseUrl?: string;
};

/**
 * Parses configuration from an environment map.
 * @throws Error listing every invalid variable
 */
export const loadConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    env: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    windowSizeSec: vars.WINDOW_SIZE_SECONDS,
    allowedLatenessSec: vars.ALLOWED_LATENESS_SECONDS,
    // grace defaults to the lateness allowance
    gracePeriodSec: vars.GRACE_PERIOD_SECONDS ?? vars.ALLOWED_LATENESS_SECONDS,
    cacheTtlSec: vars.CACHE_TTL_SECONDS,
    cacheKeyPrefix: vars.CACHE_KEY_PREFIX,
    batchSize: vars.BATCH_SIZE,
    maxRetries: vars.MAX_RETRIES,
    retryBaseDelayMs: vars.RETRY_BASE_DELAY_MS,
    commitTimeoutMs: vars.COMMIT_TIMEOUT_MS,
    dbConnectTimeoutMs: vars.DB_CONNECT_TIMEOUT_MS,
    flushIntervalMs: vars.FLUSH_INTERVAL_MS,
    checkpointIntervalMs: vars.CHECKPOINT_INTERVAL_MS,
    cardinalityExactThreshold: vars.CARDINALITY_EXACT_THRESHOLD,
    hllPrecision: vars.HLL_PRECISION,
    redisUrl: vars.REDIS_URL,
    databaseUrl: vars.DATABASE_URL,
  };
};

export const config = loadConfig(process.env);
