import { z } from 'zod';
import { CacheUnavailableError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { CacheEntry, MetricsSnapshot } from './types.js';
import { nowSec } from './utils.js';

/**
 * Latest rolling snapshot per video. The aggregator is the only writer; TTL is
 * the only eviction. A `null` from `get` is a miss, never an error.
 */
export interface MetricsCacheStore {
  /** @throws CacheUnavailableError */
  put(videoId: string, snapshot: MetricsSnapshot, ttlSec: number): Promise<void>;
  /** @throws CacheUnavailableError */
  get(videoId: string): Promise<CacheEntry | null>;
  close(): Promise<void>;
}

export type Clock = () => number;

export class InMemoryMetricsCache implements MetricsCacheStore {
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly now: Clock = nowSec) {}

  put = async (videoId: string, snapshot: MetricsSnapshot, ttlSec: number): Promise<void> => {
    const lastUpdated = this.now();
    this.entries.set(videoId, {
      video_id: videoId,
      snapshot: structuredClone(snapshot),
      last_updated: lastUpdated,
      expires_at: lastUpdated + ttlSec,
    });
  };

  get = async (videoId: string): Promise<CacheEntry | null> => {
    const entry = this.entries.get(videoId);
    if (!entry) return null;
    if (entry.expires_at <= this.now()) {
      this.entries.delete(videoId);
      return null;
    }
    return structuredClone(entry);
  };

  size = (): number => this.entries.size;

  close = async (): Promise<void> => {
    this.entries.clear();
  };
}

const CacheEntrySchema = z.object({
  video_id: z.string(),
  snapshot: z.object({
    views: z.number(),
    likes: z.number(),
    comments: z.number(),
    shares: z.number(),
    watch_time: z.number(),
    unique_users: z.number(),
    countries_reached: z.number(),
    approximate: z.object({ unique_users: z.boolean(), countries_reached: z.boolean() }),
  }),
  last_updated: z.number(),
  expires_at: z.number(),
});

// The subset of the ioredis client this cache uses
export type RedisCommands = {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  quit(): Promise<unknown>;
};

/**
 * Redis-backed cache. Each video is one string key `<prefix>:<video_id>` holding
 * the JSON entry, written with SETEX so Redis enforces the TTL.
 */
export class RedisMetricsCache implements MetricsCacheStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: RedisCommands,
    private readonly keyPrefix: string,
    private readonly now: Clock = nowSec,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: 'redis-cache' });
  }

  keyFor = (videoId: string): string => `${this.keyPrefix}:${videoId}`;

  put = async (videoId: string, snapshot: MetricsSnapshot, ttlSec: number): Promise<void> => {
    const lastUpdated = this.now();
    const entry: CacheEntry = {
      video_id: videoId,
      snapshot,
      last_updated: lastUpdated,
      expires_at: lastUpdated + ttlSec,
    };
    try {
      await this.client.setex(this.keyFor(videoId), ttlSec, JSON.stringify(entry));
    } catch (error) {
      throw new CacheUnavailableError(`Redis write failed for ${videoId}`, error);
    }
  };

  get = async (videoId: string): Promise<CacheEntry | null> => {
    let raw: string | null;
    try {
      raw = await this.client.get(this.keyFor(videoId));
    } catch (error) {
      throw new CacheUnavailableError(`Redis read failed for ${videoId}`, error);
    }
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Discarding unparseable cache entry', { videoId, error: String(error) });
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn('Discarding malformed cache entry', { videoId, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  };

  close = async (): Promise<void> => {
    await this.client.quit();
  };
}
