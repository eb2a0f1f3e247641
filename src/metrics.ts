import type { LiveWindowReader } from './aggregator.js';
import type { MetricsCacheStore } from './cache.js';
import type { EstimatorFactory } from './cardinality.js';
import { InvalidRangeError, StoreUnavailableError, VideoNotFoundError } from './errors.js';
import type { HistoricalStore } from './historical.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { combineTotals, emptyTotals, toSnapshot, totalsFromRecord } from './totals.js';
import type { CurrentMetrics, HistoricalMetrics, HistoricalRecord, MetricsSnapshot, VideoMetrics } from './types.js';
import { averageWatchTime, engagementRate, toIsoString } from './utils.js';

export const toVideoMetrics = (videoId: string, snapshot: MetricsSnapshot, lastUpdated: number | null): VideoMetrics => ({
  video_id: videoId,
  ...snapshot,
  engagement_rate: engagementRate(snapshot.likes, snapshot.views),
  avg_watch_time: averageWatchTime(snapshot.watch_time, snapshot.views),
  last_updated: lastUpdated === null ? null : toIsoString(lastUpdated),
});

export type MetricsQueryServiceOptions = {
  cache: MetricsCacheStore;
  store: HistoricalStore;
  live: LiveWindowReader;
  estimators: EstimatorFactory;
  logger?: Logger;
};

/**
 * MetricsQueryService answers read requests. It never writes to the cache or the store.
 * @method getCurrent: cache first, then in-memory state, then the latest durable window
 * @method getHistorical: durable windows in range plus windows held in memory, each counted once
 * @method getTrending: live videos ranked by engagement rate
 */
export class MetricsQueryService {
  private readonly logger: Logger;

  constructor(private readonly options: MetricsQueryServiceOptions) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'query' });
  }

  /**
   * @throws VideoNotFoundError when neither cache, memory nor history knows the video
   */
  getCurrent = async (videoId: string): Promise<CurrentMetrics> => {
    const { cache, live } = this.options;

    try {
      const entry = await cache.get(videoId);
      if (entry) {
        return { ...toVideoMetrics(videoId, entry.snapshot, entry.last_updated), source: 'cache' };
      }
    } catch (error) {
      this.logger.warn('Cache read failed, falling back', { videoId, error: describe(error) });
    }

    const current = live.liveSnapshot(videoId);
    if (current) {
      return { ...toVideoMetrics(videoId, current.snapshot, current.lastUpdated), source: 'live' };
    }

    const latest = await this.latestRecord(videoId);
    if (latest) {
      const totals = totalsFromRecord(latest, this.options.estimators);
      return { ...toVideoMetrics(videoId, toSnapshot(totals), latest.committed_at), source: 'history' };
    }

    throw new VideoNotFoundError(videoId);
  };

  /**
   * Sums every window with window_start in [startSec, endSec). A window still held in
   * memory is taken from the live aggregate and its durable row, if one exists, is
   * ignored. Memory is read on both sides of the durable read, so a window committed
   * and released while the read is in flight is still counted from one side.
   * @throws InvalidRangeError on an empty or inverted range
   * @throws VideoNotFoundError when no window of the video exists in range or anywhere else
   * @throws StoreUnavailableError when the durable store cannot be read
   */
  getHistorical = async (videoId: string, startSec: number, endSec: number): Promise<HistoricalMetrics> => {
    if (!Number.isFinite(startSec) || !Number.isFinite(endSec) || startSec >= endSec) {
      throw new InvalidRangeError('start_time must be before end_time');
    }
    const { store, live, estimators } = this.options;

    const heldBefore = live.heldWindows(videoId, startSec, endSec);
    let records: HistoricalRecord[];
    try {
      records = await store.range(videoId, startSec, endSec);
    } catch (error) {
      throw new StoreUnavailableError(`Historical read failed for ${videoId}`, error);
    }
    const held = live.heldWindows(videoId, startSec, endSec);
    for (const [windowStart, totals] of heldBefore) {
      if (!held.has(windowStart)) held.set(windowStart, totals);
    }

    const durable = records.filter((record) => !held.has(record.window_start));

    let totals = emptyTotals(estimators);
    for (const record of durable) {
      totals = combineTotals(totals, totalsFromRecord(record, estimators));
    }
    for (const windowTotals of held.values()) {
      totals = combineTotals(totals, windowTotals);
    }

    const windows = durable.length + held.size;
    if (windows === 0 && !live.knowsVideo(videoId) && !(await this.latestRecord(videoId))) {
      throw new VideoNotFoundError(videoId);
    }

    const lastCommitted = durable.reduce<number | null>(
      (latest, record) => (latest === null ? record.committed_at : Math.max(latest, record.committed_at)),
      null,
    );
    const lastUpdated = held.size > 0 ? live.liveSnapshot(videoId)?.lastUpdated ?? lastCommitted : lastCommitted;

    return {
      ...toVideoMetrics(videoId, toSnapshot(totals), lastUpdated),
      start_time: toIsoString(startSec),
      end_time: toIsoString(endSec),
      windows,
    };
  };

  getTrending = (limit: number): VideoMetrics[] => {
    const { live } = this.options;
    const ranked: VideoMetrics[] = [];
    for (const videoId of live.activeVideos()) {
      const current = live.liveSnapshot(videoId);
      if (current) ranked.push(toVideoMetrics(videoId, current.snapshot, current.lastUpdated));
    }
    return ranked
      .sort((a, b) => b.engagement_rate - a.engagement_rate || b.views - a.views || a.video_id.localeCompare(b.video_id))
      .slice(0, limit);
  };

  // durable failures on this path degrade to "nothing known"
  private async latestRecord(videoId: string): Promise<HistoricalRecord | null> {
    try {
      const [latest] = await this.options.store.latest(videoId, 1);
      return latest ?? null;
    } catch (error) {
      this.logger.warn('Historical read failed', { videoId, error: describe(error) });
      return null;
    }
  }
}

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));
