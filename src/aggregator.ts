import type { MetricsCacheStore } from './cache.js';
import type { CardinalityEstimator, EstimatorFactory } from './cardinality.js';
import type { IdempotencyGuard } from './idempotency.js';
import { KeyedLock } from './lock.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { combineTotals, emptyTotals, toSnapshot, zeroCounters, type Totals } from './totals.js';
import type {
  Counters,
  EngagementEvent,
  HistoricalRecord,
  IngestOutcome,
  MetricsSnapshot,
  WindowCheckpoint,
  WindowState,
} from './types.js';
import { windowKeyOf, windowStartOf } from './utils.js';
import { Watermark } from './watermark.js';

/**
 * Running totals for one (video_id, window_start). Counters only grow while the
 * window accepts events; `version` bumps on every fold so a commit can tell
 * whether it persisted the latest state.
 */
export class WindowAggregate {
  readonly counters: Counters;
  version: number;

  constructor(
    readonly videoId: string,
    readonly windowStart: number,
    readonly windowEnd: number,
    readonly users: CardinalityEstimator,
    readonly countries: CardinalityEstimator,
    counters: Counters = zeroCounters(),
    version = 0,
  ) {
    this.counters = { ...counters };
    this.version = version;
  }

  static empty = (videoId: string, windowStart: number, windowEnd: number, estimators: EstimatorFactory): WindowAggregate => {
    return new WindowAggregate(videoId, windowStart, windowEnd, estimators.create(), estimators.create());
  };

  static fromCheckpoint = (checkpoint: WindowCheckpoint, estimators: EstimatorFactory): WindowAggregate => {
    const { views, likes, comments, shares, watch_time } = checkpoint;
    return new WindowAggregate(
      checkpoint.video_id,
      checkpoint.window_start,
      checkpoint.window_end,
      estimators.restore(checkpoint.user_sketch),
      estimators.restore(checkpoint.country_sketch),
      { views, likes, comments, shares, watch_time },
      checkpoint.version,
    );
  };

  fold = (event: EngagementEvent): void => {
    switch (event.event_type) {
      case 'view':
        this.counters.views++;
        break;
      case 'like':
        this.counters.likes++;
        break;
      case 'comment':
        this.counters.comments++;
        break;
      case 'share':
        this.counters.shares++;
        break;
    }
    this.counters.watch_time += event.watch_time_seconds ?? 0;
    if (event.user_id !== undefined) this.users.add(event.user_id);
    if (event.country_code !== undefined) this.countries.add(event.country_code);
    this.version++;
  };

  totals = (): Totals => ({
    counters: { ...this.counters },
    users: this.users,
    countries: this.countries,
  });

  toRecord = (committedAt: number): HistoricalRecord => ({
    video_id: this.videoId,
    window_start: this.windowStart,
    window_end: this.windowEnd,
    version: this.version,
    ...this.counters,
    unique_users: this.users.estimate(),
    countries_reached: this.countries.estimate(),
    user_sketch: this.users.serialize(),
    country_sketch: this.countries.serialize(),
    committed_at: committedAt,
  });

  toCheckpoint = (): WindowCheckpoint => ({
    video_id: this.videoId,
    window_start: this.windowStart,
    window_end: this.windowEnd,
    version: this.version,
    ...this.counters,
    user_sketch: this.users.serialize(),
    country_sketch: this.countries.serialize(),
  });
}

// Handle given to the reconciler when a window closes
export type ClosedWindow = {
  key: string;
  videoId: string;
  windowStart: number;
  windowEnd: number;
};

export type CommitCandidate = {
  record: HistoricalRecord;
  version: number;
};

/** Read-only view of in-memory state used by the query service */
export interface LiveWindowReader {
  knowsVideo(videoId: string): boolean;
  liveSnapshot(videoId: string): { snapshot: MetricsSnapshot; lastUpdated: number } | null;
  /**
   * Every window still held in memory with window_start in [startSec, endSec), keyed by
   * window_start. Flushed windows are included: they are frozen and match their durable row.
   */
  heldWindows(videoId: string, startSec: number, endSec: number): Map<number, Totals>;
  activeVideos(): string[];
}

/** What the reconciler needs from the owner of window state */
export interface WindowLedger {
  closedWindows(): ClosedWindow[];
  commitCandidate(key: string, committedAt: number): CommitCandidate | null;
  markFlushed(key: string, version: number): boolean;
}

export type AggregatorStats = {
  accepted: number;
  duplicates: number;
  droppedLate: number;
  rejected: number;
  cacheWriteFailures: number;
  openWindows: number;
  closedWindows: number;
  flushedWindows: number;
};

export type WindowAggregatorOptions = {
  windowSizeSec: number;
  allowedLatenessSec: number;
  gracePeriodSec: number;
  cacheTtlSec: number;
  guard: IdempotencyGuard;
  cache: MetricsCacheStore;
  estimators: EstimatorFactory;
  logger?: Logger;
};

type WindowEntry = {
  aggregate: WindowAggregate;
  state: WindowState;
};

type CloseListener = (window: ClosedWindow) => void;

/**
 * WindowAggregator owns every in-memory window and drives its lifecycle open -> closed -> flushed.
 * @method ingest: classifies an event as accepted, duplicate, dropped_late or rejected and folds accepted ones
 * @method onWindowClosed: registers the hand-off target for windows passed by the watermark
 * @method checkpoint: closed-but-unflushed windows for crash recovery
 * @method restore: re-hydrates checkpointed windows as closed and hands them off again
 */
export class WindowAggregator implements LiveWindowReader, WindowLedger {
  private readonly windows = new Map<string, WindowEntry>();
  private readonly byVideo = new Map<string, Set<string>>();
  private readonly openByEnd = new Map<number, Set<string>>();
  private readonly lastUpdated = new Map<string, number>();
  private readonly watermark: Watermark;
  private readonly videoLocks = new KeyedLock();
  private readonly listeners: CloseListener[] = [];
  private readonly logger: Logger;
  private readonly counts = { accepted: 0, duplicates: 0, droppedLate: 0, rejected: 0, cacheWriteFailures: 0 };

  constructor(private readonly options: WindowAggregatorOptions) {
    this.watermark = new Watermark(options.allowedLatenessSec);
    this.logger = (options.logger ?? rootLogger).child({ component: 'aggregator' });
  }

  onWindowClosed = (listener: CloseListener): void => {
    this.listeners.push(listener);
  };

  currentWatermark = (): number => this.watermark.current();

  /**
   * Folds one event. Everything up to and including the fold runs synchronously, so it
   * is atomic with respect to other ingests; the cache write that follows is serialized
   * per video and always carries the state as of its own turn.
   */
  ingest = async (event: EngagementEvent): Promise<IngestOutcome> => {
    const outcome = this.apply(event);
    if (outcome === 'accepted') {
      await this.publish(event.video_id);
    }
    return outcome;
  };

  /** Moves the watermark without an event, e.g. from a transport heartbeat */
  advanceTo = (ingestSec: number): void => {
    if (this.watermark.observe(ingestSec)) {
      this.onWatermarkAdvanced();
    }
  };

  stats = (): AggregatorStats => {
    let open = 0;
    let closed = 0;
    let flushed = 0;
    for (const entry of this.windows.values()) {
      if (entry.state === 'open') open++;
      else if (entry.state === 'closed') closed++;
      else flushed++;
    }
    return { ...this.counts, openWindows: open, closedWindows: closed, flushedWindows: flushed };
  };

  windowState = (videoId: string, windowStart: number): WindowState | undefined => {
    return this.windows.get(windowKeyOf(videoId, windowStart))?.state;
  };

  // LiveWindowReader

  knowsVideo = (videoId: string): boolean => this.byVideo.has(videoId);

  liveSnapshot = (videoId: string): { snapshot: MetricsSnapshot; lastUpdated: number } | null => {
    const keys = this.byVideo.get(videoId);
    if (!keys || keys.size === 0) return null;

    let totals = emptyTotals(this.options.estimators);
    for (const key of keys) {
      const entry = this.windows.get(key);
      if (entry) totals = combineTotals(totals, entry.aggregate.totals());
    }
    return { snapshot: toSnapshot(totals), lastUpdated: this.lastUpdated.get(videoId) ?? 0 };
  };

  heldWindows = (videoId: string, startSec: number, endSec: number): Map<number, Totals> => {
    const held = new Map<number, Totals>();
    for (const key of this.byVideo.get(videoId) ?? []) {
      const entry = this.windows.get(key);
      if (!entry) continue;
      const { windowStart } = entry.aggregate;
      if (windowStart >= startSec && windowStart < endSec) {
        held.set(windowStart, entry.aggregate.totals());
      }
    }
    return held;
  };

  activeVideos = (): string[] => [...this.byVideo.keys()];

  // WindowLedger

  closedWindows = (): ClosedWindow[] => {
    const closed: ClosedWindow[] = [];
    for (const [key, entry] of this.windows) {
      if (entry.state === 'closed') closed.push(this.handleFor(key, entry.aggregate));
    }
    return closed;
  };

  commitCandidate = (key: string, committedAt: number): CommitCandidate | null => {
    const entry = this.windows.get(key);
    if (!entry || entry.state === 'open') return null;
    return { record: entry.aggregate.toRecord(committedAt), version: entry.aggregate.version };
  };

  /**
   * Acknowledges a durable commit. Only succeeds when the committed version is still the
   * latest; a late event folded in meanwhile keeps the window closed for another commit.
   */
  markFlushed = (key: string, version: number): boolean => {
    const entry = this.windows.get(key);
    if (!entry || entry.aggregate.version !== version) return false;
    if (entry.state === 'flushed') return true;
    if (entry.state !== 'closed') return false;

    entry.state = 'flushed';
    if (this.isPastGrace(entry.aggregate.windowEnd)) {
      this.release(key, entry);
    }
    return true;
  };

  // Recovery

  checkpoint = (): WindowCheckpoint[] => {
    const checkpoints: WindowCheckpoint[] = [];
    for (const entry of this.windows.values()) {
      if (entry.state === 'closed') checkpoints.push(entry.aggregate.toCheckpoint());
    }
    return checkpoints;
  };

  /** @returns number of windows restored */
  restore = (checkpoints: WindowCheckpoint[]): number => {
    let restored = 0;
    for (const checkpoint of checkpoints) {
      const key = windowKeyOf(checkpoint.video_id, checkpoint.window_start);
      if (this.windows.has(key)) continue;

      const aggregate = WindowAggregate.fromCheckpoint(checkpoint, this.options.estimators);
      this.track(key, { aggregate, state: 'closed' });
      this.emitClosed(key, aggregate);
      restored++;
    }
    if (restored > 0) {
      this.logger.info('Restored closed windows from checkpoint', { restored });
    }
    return restored;
  };

  private apply(event: EngagementEvent): IngestOutcome {
    this.advanceTo(event.ingest_timestamp);

    const { windowSizeSec, guard } = this.options;
    const windowStart = windowStartOf(event.event_timestamp, windowSizeSec);
    const windowEnd = windowStart + windowSizeSec;
    const key = windowKeyOf(event.video_id, windowStart);
    const existing = this.windows.get(key);

    if (existing?.state === 'flushed' || this.isPastGrace(windowEnd)) {
      this.counts.droppedLate++;
      this.logger.debug('Dropped late event', {
        videoId: event.video_id,
        windowStart,
        watermark: this.watermark.current(),
      });
      return 'dropped_late';
    }

    // the guard only spans one window ahead of the ingest clock
    const aheadLimit = this.watermark.latestIngest() + windowSizeSec;
    if (event.event_timestamp > aheadLimit) {
      return this.reject(event, aheadLimit);
    }

    if (guard.seen(event.identity_key, event.event_timestamp)) {
      this.counts.duplicates++;
      return 'duplicate';
    }
    if (!guard.remember(event.identity_key, event.event_timestamp)) {
      return this.reject(event, aheadLimit);
    }

    const entry = existing ?? this.createWindow(key, event.video_id, windowStart, windowEnd);
    entry.aggregate.fold(event);
    this.counts.accepted++;
    this.lastUpdated.set(event.video_id, Math.max(this.lastUpdated.get(event.video_id) ?? 0, event.ingest_timestamp));

    // a window opened behind the watermark is already closed; hand it off once it holds data
    if (!existing && entry.state === 'closed') {
      this.emitClosed(key, entry.aggregate);
    }
    return 'accepted';
  }

  private reject(event: EngagementEvent, aheadLimit: number): IngestOutcome {
    this.counts.rejected++;
    this.logger.warn('Rejected event outside the deduplication horizon', {
      videoId: event.video_id,
      eventTimestamp: event.event_timestamp,
      ingestTimestamp: event.ingest_timestamp,
      aheadLimit,
    });
    return 'rejected';
  }

  private createWindow(key: string, videoId: string, windowStart: number, windowEnd: number): WindowEntry {
    const aggregate = WindowAggregate.empty(videoId, windowStart, windowEnd, this.options.estimators);
    const state: WindowState = windowEnd <= this.watermark.current() ? 'closed' : 'open';
    const entry: WindowEntry = { aggregate, state };
    this.track(key, entry);
    return entry;
  }

  private track(key: string, entry: WindowEntry): void {
    this.windows.set(key, entry);

    const { videoId, windowEnd } = entry.aggregate;
    let videoKeys = this.byVideo.get(videoId);
    if (!videoKeys) {
      videoKeys = new Set();
      this.byVideo.set(videoId, videoKeys);
    }
    videoKeys.add(key);

    if (entry.state === 'open') {
      let ending = this.openByEnd.get(windowEnd);
      if (!ending) {
        ending = new Set();
        this.openByEnd.set(windowEnd, ending);
      }
      ending.add(key);
    }
  }

  private release(key: string, entry: WindowEntry): void {
    this.windows.delete(key);
    const { videoId } = entry.aggregate;
    const videoKeys = this.byVideo.get(videoId);
    videoKeys?.delete(key);
    if (videoKeys && videoKeys.size === 0) {
      this.byVideo.delete(videoId);
      this.lastUpdated.delete(videoId);
    }
  }

  private onWatermarkAdvanced(): void {
    const watermark = this.watermark.current();

    for (const [windowEnd, keys] of this.openByEnd) {
      if (windowEnd > watermark) continue;
      this.openByEnd.delete(windowEnd);
      for (const key of keys) {
        const entry = this.windows.get(key);
        if (!entry || entry.state !== 'open') continue;
        entry.state = 'closed';
        this.emitClosed(key, entry.aggregate);
      }
    }

    // flushed windows are kept for the rolling snapshot until their grace period ends
    for (const [key, entry] of this.windows) {
      if (entry.state === 'flushed' && this.isPastGrace(entry.aggregate.windowEnd)) {
        this.release(key, entry);
      }
    }

    const { gracePeriodSec, windowSizeSec, guard } = this.options;
    guard.expireBefore(watermark - gracePeriodSec - windowSizeSec);
  }

  private isPastGrace(windowEnd: number): boolean {
    return windowEnd + this.options.gracePeriodSec < this.watermark.current();
  }

  private handleFor(key: string, aggregate: WindowAggregate): ClosedWindow {
    return {
      key,
      videoId: aggregate.videoId,
      windowStart: aggregate.windowStart,
      windowEnd: aggregate.windowEnd,
    };
  }

  private emitClosed(key: string, aggregate: WindowAggregate): void {
    const handle = this.handleFor(key, aggregate);
    for (const listener of this.listeners) {
      listener(handle);
    }
  }

  // write-through: the snapshot is taken inside the per-video turn, after the fold
  private publish(videoId: string): Promise<void> {
    return this.videoLocks.run(videoId, async () => {
      const live = this.liveSnapshot(videoId);
      if (!live) return;
      try {
        await this.options.cache.put(videoId, live.snapshot, this.options.cacheTtlSec);
      } catch (error) {
        this.counts.cacheWriteFailures++;
        this.logger.warn('Skipped cache write', {
          videoId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }
}
