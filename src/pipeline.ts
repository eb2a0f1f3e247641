import { WindowAggregator } from './aggregator.js';
import type { MetricsCacheStore } from './cache.js';
import { adaptiveEstimators, type EstimatorFactory } from './cardinality.js';
import type { AppConfig } from './config.js';
import { toEngagementEvent } from './events.js';
import type { CheckpointStore, HistoricalStore } from './historical.js';
import { IdempotencyGuard } from './idempotency.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { MetricsQueryService } from './metrics.js';
import { BatchReconciler } from './reconciler.js';
import type { HistoricalRecord, InboundEvent, IngestOutcome, WindowCheckpoint } from './types.js';
import { nowSec, windowKeyOf } from './utils.js';

export type PipelineSettings = Pick<
  AppConfig,
  | 'windowSizeSec'
  | 'allowedLatenessSec'
  | 'gracePeriodSec'
  | 'cacheTtlSec'
  | 'batchSize'
  | 'maxRetries'
  | 'retryBaseDelayMs'
  | 'commitTimeoutMs'
  | 'flushIntervalMs'
  | 'checkpointIntervalMs'
  | 'cardinalityExactThreshold'
  | 'hllPrecision'
>;

export type PipelineDeps = {
  settings: PipelineSettings;
  cache: MetricsCacheStore;
  store: HistoricalStore;
  checkpoints: CheckpointStore;
  estimators?: EstimatorFactory;
  now?: () => number;
  logger?: Logger;
};

/**
 * Wires guard, aggregator, cache, reconciler and query service together and runs the
 * periodic work. Recovery policy: closed-but-unflushed windows are checkpointed on an
 * interval and on stop, and restored as closed on start unless the durable store already
 * holds a newer version. Open windows are not checkpointed. POST /events acknowledges
 * before any durable write, so events in open windows are lost on a crash for that path;
 * only a transport that redelivers unacknowledged events rebuilds them.
 */
export class MetricsPipeline {
  readonly guard: IdempotencyGuard;
  readonly aggregator: WindowAggregator;
  readonly reconciler: BatchReconciler;
  readonly query: MetricsQueryService;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timers: NodeJS.Timeout[] = [];

  constructor(private readonly deps: PipelineDeps) {
    const { settings, cache, store } = deps;
    const estimators = deps.estimators ?? adaptiveEstimators(settings.cardinalityExactThreshold, settings.hllPrecision);
    this.logger = (deps.logger ?? rootLogger).child({ component: 'pipeline' });
    this.now = deps.now ?? nowSec;

    this.guard = IdempotencyGuard.forWindows(settings.windowSizeSec, settings.allowedLatenessSec, settings.gracePeriodSec);
    this.aggregator = new WindowAggregator({
      windowSizeSec: settings.windowSizeSec,
      allowedLatenessSec: settings.allowedLatenessSec,
      gracePeriodSec: settings.gracePeriodSec,
      cacheTtlSec: settings.cacheTtlSec,
      guard: this.guard,
      cache,
      estimators,
      logger: deps.logger,
    });
    this.reconciler = new BatchReconciler(store, this.aggregator, {
      batchSize: settings.batchSize,
      maxRetries: settings.maxRetries,
      retryBaseDelayMs: settings.retryBaseDelayMs,
      commitTimeoutMs: settings.commitTimeoutMs,
      now: this.now,
      logger: deps.logger,
    });
    this.aggregator.onWindowClosed(this.reconciler.enqueue);
    this.query = new MetricsQueryService({ cache, store, live: this.aggregator, estimators, logger: deps.logger });
  }

  /** Stamps the arrival time and hands the event to the aggregator */
  ingest = (event: InboundEvent, ingestTimestamp: number = this.now()): Promise<IngestOutcome> => {
    return this.aggregator.ingest(toEngagementEvent(event, ingestTimestamp));
  };

  start = async (): Promise<void> => {
    const checkpoints = await this.unsupersededCheckpoints();
    this.aggregator.restore(checkpoints);

    const { flushIntervalMs, checkpointIntervalMs } = this.deps.settings;
    this.timers = [
      setInterval(() => void this.flushOnce(), flushIntervalMs),
      setInterval(() => void this.checkpointOnce(), checkpointIntervalMs),
    ];
    for (const timer of this.timers) timer.unref();
    this.logger.info('Pipeline started', { restored: checkpoints.length, flushIntervalMs, checkpointIntervalMs });
  };

  stop = async (): Promise<void> => {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    await this.flushOnce();
    await this.checkpointOnce();
    this.logger.info('Pipeline stopped', { ...this.aggregator.stats(), ...this.reconciler.stats() });
  };

  /** Re-scans for unflushed windows and commits everything pending */
  flushOnce = async (): Promise<void> => {
    try {
      this.reconciler.sweep();
      await this.reconciler.flush();
    } catch (error) {
      this.logger.error('Flush cycle failed', error);
    }
  };

  // a checkpoint older than its durable row was committed after it was taken
  private async unsupersededCheckpoints(): Promise<WindowCheckpoint[]> {
    const loaded = await this.deps.checkpoints.load();
    const kept: WindowCheckpoint[] = [];
    for (const checkpoint of loaded) {
      const { video_id, window_start } = checkpoint;
      let stored: HistoricalRecord | undefined;
      try {
        [stored] = await this.deps.store.range(video_id, window_start, window_start + 1);
      } catch (error) {
        // the versioned upsert still keeps a newer row in place
        this.logger.warn('Could not compare checkpoint with durable row', {
          window: windowKeyOf(video_id, window_start),
          error: error instanceof Error ? error.message : String(error),
        });
      }
      if (stored && stored.version >= checkpoint.version) {
        this.logger.info('Skipped checkpoint already committed', {
          window: windowKeyOf(video_id, window_start),
          checkpointVersion: checkpoint.version,
          storedVersion: stored.version,
        });
        continue;
      }
      kept.push(checkpoint);
    }
    return kept;
  }

  checkpointOnce = async (): Promise<void> => {
    try {
      const closed = this.aggregator.checkpoint();
      await this.deps.checkpoints.save(closed);
      this.logger.debug('Checkpoint saved', { windows: closed.length });
    } catch (error) {
      this.logger.error('Checkpoint failed', error);
    }
  };
}
