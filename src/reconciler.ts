import type { ClosedWindow, WindowLedger } from './aggregator.js';
import { CommitFailureError } from './errors.js';
import type { HistoricalStore } from './historical.js';
import { KeyedLock } from './lock.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { RetryExhaustedError, withRetry } from './retry.js';
import { nowSec } from './utils.js';

export type CommitResult = 'flushed' | 'superseded' | 'skipped';

export type ReconcilerOptions = {
  batchSize: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs?: number;
  /** Upper bound for one upsert attempt */
  commitTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
};

export type ReconcilerStats = {
  pending: number;
  committed: number;
  failed: number;
  stuck: string[];
};

/**
 * BatchReconciler folds closed windows into the durable store.
 * Windows arrive by push (`enqueue`, wired to the aggregator's close hand-off) and by
 * pull (`sweep`, which re-scans the ledger for anything still unflushed). Commits are
 * upserts that overwrite, so redelivering a window never double counts.
 * @method commit: upserts one window with retries and acknowledges it
 * @method flush: commits pending windows in batches of `batchSize`
 * @method sweep: re-queues every closed window the ledger still holds
 */
export class BatchReconciler {
  private readonly pending = new Set<string>();
  private readonly stuck = new Set<string>();
  private readonly keyLocks = new KeyedLock();
  private readonly logger: Logger;
  private readonly now: () => number;
  private committed = 0;
  private failed = 0;
  private flushing: Promise<void> | null = null;

  constructor(
    private readonly store: HistoricalStore,
    private readonly ledger: WindowLedger,
    private readonly options: ReconcilerOptions,
  ) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'reconciler' });
    this.now = options.now ?? nowSec;
  }

  enqueue = (window: ClosedWindow): void => {
    this.pending.add(window.key);
  };

  /** @returns number of windows newly queued */
  sweep = (): number => {
    let queued = 0;
    for (const window of this.ledger.closedWindows()) {
      if (!this.pending.has(window.key)) {
        this.pending.add(window.key);
        queued++;
      }
    }
    return queued;
  };

  /**
   * Commits a single window. Concurrent commits of the same key are linearized.
   * @throws CommitFailureError when the retry budget is exhausted; the window stays closed
   */
  commit = (window: ClosedWindow): Promise<CommitResult> => {
    return this.keyLocks.run(window.key, async () => {
      const candidate = this.ledger.commitCandidate(window.key, this.now());
      if (!candidate) return 'skipped';

      try {
        await this.upsertWithRetry([candidate.record], window.key);
      } catch (error) {
        if (error instanceof CommitFailureError) {
          this.markStuck([window.key], error);
        }
        throw error;
      }
      return this.acknowledge(window.key, candidate.version);
    });
  };

  /**
   * Commits everything pending. Overlapping calls share the run in progress.
   * Failed batches stay pending and are logged as stuck; nothing is discarded.
   */
  flush = (): Promise<void> => {
    if (!this.flushing) {
      this.flushing = this.drain().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  };

  stats = (): ReconcilerStats => ({
    pending: this.pending.size,
    committed: this.committed,
    failed: this.failed,
    stuck: [...this.stuck],
  });

  private async drain(): Promise<void> {
    const keys = [...this.pending];
    for (let offset = 0; offset < keys.length; offset += this.options.batchSize) {
      const batch = keys.slice(offset, offset + this.options.batchSize).sort();
      await this.withKeys(batch, () => this.commitBatch(batch));
    }
  }

  private async commitBatch(keys: string[]): Promise<void> {
    const committedAt = this.now();
    const candidates = keys.flatMap((key) => {
      const candidate = this.ledger.commitCandidate(key, committedAt);
      if (!candidate) {
        // released or never closed: nothing left to commit
        this.pending.delete(key);
        return [];
      }
      return [{ key, ...candidate }];
    });
    if (candidates.length === 0) return;

    const batchLabel = `${candidates.length} window(s) starting at ${candidates[0]?.key ?? ''}`;
    try {
      await this.upsertWithRetry(
        candidates.map((candidate) => candidate.record),
        batchLabel,
      );
    } catch (error) {
      if (!(error instanceof CommitFailureError)) throw error;
      this.markStuck(
        candidates.map((candidate) => candidate.key),
        error,
      );
      return;
    }

    for (const { key, version } of candidates) {
      this.acknowledge(key, version);
    }
  }

  // holds every key's lock, so a batch never interleaves with a single commit of the same window
  private withKeys(keys: string[], task: () => Promise<void>): Promise<void> {
    const [first, ...rest] = keys;
    if (first === undefined) return task();
    return this.keyLocks.run(first, () => this.withKeys(rest, task));
  }

  private markStuck(keys: string[], error: CommitFailureError): void {
    for (const key of keys) {
      this.stuck.add(key);
      this.pending.add(key);
    }
    this.logger.error('Commit retries exhausted, windows kept in memory for the next sweep', error, {
      windows: keys,
      attempts: error.attempts,
    });
  }

  private acknowledge(key: string, version: number): CommitResult {
    this.stuck.delete(key);
    if (this.ledger.markFlushed(key, version)) {
      this.pending.delete(key);
      this.committed++;
      return 'flushed';
    }
    // a late event landed during the commit; commit again on the next flush
    this.pending.add(key);
    return 'superseded';
  }

  private async upsertWithRetry(records: Parameters<HistoricalStore['upsert']>[0], label: string): Promise<void> {
    try {
      await withRetry(() => this.store.upsert(records), {
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs,
        attemptTimeoutMs: this.options.commitTimeoutMs,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn('Commit attempt failed, retrying', {
            target: label,
            attempt,
            delayMs: Math.round(delayMs),
            error: error instanceof Error ? error.message : String(error),
          });
        },
      });
    } catch (error) {
      this.failed++;
      if (error instanceof RetryExhaustedError) {
        throw new CommitFailureError(label, error.attempts, error.lastError);
      }
      throw new CommitFailureError(label, 1, error);
    }
  }
}
