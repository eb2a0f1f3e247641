/**
 * Event-time progress clock: `max(ingest_timestamp seen) - allowedLateness`.
 * Never moves backwards, whatever order ingest timestamps arrive in.
 */
export class Watermark {
  private maxIngestSec = Number.NEGATIVE_INFINITY;

  constructor(private readonly allowedLatenessSec: number) {}

  /**
   * Folds in an ingest timestamp
   * @returns true when the watermark advanced
   */
  observe = (ingestSec: number): boolean => {
    if (ingestSec <= this.maxIngestSec) return false;
    this.maxIngestSec = ingestSec;
    return true;
  };

  current = (): number => this.maxIngestSec - this.allowedLatenessSec;

  /** Highest processing time seen, -Infinity before the first event */
  latestIngest = (): number => this.maxIngestSec;
}
