/**
 * Durable store rejected a window commit after the retry budget was spent.
 * The window stays closed in memory and is retried by the next sweep.
 */
export class CommitFailureError extends Error {
  constructor(
    readonly windowKey: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`Commit of window ${windowKey} failed after ${attempts} attempt(s)`, { cause });
    this.name = 'CommitFailureError';
  }
}

/** Cache could not be read or written; callers treat it as a miss or a skipped write. */
export class CacheUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CacheUnavailableError';
  }
}

export class InvalidRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class VideoNotFoundError extends Error {
  constructor(readonly videoId: string) {
    super(`No metrics found for video ${videoId}`);
    this.name = 'VideoNotFoundError';
  }
}

/** Historical reads could not reach the durable store. */
export class StoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}
