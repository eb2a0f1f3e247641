type DedupBucket = {
  index: number; // event-time bucket number this slot holds, -1 when empty
  keys: Set<string>;
};

export type IdempotencyGuardOptions = {
  horizonSec: number; // span of event time that may be live at once, past and ahead of the clock
  bucketSec: number; // event-time width of one ring slot
};

/**
 * IdempotencyGuard remembers identity keys in a ring of event-time buckets, so memory
 * is bounded by the horizon rather than by total traffic. Expiry is by event time:
 * a bucket is dropped once the watermark has moved past it, not when it was last read.
 * @method seen: true if the key was remembered for this event time
 * @method remember: records a key, refusing event times the ring cannot hold without forgetting live keys
 * @method expireBefore: drops every bucket that ends at or before a cutoff
 */
export class IdempotencyGuard {
  private readonly ring: DedupBucket[];
  private readonly bucketSec: number;
  private floorIndex = 0; // buckets below this index have been expired

  constructor(options: IdempotencyGuardOptions) {
    if (options.bucketSec <= 0 || options.horizonSec <= 0) {
      throw new Error('horizonSec and bucketSec must be positive');
    }
    this.bucketSec = options.bucketSec;
    const slots = Math.ceil(options.horizonSec / options.bucketSec) + 1;
    this.ring = Array.from({ length: slots }, () => ({ index: -1, keys: new Set<string>() }));
  }

  /**
   * Horizon spanning the oldest window that may still accept events up to one window
   * ahead of the newest ingest time
   */
  static forWindows = (windowSizeSec: number, allowedLatenessSec: number, gracePeriodSec: number): IdempotencyGuard => {
    return new IdempotencyGuard({
      horizonSec: 2 * windowSizeSec + allowedLatenessSec + gracePeriodSec,
      bucketSec: Math.max(1, Math.ceil(windowSizeSec / 10)),
    });
  };

  seen = (key: string, eventSec: number): boolean => {
    const index = this.indexOf(eventSec);
    const bucket = this.slotFor(index);
    return bucket.index === index && bucket.keys.has(key);
  };

  /**
   * @returns false when the event time is older than what the ring still covers, or
   * its slot is still taken by an unexpired bucket
   */
  remember = (key: string, eventSec: number): boolean => {
    const index = this.indexOf(eventSec);
    if (index < this.floorIndex) return false;

    const bucket = this.slotFor(index);
    if (bucket.index !== index) {
      // slot still holds another unexpired bucket; taking it would forget those keys
      if (bucket.index !== -1) return false;
      bucket.index = index;
      bucket.keys = new Set();
    }

    bucket.keys.add(key);
    return true;
  };

  /**
   * Drops buckets lying entirely before `cutoffSec`
   * @returns number of keys released
   */
  expireBefore = (cutoffSec: number): number => {
    const cutoffIndex = this.indexOf(cutoffSec);
    if (cutoffIndex <= this.floorIndex) return 0;

    let released = 0;
    for (const bucket of this.ring) {
      if (bucket.index >= 0 && bucket.index < cutoffIndex) {
        released += bucket.keys.size;
        bucket.index = -1;
        bucket.keys = new Set();
      }
    }
    this.floorIndex = cutoffIndex;
    return released;
  };

  size = (): number => this.ring.reduce((total, bucket) => total + bucket.keys.size, 0);

  private indexOf(eventSec: number): number {
    return Math.floor(eventSec / this.bucketSec);
  }

  private slotFor(index: number): DedupBucket {
    const slot = ((index % this.ring.length) + this.ring.length) % this.ring.length;
    const bucket = this.ring[slot];
    // ring is pre-allocated, so every slot exists
    if (!bucket) {
      throw new Error(`Dedup bucket at slot ${slot} is undefined`);
    }
    return bucket;
  }
}
