import { createHash } from 'node:crypto';
import type { SerializedEstimator } from './types.js';

/**
 * Distinct-count capability. Implementations are interchangeable behind the
 * aggregator; `exact` tells callers whether `estimate()` is a true count.
 */
export interface CardinalityEstimator {
  readonly exact: boolean;
  add(value: string): void;
  estimate(): number;
  /** Returns a new estimator over both inputs; neither input is modified */
  union(other: CardinalityEstimator): CardinalityEstimator;
  serialize(): SerializedEstimator;
}

export class ExactSetEstimator implements CardinalityEstimator {
  readonly exact = true;
  private readonly values: Set<string>;

  constructor(values: Iterable<string> = []) {
    this.values = new Set(values);
  }

  add(value: string): void {
    this.values.add(value);
  }

  estimate(): number {
    return this.values.size;
  }

  members(): IterableIterator<string> {
    return this.values.values();
  }

  union(other: CardinalityEstimator): CardinalityEstimator {
    if (other instanceof ExactSetEstimator) {
      return new ExactSetEstimator([...this.values, ...other.values]);
    }
    return other.union(this);
  }

  serialize(): SerializedEstimator {
    return { kind: 'exact', values: [...this.values].sort() };
  }
}

/**
 * HyperLogLog sketch with 2^precision one-byte registers.
 * Standard error is about 1.04 / sqrt(2^precision).
 */
export class HyperLogLogEstimator implements CardinalityEstimator {
  readonly exact = false;
  readonly precision: number;
  private readonly registers: Uint8Array;

  constructor(precision: number, registers?: Uint8Array) {
    if (!Number.isInteger(precision) || precision < 4 || precision > 16) {
      throw new Error(`HyperLogLog precision must be an integer in [4, 16], got ${precision}`);
    }
    const size = 1 << precision;
    if (registers && registers.length !== size) {
      throw new Error(`Expected ${size} registers, got ${registers.length}`);
    }
    this.precision = precision;
    this.registers = registers ? Uint8Array.from(registers) : new Uint8Array(size);
  }

  add(value: string): void {
    const digest = createHash('sha1').update(value).digest();
    const index = digest.readUInt32BE(0) >>> (32 - this.precision);
    // rank of the first set bit in an independent 32-bit word, 33 when all zero
    const rank = Math.clz32(digest.readUInt32BE(4)) + 1;
    if (rank > (this.registers[index] ?? 0)) {
      this.registers[index] = rank;
    }
  }

  estimate(): number {
    const m = this.registers.length;
    let harmonic = 0;
    let zeros = 0;
    for (const register of this.registers) {
      harmonic += 2 ** -register;
      if (register === 0) zeros++;
    }

    const alpha = m === 16 ? 0.673 : m === 32 ? 0.697 : m === 64 ? 0.709 : 0.7213 / (1 + 1.079 / m);
    const raw = (alpha * m * m) / harmonic;

    // linear counting for the small range
    if (raw <= 2.5 * m && zeros > 0) {
      return Math.round(m * Math.log(m / zeros));
    }
    return Math.round(raw);
  }

  union(other: CardinalityEstimator): CardinalityEstimator {
    if (other instanceof HyperLogLogEstimator) {
      // sketches written under another precision setting merge at the lower one
      const precision = Math.min(this.precision, other.precision);
      const left = this.reduceTo(precision).registers;
      const right = other.reduceTo(precision).registers;
      const merged = new Uint8Array(left.length);
      for (let i = 0; i < merged.length; i++) {
        merged[i] = Math.max(left[i] ?? 0, right[i] ?? 0);
      }
      return new HyperLogLogEstimator(precision, merged);
    }

    const merged = new HyperLogLogEstimator(this.precision, this.registers);
    if (other instanceof ExactSetEstimator) {
      for (const value of other.members()) merged.add(value);
      return merged;
    }
    return other.union(this);
  }

  /**
   * Same sketch at a lower precision. The register index is the top bits of the hash and
   * the rank comes from an independent word, so folding registers by index prefix gives
   * exactly the sketch that direct insertion at that precision would have built.
   */
  reduceTo(precision: number): HyperLogLogEstimator {
    if (precision === this.precision) return this;
    if (precision > this.precision) {
      throw new Error(`Cannot raise sketch precision from ${this.precision} to ${precision}`);
    }
    const shift = this.precision - precision;
    const reduced = new Uint8Array(1 << precision);
    this.registers.forEach((register, index) => {
      const target = index >>> shift;
      if (register > (reduced[target] ?? 0)) reduced[target] = register;
    });
    return new HyperLogLogEstimator(precision, reduced);
  }

  serialize(): SerializedEstimator {
    return {
      kind: 'hll',
      precision: this.precision,
      registers: Buffer.from(this.registers).toString('base64'),
    };
  }
}

/**
 * Exact set up to `threshold` distinct values, then a HyperLogLog sketch.
 * Memory stays bounded per window regardless of traffic.
 */
export class AdaptiveEstimator implements CardinalityEstimator {
  private inner: ExactSetEstimator | HyperLogLogEstimator;

  constructor(
    private readonly threshold: number,
    private readonly precision: number,
    inner?: ExactSetEstimator | HyperLogLogEstimator,
  ) {
    this.inner = inner ?? new ExactSetEstimator();
    this.promoteIfNeeded();
  }

  get exact(): boolean {
    return this.inner.exact;
  }

  add(value: string): void {
    this.inner.add(value);
    this.promoteIfNeeded();
  }

  estimate(): number {
    return this.inner.estimate();
  }

  union(other: CardinalityEstimator): CardinalityEstimator {
    const base = other instanceof AdaptiveEstimator ? other.inner : other;
    const merged = this.inner.union(base);
    if (merged instanceof ExactSetEstimator || merged instanceof HyperLogLogEstimator) {
      return new AdaptiveEstimator(this.threshold, this.precision, merged);
    }
    return merged;
  }

  serialize(): SerializedEstimator {
    return this.inner.serialize();
  }

  private promoteIfNeeded(): void {
    if (this.inner instanceof ExactSetEstimator && this.inner.estimate() > this.threshold) {
      const sketch = new HyperLogLogEstimator(this.precision);
      for (const value of this.inner.members()) sketch.add(value);
      this.inner = sketch;
    }
  }
}

export type EstimatorFactory = {
  create(): CardinalityEstimator;
  restore(serialized: SerializedEstimator): CardinalityEstimator;
};

export const adaptiveEstimators = (threshold: number, precision: number): EstimatorFactory => ({
  create: () => new AdaptiveEstimator(threshold, precision),
  restore: (serialized) => {
    const inner = serialized.kind === 'exact'
      ? new ExactSetEstimator(serialized.values)
      : new HyperLogLogEstimator(serialized.precision, Buffer.from(serialized.registers, 'base64'));
    return new AdaptiveEstimator(threshold, precision, inner);
  },
});
