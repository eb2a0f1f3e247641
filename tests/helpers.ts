import { WindowAggregator } from '../src/aggregator.js';
import { InMemoryMetricsCache, type MetricsCacheStore } from '../src/cache.js';
import { adaptiveEstimators } from '../src/cardinality.js';
import { toEngagementEvent } from '../src/events.js';
import { IdempotencyGuard } from '../src/idempotency.js';
import type { EngagementEvent, InboundEvent } from '../src/types.js';

export const WINDOW_SIZE = 60;
export const LATENESS = 10;
export const GRACE = 10;
export const CACHE_TTL = 300;

export const estimators = adaptiveEstimators(1000, 12);

type EventOverrides = Partial<InboundEvent> & { ingest?: number };

/** Builds an event; ingest time defaults to the event time */
export const makeEvent = (overrides: EventOverrides = {}): EngagementEvent => {
  const { ingest, ...fields } = overrides;
  const inbound: InboundEvent = {
    video_id: 'example123',
    event_timestamp: 10,
    event_type: 'view',
    ...fields,
  };
  return toEngagementEvent(inbound, ingest ?? inbound.event_timestamp);
};

export class ManualClock {
  constructor(public current = 1_000) {}
  now = (): number => this.current;
}

export const buildAggregator = (cache: MetricsCacheStore = new InMemoryMetricsCache()) => {
  const guard = IdempotencyGuard.forWindows(WINDOW_SIZE, LATENESS, GRACE);
  const aggregator = new WindowAggregator({
    windowSizeSec: WINDOW_SIZE,
    allowedLatenessSec: LATENESS,
    gracePeriodSec: GRACE,
    cacheTtlSec: CACHE_TTL,
    guard,
    cache,
    estimators,
  });
  return { aggregator, guard, cache };
};

/** Lets pending promise callbacks run */
export const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
