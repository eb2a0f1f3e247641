import type { CardinalityEstimator, EstimatorFactory } from './cardinality.js';
import type { Counters, HistoricalRecord, MetricsSnapshot } from './types.js';

// Counters plus mergeable distinct-count state for one or more windows
export type Totals = {
  counters: Counters;
  users: CardinalityEstimator;
  countries: CardinalityEstimator;
};

export const zeroCounters = (): Counters => ({ views: 0, likes: 0, comments: 0, shares: 0, watch_time: 0 });

export const emptyTotals = (estimators: EstimatorFactory): Totals => ({
  counters: zeroCounters(),
  users: estimators.create(),
  countries: estimators.create(),
});

export const addCounters = (a: Counters, b: Counters): Counters => ({
  views: a.views + b.views,
  likes: a.likes + b.likes,
  comments: a.comments + b.comments,
  shares: a.shares + b.shares,
  watch_time: a.watch_time + b.watch_time,
});

/** Sums counters and unions distinct sets; inputs are left untouched */
export const combineTotals = (a: Totals, b: Totals): Totals => ({
  counters: addCounters(a.counters, b.counters),
  users: a.users.union(b.users),
  countries: a.countries.union(b.countries),
});

export const totalsFromRecord = (record: HistoricalRecord, estimators: EstimatorFactory): Totals => ({
  counters: {
    views: record.views,
    likes: record.likes,
    comments: record.comments,
    shares: record.shares,
    watch_time: record.watch_time,
  },
  users: estimators.restore(record.user_sketch),
  countries: estimators.restore(record.country_sketch),
});

export const toSnapshot = (totals: Totals): MetricsSnapshot => ({
  ...totals.counters,
  unique_users: totals.users.estimate(),
  countries_reached: totals.countries.estimate(),
  approximate: {
    unique_users: !totals.users.exact,
    countries_reached: !totals.countries.exact,
  },
});
