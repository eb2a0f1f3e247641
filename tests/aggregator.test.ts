import type { ClosedWindow } from '../src/aggregator.js';
import { InMemoryMetricsCache, type MetricsCacheStore } from '../src/cache.js';
import { CacheUnavailableError } from '../src/errors.js';
import { buildAggregator, makeEvent, tick } from './helpers.js';

describe('WindowAggregator', () => {
  describe('window assignment', () => {
    it('should place events in half-open windows', async () => {
      const { aggregator } = buildAggregator();

      await aggregator.ingest(makeEvent({ event_timestamp: 0 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 59 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 60 }));

      const first = aggregator.heldWindows('example123', 0, 60);
      const second = aggregator.heldWindows('example123', 60, 120);
      expect([...first.keys()]).toEqual([0]);
      expect(first.get(0)?.counters.views).toBe(2);
      expect([...second.keys()]).toEqual([60]);
      expect(second.get(60)?.counters.views).toBe(1);
    });

    it('should produce the rolling snapshot from every live window', async () => {
      const { aggregator, cache } = buildAggregator();

      await aggregator.ingest(makeEvent({ event_timestamp: 10, user_id: 'u-1' }));
      await aggregator.ingest(makeEvent({ event_timestamp: 20, user_id: 'u-2' }));
      await aggregator.ingest(makeEvent({ event_timestamp: 15, user_id: 'u-1', event_type: 'like', ingest: 20 }));

      const entry = await cache.get('example123');
      expect(entry?.snapshot).toEqual({
        views: 2,
        likes: 1,
        comments: 0,
        shares: 0,
        watch_time: 0,
        unique_users: 2,
        countries_reached: 0,
        approximate: { unique_users: false, countries_reached: false },
      });
    });

    it('should sum watch time and distinct countries', async () => {
      const { aggregator } = buildAggregator();

      await aggregator.ingest(makeEvent({ event_timestamp: 1, watch_time: 30, country_code: 'US' }));
      await aggregator.ingest(makeEvent({ event_timestamp: 2, watch_time: 12.5, country_code: 'US' }));
      await aggregator.ingest(makeEvent({ event_timestamp: 3, event_type: 'share', country_code: 'DE' }));

      const live = aggregator.liveSnapshot('example123');
      expect(live?.snapshot.watch_time).toBe(42.5);
      expect(live?.snapshot.shares).toBe(1);
      expect(live?.snapshot.countries_reached).toBe(2);
      expect(live?.lastUpdated).toBe(3);
    });
  });

  describe('idempotency', () => {
    it('should count a redelivered event once', async () => {
      const { aggregator } = buildAggregator();
      const event = makeEvent({ user_id: 'u-1', event_timestamp: 10 });

      expect(await aggregator.ingest(event)).toBe('accepted');
      expect(await aggregator.ingest(event)).toBe('duplicate');
      expect(await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 10, ingest: 15 }))).toBe(
        'duplicate',
      );

      expect(aggregator.liveSnapshot('example123')?.snapshot.views).toBe(1);
      expect(aggregator.stats().duplicates).toBe(2);
    });

    it('should treat a different event type from the same user as a new event', async () => {
      const { aggregator } = buildAggregator();

      await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 10 }));
      const outcome = await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 10, event_type: 'like' }));

      expect(outcome).toBe('accepted');
    });
  });

  describe('event times ahead of the ingest clock', () => {
    it('should reject an event stamped beyond the deduplication horizon and still catch redeliveries', async () => {
      const { aggregator } = buildAggregator();

      const first = await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 120, ingest: 130 }));
      const ahead = await aggregator.ingest(makeEvent({ user_id: 'u-2', event_timestamp: 210, ingest: 130 }));
      const redelivered = await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 120, ingest: 130 }));

      expect([first, ahead, redelivered]).toEqual(['accepted', 'rejected', 'duplicate']);
      expect(aggregator.liveSnapshot('example123')?.snapshot.views).toBe(1);
      expect(aggregator.stats().rejected).toBe(1);
    });

    it('should deduplicate an event up to one window ahead of the ingest clock', async () => {
      const { aggregator } = buildAggregator();

      await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 120, ingest: 130 }));
      const ahead = await aggregator.ingest(makeEvent({ user_id: 'u-2', event_timestamp: 190, ingest: 130 }));
      const outcomes = [
        await aggregator.ingest(makeEvent({ user_id: 'u-1', event_timestamp: 120, ingest: 131 })),
        await aggregator.ingest(makeEvent({ user_id: 'u-2', event_timestamp: 190, ingest: 131 })),
      ];

      expect(ahead).toBe('accepted');
      expect(outcomes).toEqual(['duplicate', 'duplicate']);
      expect(aggregator.liveSnapshot('example123')?.snapshot.views).toBe(2);
    });
  });

  describe('watermark and lateness', () => {
    it('should never move the watermark backwards', async () => {
      const { aggregator } = buildAggregator();

      await aggregator.ingest(makeEvent({ event_timestamp: 95, ingest: 100 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 60, ingest: 50 }));

      expect(aggregator.currentWatermark()).toBe(90);
    });

    it('should drop an event whose window ended more than the grace period before the watermark', async () => {
      const { aggregator } = buildAggregator();

      await aggregator.ingest(makeEvent({ event_timestamp: 195, ingest: 200 }));
      const outcome = await aggregator.ingest(makeEvent({ event_timestamp: 100, ingest: 200 }));

      expect(outcome).toBe('dropped_late');
      expect(aggregator.windowState('example123', 60)).toBeUndefined();
      expect(aggregator.stats().droppedLate).toBe(1);
    });

    it('should accept a late event into a closed window within the grace period', async () => {
      const { aggregator } = buildAggregator();
      const handed: ClosedWindow[] = [];
      aggregator.onWindowClosed((window) => handed.push(window));

      await aggregator.ingest(makeEvent({ event_timestamp: 135, ingest: 140 }));
      const outcome = await aggregator.ingest(makeEvent({ event_timestamp: 100, ingest: 140 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 101, ingest: 140 }));

      expect(outcome).toBe('accepted');
      expect(aggregator.windowState('example123', 60)).toBe('closed');
      expect(handed).toEqual([{ key: 'example123@60', videoId: 'example123', windowStart: 60, windowEnd: 120 }]);
    });

    it('should hand off a window exactly once when the watermark passes its end', async () => {
      const { aggregator } = buildAggregator();
      const handed: ClosedWindow[] = [];
      aggregator.onWindowClosed((window) => handed.push(window));

      await aggregator.ingest(makeEvent({ event_timestamp: 10 }));
      expect(aggregator.windowState('example123', 0)).toBe('open');

      await aggregator.ingest(makeEvent({ event_timestamp: 75 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 80 }));
      aggregator.advanceTo(79);

      expect(aggregator.windowState('example123', 0)).toBe('closed');
      expect(handed.map((window) => window.key)).toEqual(['example123@0']);
    });

    it('should close windows on a heartbeat without events', async () => {
      const { aggregator } = buildAggregator();
      await aggregator.ingest(makeEvent({ event_timestamp: 10 }));

      aggregator.advanceTo(70);

      expect(aggregator.closedWindows()).toEqual([
        { key: 'example123@0', videoId: 'example123', windowStart: 0, windowEnd: 60 },
      ]);
    });
  });

  describe('flush acknowledgement', () => {
    it('should drop events for a flushed window and release it after the grace period', async () => {
      const { aggregator } = buildAggregator();
      await aggregator.ingest(makeEvent({ event_timestamp: 10 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 75 }));

      const candidate = aggregator.commitCandidate('example123@0', 500);
      expect(candidate?.version).toBe(1);
      expect(aggregator.markFlushed('example123@0', 1)).toBe(true);
      expect(aggregator.windowState('example123', 0)).toBe('flushed');

      expect(await aggregator.ingest(makeEvent({ event_timestamp: 20, ingest: 75 }))).toBe('dropped_late');
      expect(aggregator.liveSnapshot('example123')?.snapshot.views).toBe(2);

      aggregator.advanceTo(81);
      expect(aggregator.windowState('example123', 0)).toBeUndefined();
      expect(aggregator.liveSnapshot('example123')?.snapshot.views).toBe(1);
    });

    it('should refuse a flush acknowledgement for a stale version', async () => {
      const { aggregator } = buildAggregator();
      await aggregator.ingest(makeEvent({ event_timestamp: 10 }));
      await aggregator.ingest(makeEvent({ event_timestamp: 75 }));
      const candidate = aggregator.commitCandidate('example123@0', 500);

      await aggregator.ingest(makeEvent({ event_timestamp: 30, ingest: 75 }));

      expect(aggregator.markFlushed('example123@0', candidate?.version ?? -1)).toBe(false);
      expect(aggregator.windowState('example123', 0)).toBe('closed');
      expect(aggregator.commitCandidate('example123@0', 500)?.record.views).toBe(2);
    });

    it('should not offer open windows for commit', async () => {
      const { aggregator } = buildAggregator();
      await aggregator.ingest(makeEvent({ event_timestamp: 10 }));

      expect(aggregator.commitCandidate('example123@0', 500)).toBeNull();
      expect(aggregator.markFlushed('example123@0', 1)).toBe(false);
    });
  });

  describe('cache write-through', () => {
    it('should keep accepting events when the cache is down', async () => {
      const failing: MetricsCacheStore = {
        put: async () => {
          throw new CacheUnavailableError('connection refused');
        },
        get: async () => null,
        close: async () => {},
      };
      const { aggregator } = buildAggregator(failing);

      expect(await aggregator.ingest(makeEvent())).toBe('accepted');
      expect(aggregator.stats().cacheWriteFailures).toBe(1);
      expect(aggregator.liveSnapshot('example123')?.snapshot.views).toBe(1);
    });

    it('should leave the cache holding every concurrent update for one video', async () => {
      const cache = new InMemoryMetricsCache();
      const { aggregator } = buildAggregator(cache);

      await Promise.all(
        ['u-1', 'u-2', 'u-3', 'u-4', 'u-5'].map((user) => aggregator.ingest(makeEvent({ user_id: user }))),
      );
      await tick();

      const entry = await cache.get('example123');
      expect(entry?.snapshot.views).toBe(5);
      expect(entry?.snapshot.unique_users).toBe(5);
    });
  });

  describe('checkpoint and restore', () => {
    it('should restore closed windows and hand them off again', async () => {
      const source = buildAggregator().aggregator;
      await source.ingest(makeEvent({ event_timestamp: 10, user_id: 'u-1' }));
      await source.ingest(makeEvent({ event_timestamp: 12, user_id: 'u-2', event_type: 'like' }));
      await source.ingest(makeEvent({ event_timestamp: 75 }));

      const checkpoints = source.checkpoint();
      expect(checkpoints).toHaveLength(1);

      const { aggregator } = buildAggregator();
      const handed: ClosedWindow[] = [];
      aggregator.onWindowClosed((window) => handed.push(window));

      expect(aggregator.restore(checkpoints)).toBe(1);
      expect(aggregator.restore(checkpoints)).toBe(0);
      expect(aggregator.windowState('example123', 0)).toBe('closed');
      expect(handed.map((window) => window.key)).toEqual(['example123@0']);
      expect(aggregator.commitCandidate('example123@0', 900)).toEqual({
        version: 2,
        record: expect.objectContaining({ views: 1, likes: 1, unique_users: 2, committed_at: 900 }),
      });
    });
  });
});
