import { InMemoryMetricsCache } from '../src/cache.js';
import { InMemoryCheckpointStore, InMemoryHistoricalStore } from '../src/historical.js';
import { MetricsPipeline, type PipelineSettings } from '../src/pipeline.js';
import { ManualClock } from './helpers.js';

const settings: PipelineSettings = {
  windowSizeSec: 60,
  allowedLatenessSec: 10,
  gracePeriodSec: 10,
  cacheTtlSec: 300,
  batchSize: 100,
  maxRetries: 1,
  retryBaseDelayMs: 1,
  commitTimeoutMs: 1_000,
  flushIntervalMs: 60_000,
  checkpointIntervalMs: 60_000,
  cardinalityExactThreshold: 1000,
  hllPrecision: 12,
};

const buildPipeline = (checkpoints = new InMemoryCheckpointStore(), store = new InMemoryHistoricalStore()) => {
  const clock = new ManualClock(100);
  const pipeline = new MetricsPipeline({
    settings,
    cache: new InMemoryMetricsCache(clock.now),
    store,
    checkpoints,
    now: clock.now,
  });
  return { pipeline, store, checkpoints, clock };
};

describe('MetricsPipeline', () => {
  it('should flow events from ingest to the durable store', async () => {
    const { pipeline, store } = buildPipeline();
    await pipeline.start();

    expect(await pipeline.ingest({ video_id: 'example123', event_timestamp: 10, event_type: 'view' }, 10)).toBe(
      'accepted',
    );
    await pipeline.ingest({ video_id: 'example123', event_timestamp: 20, event_type: 'like', user_id: 'u-1' }, 20);
    await pipeline.ingest({ video_id: 'example123', event_timestamp: 75, event_type: 'view' }, 75);
    await pipeline.flushOnce();

    expect(store.get('example123', 0)).toMatchObject({ views: 1, likes: 1, unique_users: 1, committed_at: 100 });
    expect(pipeline.aggregator.windowState('example123', 0)).toBe('flushed');

    const history = await pipeline.query.getHistorical('example123', 0, 120);
    expect(history.views).toBe(2);
    expect(history.windows).toBe(2);

    await pipeline.stop();
  });

  it('should stamp ingest time from its clock when none is given', async () => {
    const { pipeline, clock } = buildPipeline();
    clock.current = 500;

    await pipeline.ingest({ video_id: 'example123', event_timestamp: 495, event_type: 'view' });

    expect(pipeline.aggregator.currentWatermark()).toBe(490);
  });

  it('should carry closed windows across a restart through checkpoints', async () => {
    const checkpoints = new InMemoryCheckpointStore();
    const failingStore = new InMemoryHistoricalStore();
    failingStore.upsert = async () => {
      throw new Error('database is down');
    };
    const first = buildPipeline(checkpoints, failingStore).pipeline;
    await first.start();
    await first.ingest({ video_id: 'example123', event_timestamp: 10, event_type: 'view', user_id: 'u-1' }, 10);
    await first.ingest({ video_id: 'example123', event_timestamp: 11, event_type: 'view', user_id: 'u-2' }, 11);
    await first.ingest({ video_id: 'example123', event_timestamp: 75, event_type: 'view' }, 75);
    await first.stop();

    expect(first.reconciler.stats().stuck).toEqual(['example123@0']);
    expect(await checkpoints.load()).toHaveLength(1);

    const { pipeline: second, store } = buildPipeline(checkpoints);
    await second.start();
    expect(second.aggregator.windowState('example123', 0)).toBe('closed');

    await second.flushOnce();

    expect(store.get('example123', 0)).toMatchObject({ views: 2, unique_users: 2 });
    await second.stop();
    expect(await checkpoints.load()).toEqual([]);
  });

  it('should not carry open windows across a restart', async () => {
    const checkpoints = new InMemoryCheckpointStore();
    const first = buildPipeline(checkpoints).pipeline;
    await first.ingest({ video_id: 'example123', event_timestamp: 10, event_type: 'view' }, 10);
    await first.checkpointOnce();

    expect(await checkpoints.load()).toEqual([]);

    const { pipeline: second } = buildPipeline(checkpoints);
    await second.start();
    expect(second.aggregator.windowState('example123', 0)).toBeUndefined();
    await second.stop();
  });

  it('should not let a stale checkpoint overwrite a newer commit after a crash', async () => {
    const checkpoints = new InMemoryCheckpointStore();
    const store = new InMemoryHistoricalStore();
    const writeRow = store.upsert;
    let storeDown = true;
    store.upsert = async (records) => {
      if (storeDown) throw new Error('database is down');
      await writeRow(records);
    };

    const crashed = buildPipeline(checkpoints, store).pipeline;
    await crashed.ingest({ video_id: 'example123', event_timestamp: 10, event_type: 'view', user_id: 'u-1' }, 10);
    await crashed.ingest({ video_id: 'example123', event_timestamp: 11, event_type: 'view', user_id: 'u-2' }, 11);
    await crashed.ingest({ video_id: 'example123', event_timestamp: 75, event_type: 'view' }, 75);
    await crashed.flushOnce();
    await crashed.checkpointOnce();
    await crashed.ingest({ video_id: 'example123', event_timestamp: 20, event_type: 'view', user_id: 'u-3' }, 75);
    storeDown = false;
    await crashed.flushOnce();
    expect(store.get('example123', 0)).toMatchObject({ views: 3, version: 3 });

    const { pipeline: restarted } = buildPipeline(checkpoints, store);
    await restarted.start();
    await restarted.flushOnce();

    expect(restarted.aggregator.windowState('example123', 0)).toBeUndefined();
    expect(store.get('example123', 0)).toMatchObject({ views: 3, version: 3 });
    await restarted.stop();
  });
});
