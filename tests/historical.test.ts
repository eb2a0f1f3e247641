import { InMemoryCheckpointStore, InMemoryHistoricalStore } from '../src/historical.js';
import type { HistoricalRecord, WindowCheckpoint } from '../src/types.js';

const record = (overrides: Partial<HistoricalRecord> = {}): HistoricalRecord => ({
  video_id: 'example123',
  window_start: 0,
  window_end: 60,
  version: 1,
  views: 1,
  likes: 0,
  comments: 0,
  shares: 0,
  watch_time: 0,
  unique_users: 0,
  countries_reached: 0,
  user_sketch: { kind: 'exact', values: [] },
  country_sketch: { kind: 'exact', values: [] },
  committed_at: 100,
  ...overrides,
});

describe('InMemoryHistoricalStore', () => {
  it('should replace a row with an equal or newer version', async () => {
    const store = new InMemoryHistoricalStore();

    await store.upsert([record({ version: 2, views: 2 })]);
    await store.upsert([record({ version: 2, views: 2, committed_at: 200 })]);
    await store.upsert([record({ version: 3, views: 3 })]);

    expect(store.get('example123', 0)).toMatchObject({ version: 3, views: 3 });
    expect(store.size()).toBe(1);
  });

  it('should keep a newer row when an older version is committed after it', async () => {
    const store = new InMemoryHistoricalStore();

    await store.upsert([record({ version: 3, views: 3 })]);
    await store.upsert([record({ version: 2, views: 2 })]);

    expect(store.get('example123', 0)).toMatchObject({ version: 3, views: 3 });
  });

  it('should return rows in range ordered by window start', async () => {
    const store = new InMemoryHistoricalStore();
    await store.upsert([record({ window_start: 120, window_end: 180 }), record(), record({ window_start: 60, window_end: 120 })]);

    const rows = await store.range('example123', 0, 120);

    expect(rows.map((row) => row.window_start)).toEqual([0, 60]);
    expect((await store.latest('example123', 1)).map((row) => row.window_start)).toEqual([120]);
  });
});

describe('InMemoryCheckpointStore', () => {
  it('should replace the saved set on each save', async () => {
    const store = new InMemoryCheckpointStore();
    const checkpoint: WindowCheckpoint = {
      video_id: 'example123',
      window_start: 0,
      window_end: 60,
      version: 2,
      views: 2,
      likes: 0,
      comments: 0,
      shares: 0,
      watch_time: 0,
      user_sketch: { kind: 'exact', values: ['u-1'] },
      country_sketch: { kind: 'exact', values: [] },
    };

    await store.save([checkpoint, { ...checkpoint, window_start: 60, window_end: 120 }]);
    await store.save([checkpoint]);

    expect(await store.load()).toEqual([checkpoint]);
  });
});
