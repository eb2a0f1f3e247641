import { z } from 'zod';
import type { CheckpointStore, HistoricalStore } from './historical.js';
import type { HistoricalRecord, WindowCheckpoint } from './types.js';
import { windowKeyOf } from './utils.js';

// The subset of a pg Pool these stores use
export type SqlClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
};

const SketchSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exact'), values: z.array(z.string()) }),
  z.object({ kind: z.literal('hll'), precision: z.number().int(), registers: z.string() }),
]);

// BIGINT and NUMERIC columns arrive as strings
const RecordRowSchema = z.object({
  video_id: z.string(),
  window_start: z.coerce.number(),
  window_end: z.coerce.number(),
  version: z.coerce.number(),
  views: z.coerce.number(),
  likes: z.coerce.number(),
  comments: z.coerce.number(),
  shares: z.coerce.number(),
  watch_time: z.coerce.number(),
  unique_users: z.coerce.number(),
  countries_reached: z.coerce.number(),
  user_sketch: SketchSchema,
  country_sketch: SketchSchema,
  committed_at: z.coerce.number(),
});

const CheckpointSchema = z.object({
  video_id: z.string(),
  window_start: z.number(),
  window_end: z.number(),
  version: z.number(),
  views: z.number(),
  likes: z.number(),
  comments: z.number(),
  shares: z.number(),
  watch_time: z.number(),
  user_sketch: SketchSchema,
  country_sketch: SketchSchema,
});

const CheckpointRowSchema = z.object({ payload: z.array(CheckpointSchema) });

const RECORD_COLUMNS = [
  'video_id',
  'window_start',
  'window_end',
  'views',
  'likes',
  'comments',
  'shares',
  'watch_time',
  'unique_users',
  'countries_reached',
  'user_sketch',
  'country_sketch',
  'committed_at',
  'version',
] as const;

export const HISTORICAL_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS window_metrics (
  video_id          TEXT             NOT NULL,
  window_start      BIGINT           NOT NULL,
  window_end        BIGINT           NOT NULL,
  views             BIGINT           NOT NULL,
  likes             BIGINT           NOT NULL,
  comments          BIGINT           NOT NULL,
  shares            BIGINT           NOT NULL,
  watch_time        DOUBLE PRECISION NOT NULL,
  unique_users      BIGINT           NOT NULL,
  countries_reached BIGINT           NOT NULL,
  user_sketch       JSONB            NOT NULL,
  country_sketch    JSONB            NOT NULL,
  committed_at      BIGINT           NOT NULL,
  version           BIGINT           NOT NULL,
  PRIMARY KEY (video_id, window_start)
)`;

export const CHECKPOINT_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS window_checkpoints (
  id       SMALLINT PRIMARY KEY,
  payload  JSONB    NOT NULL,
  saved_at BIGINT   NOT NULL
)`;

/**
 * Builds a multi-row upsert. A later commit for the same (video_id, window_start)
 * overwrites every column, since each row carries the full window total, unless the
 * stored row has a higher version.
 */
export const buildUpsert = (records: HistoricalRecord[]): { text: string; values: unknown[] } => {
  const values: unknown[] = [];
  const tuples = records.map((record) => {
    const placeholders = RECORD_COLUMNS.map((column) => {
      const value = record[column];
      values.push(column === 'user_sketch' || column === 'country_sketch' ? JSON.stringify(value) : value);
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  const updates = RECORD_COLUMNS.filter((column) => column !== 'video_id' && column !== 'window_start')
    .map((column) => `${column} = EXCLUDED.${column}`)
    .join(', ');

  const text =
    `INSERT INTO window_metrics (${RECORD_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')} ` +
    `ON CONFLICT (video_id, window_start) DO UPDATE SET ${updates} ` +
    'WHERE window_metrics.version <= EXCLUDED.version';
  return { text, values };
};

export class PostgresHistoricalStore implements HistoricalStore {
  constructor(private readonly client: SqlClient) {}

  ensureSchema = async (): Promise<void> => {
    await this.client.query(HISTORICAL_SCHEMA_SQL);
  };

  upsert = async (records: HistoricalRecord[]): Promise<void> => {
    if (records.length === 0) return;
    // one statement cannot touch the same key twice, keep the newest version per key
    const unique = new Map<string, HistoricalRecord>();
    for (const record of records) {
      const key = windowKeyOf(record.video_id, record.window_start);
      const kept = unique.get(key);
      if (!kept || kept.version <= record.version) unique.set(key, record);
    }
    const { text, values } = buildUpsert([...unique.values()]);
    await this.client.query(text, values);
  };

  range = async (videoId: string, startSec: number, endSec: number): Promise<HistoricalRecord[]> => {
    const result = await this.client.query(
      `SELECT ${RECORD_COLUMNS.join(', ')} FROM window_metrics
       WHERE video_id = $1 AND window_start >= $2 AND window_start < $3
       ORDER BY window_start ASC`,
      [videoId, startSec, endSec],
    );
    return result.rows.map((row) => RecordRowSchema.parse(row));
  };

  latest = async (videoId: string, limit: number): Promise<HistoricalRecord[]> => {
    const result = await this.client.query(
      `SELECT ${RECORD_COLUMNS.join(', ')} FROM window_metrics
       WHERE video_id = $1
       ORDER BY window_start DESC
       LIMIT $2`,
      [videoId, limit],
    );
    return result.rows.map((row) => RecordRowSchema.parse(row));
  };

  close = async (): Promise<void> => {
    await this.client.end();
  };
}

/** Keeps the whole checkpoint set in a single row so each save is one atomic statement. */
export class PostgresCheckpointStore implements CheckpointStore {
  constructor(
    private readonly client: SqlClient,
    private readonly now: () => number = () => Math.floor(Date.now() / 1000),
  ) {}

  ensureSchema = async (): Promise<void> => {
    await this.client.query(CHECKPOINT_SCHEMA_SQL);
  };

  save = async (checkpoints: WindowCheckpoint[]): Promise<void> => {
    await this.client.query(
      `INSERT INTO window_checkpoints (id, payload, saved_at) VALUES (1, $1, $2)
       ON CONFLICT (id) DO UPDATE SET payload = EXCLUDED.payload, saved_at = EXCLUDED.saved_at`,
      [JSON.stringify(checkpoints), this.now()],
    );
  };

  load = async (): Promise<WindowCheckpoint[]> => {
    const result = await this.client.query('SELECT payload FROM window_checkpoints WHERE id = 1');
    const [row] = result.rows;
    if (row === undefined) return [];
    return CheckpointRowSchema.parse(row).payload;
  };

  // the pool is shared with the historical store, which owns closing it
  close = async (): Promise<void> => {};
}
