import type { HistoricalRecord, WindowCheckpoint } from './types.js';
import { windowKeyOf } from './utils.js';

/**
 * Durable, authoritative per-window history. One row per (video_id, window_start);
 * writing a row for an existing key replaces it unless the stored row has a higher version.
 */
export interface HistoricalStore {
  upsert(records: HistoricalRecord[]): Promise<void>;
  /** Rows with window_start in [startSec, endSec), oldest first */
  range(videoId: string, startSec: number, endSec: number): Promise<HistoricalRecord[]>;
  /** Most recent rows for a video, newest first */
  latest(videoId: string, limit: number): Promise<HistoricalRecord[]>;
  close(): Promise<void>;
}

/** Closed-but-unflushed window state kept across restarts. `save` replaces the whole set. */
export interface CheckpointStore {
  save(checkpoints: WindowCheckpoint[]): Promise<void>;
  load(): Promise<WindowCheckpoint[]>;
  close(): Promise<void>;
}

export class InMemoryHistoricalStore implements HistoricalStore {
  private rows = new Map<string, HistoricalRecord>();

  upsert = async (records: HistoricalRecord[]): Promise<void> => {
    for (const record of records) {
      const key = windowKeyOf(record.video_id, record.window_start);
      const stored = this.rows.get(key);
      if (stored && stored.version > record.version) continue;
      this.rows.set(key, structuredClone(record));
    }
  };

  range = async (videoId: string, startSec: number, endSec: number): Promise<HistoricalRecord[]> => {
    return this.rowsFor(videoId)
      .filter((row) => row.window_start >= startSec && row.window_start < endSec)
      .sort((a, b) => a.window_start - b.window_start);
  };

  latest = async (videoId: string, limit: number): Promise<HistoricalRecord[]> => {
    return this.rowsFor(videoId)
      .sort((a, b) => b.window_start - a.window_start)
      .slice(0, limit);
  };

  get = (videoId: string, windowStart: number): HistoricalRecord | undefined => {
    const row = this.rows.get(windowKeyOf(videoId, windowStart));
    return row ? structuredClone(row) : undefined;
  };

  size = (): number => this.rows.size;

  close = async (): Promise<void> => {};

  private rowsFor(videoId: string): HistoricalRecord[] {
    return [...this.rows.values()].filter((row) => row.video_id === videoId).map((row) => structuredClone(row));
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private checkpoints: WindowCheckpoint[] = [];

  save = async (checkpoints: WindowCheckpoint[]): Promise<void> => {
    this.checkpoints = structuredClone(checkpoints);
  };

  load = async (): Promise<WindowCheckpoint[]> => structuredClone(this.checkpoints);

  close = async (): Promise<void> => {};
}
