export const isObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
};

/**
 * Parses an ISO-8601 string into unix seconds
 * @throws Error on an unparseable timestamp
 */
export const parseTimestamp = (ts: string): number => {
  const timestamp = Math.floor(new Date(ts).getTime() / 1000);
  if (isNaN(timestamp)) {
    throw new Error('Invalid timestamp');
  }
  return timestamp;
};

export const toIsoString = (sec: number): string => new Date(sec * 1000).toISOString();

export const nowSec = (): number => Math.floor(Date.now() / 1000);

export const normalizeToArray = (body: unknown): unknown[] | null => {
  if (isObject(body)) {
    return [body];
  }

  if (Array.isArray(body)) {
    return body;
  }

  return null;
};

/** Start of the half-open window `[start, start + size)` containing `ts` */
export const windowStartOf = (ts: number, windowSizeSec: number): number => {
  return Math.floor(ts / windowSizeSec) * windowSizeSec;
};

export const windowKeyOf = (videoId: string, windowStart: number): string => `${videoId}@${windowStart}`;

/**
 * likes / views, 0 when there are no views. Both operands are integers, so the
 * quotient is the correctly rounded double of the exact ratio.
 */
export const engagementRate = (likes: number, views: number): number => {
  return views > 0 ? likes / views : 0;
};

export const averageWatchTime = (watchTime: number, views: number): number => {
  return views > 0 ? watchTime / views : 0;
};

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
