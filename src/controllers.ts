import type { Request, Response } from 'express';
import { InvalidRangeError, StoreUnavailableError, VideoNotFoundError } from './errors.js';
import { InboundEventSchema } from './events.js';
import { logger } from './logger.js';
import type { MetricsPipeline } from './pipeline.js';
import type { IngestOutcome } from './types.js';
import { normalizeToArray, parseTimestamp } from './utils.js';

const DEFAULT_TRENDING_LIMIT = 10;
const MAX_TRENDING_LIMIT = 100;

type IngestResult = {
  index: number;
  status: IngestOutcome | 'error';
  message?: string;
};

export class Controllers {
  constructor(private pipeline: MetricsPipeline) {}

  ingestEvents = withErrorHandling(async (req: Request, res: Response): Promise<void> => {
    const eventsArray = normalizeToArray(req.body);
    if (!eventsArray) {
      res.status(400).json({
        error: 'Invalid events format',
        message: 'body must be an event object or an array of event objects, got ' + typeof req.body,
      });
      return;
    }

    const ingestTimestamp = Math.floor(Date.now() / 1000);
    const results: IngestResult[] = [];
    for (const [index, candidate] of eventsArray.entries()) {
      const parsed = InboundEventSchema.safeParse(candidate);
      if (!parsed.success) {
        results.push({
          index,
          status: 'error',
          message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        });
        continue;
      }
      const status = await this.pipeline.ingest(parsed.data, ingestTimestamp);
      results.push({ index, status });
    }

    res.status(200).json({ results });
  });

  getCurrentMetrics = withErrorHandling(async (req: Request, res: Response): Promise<void> => {
    const metrics = await this.pipeline.query.getCurrent(req.params.videoId ?? '');
    res.status(200).json(metrics);
  });

  getHistoricalMetrics = withErrorHandling(async (req: Request, res: Response): Promise<void> => {
    const { start_time, end_time } = req.query;
    if (typeof start_time !== 'string' || typeof end_time !== 'string') {
      res.status(400).json({ error: 'start_time and end_time are required ISO-8601 timestamps' });
      return;
    }

    let startSec: number;
    let endSec: number;
    try {
      startSec = parseTimestamp(start_time);
      endSec = parseTimestamp(end_time);
    } catch {
      res.status(400).json({ error: 'start_time and end_time must be valid ISO-8601 timestamps' });
      return;
    }

    const metrics = await this.pipeline.query.getHistorical(req.params.videoId ?? '', startSec, endSec);
    res.status(200).json(metrics);
  });

  getTrending = withErrorHandling(async (req: Request, res: Response): Promise<void> => {
    const { limit } = req.query;
    const parsedLimit = typeof limit === 'string' ? Number(limit) : DEFAULT_TRENDING_LIMIT;

    if (!Number.isInteger(parsedLimit) || parsedLimit <= 0 || parsedLimit > MAX_TRENDING_LIMIT) {
      res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_TRENDING_LIMIT}` });
      return;
    }

    res.status(200).json({ videos: this.pipeline.query.getTrending(parsedLimit) });
  });

  healthCheck = (_req: Request, res: Response): void => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString() });
  };
}

type ControllerHandler = (req: Request, res: Response) => Promise<void>;
const withErrorHandling = (handler: ControllerHandler) => {
  return (req: Request, res: Response): void => {
    void handler(req, res).catch((error: unknown) => {
      if (error instanceof InvalidRangeError) {
        res.status(400).json({ error: 'Invalid time range', message: error.message });
        return;
      }
      if (error instanceof VideoNotFoundError) {
        res.status(404).json({ error: 'Video not found', message: error.message });
        return;
      }
      if (error instanceof StoreUnavailableError) {
        logger.error('Durable store unavailable', error, { path: req.path });
        res.status(503).json({ error: 'Historical store unavailable' });
        return;
      }
      logger.error('Unhandled controller error', error, { path: req.path });
      res.status(500).json({
        error: 'Internal server error',
        message: error instanceof Error ? error.message : String(error),
      });
    });
  };
};
