import express, { type Express } from 'express';
import { Controllers } from './controllers.js';
import type { MetricsPipeline } from './pipeline.js';

export const createApp = (pipeline: MetricsPipeline): Express => {
  const app = express();
  const controllers = new Controllers(pipeline);

  // Middleware, needed for parsing JSON bodies
  app.use(express.json({ limit: '5mb' }));

  // Routes; trending must precede the :videoId route
  app.post('/events', controllers.ingestEvents);
  app.get('/metrics/trending', controllers.getTrending);
  app.get('/metrics/:videoId', controllers.getCurrentMetrics);
  app.get('/metrics/:videoId/historical', controllers.getHistoricalMetrics);
  app.get('/health', controllers.healthCheck);

  return app;
};
