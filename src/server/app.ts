import express from 'express';
import { createAnalyzeRouter } from '../routes/analyze.js';
import { createEngine } from '../lib/pricing/analysis-pipeline.js';
import type { Engine } from '../lib/pricing/analysis-pipeline.js';

const STARTED_AT = new Date().toISOString();

export function createApp(engine: Engine = createEngine()): express.Express {
  const app = express();

  // photos arrive as data URLs
  app.use(express.json({ limit: '25mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      startedAt: STARTED_AT,
      marketCacheEntries: engine.market.size(),
    });
  });

  app.use('/api', createAnalyzeRouter(engine));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
