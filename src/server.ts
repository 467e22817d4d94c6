import helmet from 'helmet';
import express from 'express';
import type { SessionManager } from './detection/SessionManager.js';
import { TrafficSimulator } from './simulation/TrafficSimulator.js';
import type { DetectionLogger } from './utils/logger/detectionLogger.js';
import { createSessionRouter } from './routes/sessions.js';
import { createMetricsRouter } from './routes/metrics.js';
import {
  createLimiter,
  createStrictLimiter,
  errorHandler,
  type LimiterOptions,
} from './middleware/index.js';

export interface AppOptions {
  manager: SessionManager;
  detectionLogger: DetectionLogger;
  simulator?: TrafficSimulator;
  rateLimit?: LimiterOptions;
}

export function createApp({
  manager,
  detectionLogger,
  simulator = new TrafficSimulator(),
  rateLimit = { windowMs: 60_000, max: 120 },
}: AppOptions) {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    return res
      .status(200)
      .json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createLimiter(rateLimit));

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      if (res.statusCode >= 400) {
        const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
        console.log(`${req.method} ${req.originalUrl} ${res.statusCode} - ${duration.toFixed(2)} ms`);
      }
    });
    next();
  });

  app.use('/sessions', createSessionRouter(manager, simulator));
  app.use('/metrics', createStrictLimiter(rateLimit.windowMs), createMetricsRouter(detectionLogger));

  app.use((req, res) => {
    res.status(404).json({ error: 'NOT_FOUND' });
  });
  app.use(errorHandler);

  return app;
}
