import { Router } from 'express';
import type { DetectionLogger } from '../utils/logger/detectionLogger.js';

export function createMetricsRouter(detectionLogger: DetectionLogger): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const content = detectionLogger.read();
    if (content === null) {
      res.type('text/plain').send('No metrics yet');
      return;
    }
    res.type('text/plain').send(content);
  });

  return router;
}
