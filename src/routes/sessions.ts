import { Router } from 'express';
import type { SessionManager } from '../detection/SessionManager.js';
import type { TrafficSimulator } from '../simulation/TrafficSimulator.js';
import {
  eventBatchSchema,
  sessionSettingsSchema,
  simulationSchema,
} from './schemas.js';

export function createSessionRouter(manager: SessionManager, simulator: TrafficSimulator): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({ sessions: manager.listSessions() });
  });

  router.post('/', (req, res) => {
    const settings = sessionSettingsSchema.parse(req.body ?? {});
    res.status(201).json(manager.startSession(settings));
  });

  router.get('/:id', (req, res) => {
    const session = manager.getSession(req.params.id);
    res.json({
      ...session,
      stats: manager.statistics(session.id),
      suspiciousAddresses: manager.suspiciousAddresses(session.id),
    });
  });

  router.get('/:id/stats', (req, res) => {
    res.json(manager.statistics(req.params.id));
  });

  router.post('/:id/events', (req, res) => {
    const { events } = eventBatchSchema.parse(req.body);
    const alerts = manager.ingestBatch(req.params.id, events);
    res.json({ processed: events.length, alerts });
  });

  router.post('/:id/simulate', (req, res) => {
    const options = simulationSchema.parse(req.body ?? {});
    res.json(manager.simulate(req.params.id, simulator, options));
  });

  router.delete('/:id', (req, res) => {
    res.json(manager.stopSession(req.params.id));
  });

  return router;
}
