import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { DetectionError, DetectionErrorType } from '../detection/errors.js';

const STATUS_BY_TYPE: Record<DetectionErrorType, number> = {
  [DetectionErrorType.INVALID_CONFIGURATION]: 400,
  [DetectionErrorType.SESSION_NOT_FOUND]: 404,
  [DetectionErrorType.SESSION_CLOSED]: 409,
};

/**
 * Maps detection and validation errors to JSON responses
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'INVALID_REQUEST', issues: err.issues });
  }

  if (err instanceof DetectionError) {
    return res.status(STATUS_BY_TYPE[err.type]).json({ error: err.type, message: err.message });
  }

  // express.json() reports malformed bodies with a status of its own
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ error: 'INVALID_REQUEST', message: 'Malformed JSON body' });
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  return res.status(500).json({ error: 'INTERNAL_ERROR' });
};
