/**
 * Express error middleware for the dashboard API.
 *
 * Catches errors thrown by route handlers and returns a JSON error
 * response instead of crashing the server.
 */

import type { Request, Response, NextFunction } from 'express';
import { isErrorWithCode, isInvalidInputError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('dashboard');

export function statusFor(err: Error): number {
  if (isInvalidInputError(err)) return 400;
  if (isErrorWithCode(err, 'SCENARIO_NOT_FOUND')) return 404;
  return 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (status >= 500) {
    log.error(err.message);
  } else {
    log.debug(err.message, { status });
  }

  res.status(status).json({ error: err.message });
}
