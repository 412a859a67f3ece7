import type { ErrorRequestHandler } from 'express';
import { DuetrackError } from '@duetrack/core';
import type { Logger } from '../lib/logger.js';

/** The 4xx status a body parser attaches to its errors, if any */
export function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/** Last middleware: client errors keep their status, everything else fails with 500 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof DuetrackError && err.code === 'NOT_FOUND') {
      res.status(404).json({ error: err.message });
      return;
    }
    const status = clientErrorStatus(err);
    if (status != null) {
      const message = err instanceof Error ? err.message : 'Bad request';
      logger.warn(`${req.method} ${req.originalUrl} rejected: ${message}`);
      res.status(status).json({ error: message });
      return;
    }
    logger.error(`${req.method} ${req.originalUrl} failed`, err);
    res.status(500).json({ error: 'Internal error' });
  };
}
