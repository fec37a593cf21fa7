/**
 * Request Logger Middleware
 */
import type { Request, Response, NextFunction } from 'express';
import { getLogger } from '../../../config/logger.js';

const logger = getLogger().child({ middleware: 'request-logger' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    logger[level](
      { method: req.method, url: req.originalUrl, status: res.statusCode, durationMs },
      `${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs}ms`,
    );
  });

  next();
}
