import { Request, Response, NextFunction } from 'express';
import { createLogger } from '../../utils/logger';

const logger = createLogger('HTTP');

/**
 * Log each request once its response has been sent
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on('finish', () => {
    const entry = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    };
    if (res.statusCode >= 500) {
      logger.warn('Request failed', entry);
    } else {
      logger.debug('Request completed', entry);
    }
  });

  next();
}
