import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const httpLogger = logger.child({ module: 'http' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'debug';

    httpLogger[level](
      { method: req.method, path: req.path, statusCode: res.statusCode, durationMs: Math.round(durationMs) },
      'Supervision request handled',
    );
  });

  next();
}
