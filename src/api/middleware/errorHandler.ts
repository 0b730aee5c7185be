import { Request, Response, NextFunction } from 'express';
import { AppError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof AppError) {
    const meta = { path: req.path, code: error.code, message: error.message };
    if (error.statusCode >= 500) {
      logger.error('Request failed', meta);
    } else {
      logger.warn('Request failed', meta);
    }
    res.status(error.statusCode).type('text/plain').send(error.message);
    return;
  }

  logger.error('Unhandled request error', {
    path: req.path,
    error: error instanceof Error ? error.stack ?? error.message : String(error),
  });
  res.status(500).type('text/plain').send('Internal server error');
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    logger.info('HTTP request', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: Date.now() - start,
      ip: req.ip,
    });
  });
  next();
}
