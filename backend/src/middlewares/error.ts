import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';

function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser and http-errors carry their own status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function errorHandler(logger: Logger = silentLogger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error ? err.message : 'Internal Error';
    if (status >= 500) logger.error(message);
    res.status(status).json({ ok: false, error: status >= 500 && !(err instanceof AppError) ? 'Internal Error' : message });
  };
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({ ok: false, error: `Not found: ${req.method} ${req.path}` });
}
