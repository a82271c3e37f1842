import { NextFunction, Request, Response } from 'express';
import { AppError } from '../utils/errors';

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    console.error(`[http] ${err.code}: ${err.message}`);
    res.status(err.status).json({ error: { code: err.code, message: err.message } });
    return;
  }
  const message = err instanceof Error && err.message ? err.message : 'Internal Server Error';
  console.error('[http] unhandled error:', err);
  res.status(500).json({ error: { code: 'InternalServerError', message } });
}
