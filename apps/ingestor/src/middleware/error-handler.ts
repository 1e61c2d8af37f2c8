import type { Request, Response, NextFunction } from 'express';

/** Last-resort handler: the liveness route itself never throws. */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  console.error('[health] request error', err instanceof Error ? err.message : err);
  res.status(500).json({ error: 'Internal server error' });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found' });
}
