import type { Request, Response, NextFunction } from 'express';
import { config } from '../config.js';

// Only the write path can be locked down; reads, health and docs stay open.
// With no INGEST_API_KEY configured, ingest is open as well.
export function maybeApiKey(req: Request, res: Response, next: NextFunction) {
  if (!config.ingestApiKey) return next();

  const headerKey = req.header('x-api-key');
  if (!headerKey || headerKey !== config.ingestApiKey) {
    return res.status(401).json({
      error: { code: 'AUTH_REQUIRED', message: 'invalid or missing x-api-key' }
    });
  }
  return next();
}
