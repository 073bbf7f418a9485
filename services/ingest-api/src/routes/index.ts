import { Router, type Request, type Response, type NextFunction } from 'express';
import { httpReqDuration } from '../metrics/metrics.js';
import type { Pipelines } from '../pipeline/index.js';
import { ops } from './ops.routes.js';
import { publicRoutes } from './public.routes.js';

export function timing(req: Request, res: Response, next: NextFunction) {
  const end = httpReqDuration.startTimer({ method: req.method, route: req.path });
  res.on('finish', () => end({ code: String(res.statusCode) }));
  next();
}

export function apiRouter(pipelines: Pipelines) {
  const r = Router();
  r.use(timing);
  r.use(ops);
  r.use(publicRoutes(pipelines));
  r.use((_req, res) => res.status(404).json({ error: { code: 'NOT_FOUND', message: 'route' } }));
  return r;
}
