import type { ErrorRequestHandler } from 'express';
import { logger } from '../logger.js';
import { codeOf, statusOf } from '../utils/http-error.js';

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const status = statusOf(err);
  const code = codeOf(err, status);
  const message = err instanceof Error ? err.message : 'internal error';
  // 503 is backpressure, an expected condition under load
  if (status >= 500 && status !== 503) logger.error({ err, rid: res.locals.rid }, 'request error');
  else logger.warn({ code, message, rid: res.locals.rid }, 'request rejected');
  res.status(status).json({ error: { code, message } });
};
