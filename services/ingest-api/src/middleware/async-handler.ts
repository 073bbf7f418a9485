import type { Request, Response, NextFunction, RequestHandler } from 'express';

type Handler = (req: Request, res: Response) => Promise<unknown> | unknown;

// Rejections and synchronous throws both land in the error middleware.
export const asyncHandler = (fn: Handler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    try {
      Promise.resolve(fn(req, res)).catch(next);
    } catch (err) {
      next(err);
    }
  };
