import { Router } from 'express';
import { liveness, readiness } from '../controllers/health.controller.js';
import { promMetrics } from '../controllers/metrics.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';

export const ops = Router();
ops.get('/health/liveness', asyncHandler(liveness));
ops.get('/health/readiness', asyncHandler(readiness));
ops.get('/ops/metrics', asyncHandler(promMetrics));
