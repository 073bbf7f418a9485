import { Router } from 'express';
import { ingestCtrl } from '../controllers/ingest.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { maybeApiKey } from '../middleware/auth.js';
import type { IngestionPipeline } from '../pipeline/pipeline.js';

export function ingestRoutes(pipeline: IngestionPipeline) {
  const r = Router();
  r.post('/ingest', maybeApiKey, asyncHandler(ingestCtrl(pipeline)));
  return r;
}
