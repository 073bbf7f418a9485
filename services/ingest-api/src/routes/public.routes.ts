import { Router } from 'express';
import {
  listTelemetryCtrl,
  listDevicesCtrl,
  latestTelemetryCtrl,
  deviceHistoryCtrl,
  telemetryStatsCtrl,
  deleteOldTelemetryCtrl,
} from '../controllers/telemetry.controller.js';
import { pipelineStatsCtrl } from '../controllers/pipeline.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import type { Pipelines } from '../pipeline/index.js';

export function publicRoutes(pipelines: Pipelines) {
  const pub = Router();
  pub.get('/telemetry', asyncHandler(listTelemetryCtrl));
  pub.delete('/telemetry', asyncHandler(deleteOldTelemetryCtrl));
  pub.get('/devices', asyncHandler(listDevicesCtrl));
  pub.get('/device/:deviceId/latest', asyncHandler(latestTelemetryCtrl));
  pub.get('/device/:deviceId/history', asyncHandler(deviceHistoryCtrl));
  pub.get('/stats', asyncHandler(telemetryStatsCtrl));
  pub.get('/pipeline/stats', asyncHandler(pipelineStatsCtrl(pipelines)));
  return pub;
}
