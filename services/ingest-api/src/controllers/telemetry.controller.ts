import type { Request, Response } from 'express';
import { TelemetryQuery, HistoryQuery, DeleteQuery } from '../utils/validators.js';
import { httpError } from '../utils/http-error.js';
import {
  listTelemetrySvc,
  listDevicesSvc,
  latestTelemetrySvc,
  deviceHistorySvc,
  telemetryStatsSvc,
  deleteOldTelemetrySvc,
} from '../services/telemetry.service.js';

function invalid(message: string) {
  return httpError(422, 'VALIDATION_ERROR', message);
}

export async function listTelemetryCtrl(req: Request, res: Response) {
  const q = TelemetryQuery.safeParse(req.query);
  if (!q.success) throw invalid(q.error.message);
  res.json(await listTelemetrySvc(q.data));
}

export async function listDevicesCtrl(_req: Request, res: Response) {
  res.json(await listDevicesSvc());
}

export async function latestTelemetryCtrl(req: Request, res: Response) {
  res.json(await latestTelemetrySvc(req.params.deviceId));
}

export async function deviceHistoryCtrl(req: Request, res: Response) {
  const q = HistoryQuery.safeParse(req.query);
  if (!q.success) throw invalid(q.error.message);
  res.json(await deviceHistorySvc(req.params.deviceId, q.data.hours));
}

export async function telemetryStatsCtrl(_req: Request, res: Response) {
  res.json(await telemetryStatsSvc());
}

export async function deleteOldTelemetryCtrl(req: Request, res: Response) {
  const q = DeleteQuery.safeParse(req.query);
  if (!q.success) throw invalid(q.error.message);
  res.json(await deleteOldTelemetrySvc(q.data.days));
}
