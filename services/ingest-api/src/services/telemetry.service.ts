import type { DeleteResult, DeviceInfo, TelemetryRow, TelemetryStats } from '../types/domain.js';
import type { TelemetryQuery } from '../utils/validators.js';
import { httpError } from '../utils/http-error.js';
import { logger } from '../logger.js';
import {
  listTelemetry,
  listDevices,
  getLatestTelemetry,
  getDeviceHistory,
  getTotals,
  countByDeviceType,
  deleteOlderThan,
} from '../repositories/telemetry.repo.js';

export async function listTelemetrySvc(q: TelemetryQuery): Promise<TelemetryRow[]> {
  return listTelemetry({
    deviceId: q.device_id,
    deviceType: q.device_type,
    limit: q.limit,
    offset: q.offset,
  });
}

export async function listDevicesSvc(): Promise<DeviceInfo[]> {
  return listDevices();
}

export async function latestTelemetrySvc(deviceId: string): Promise<TelemetryRow> {
  const row = await getLatestTelemetry(deviceId);
  if (!row) throw httpError(404, 'NOT_FOUND', `Device ${deviceId} not found`);
  return row;
}

export async function deviceHistorySvc(deviceId: string, hours: number): Promise<TelemetryRow[]> {
  return getDeviceHistory(deviceId, hours);
}

export async function telemetryStatsSvc(): Promise<TelemetryStats> {
  const [totals, types] = await Promise.all([getTotals(), countByDeviceType()]);
  const device_types: Record<string, number> = {};
  for (const t of types) device_types[t.device_type] = t.count;
  return { ...totals, device_types };
}

export async function deleteOldTelemetrySvc(days: number): Promise<DeleteResult> {
  const deleted = await deleteOlderThan(days);
  logger.info({ deleted, days }, 'deleted old telemetry');
  return { status: 'success', deleted_records: deleted, older_than_days: days };
}
