import { pg } from '../db/pool.js';
import { SQL } from '../db/sql.js';
import type { DeviceInfo, TelemetryRow } from '../types/domain.js';

// BIGSERIAL comes back from node-pg as a string
type TelemetryDbRow = Omit<TelemetryRow, 'id'> & { id: string | number };

function toRow(r: TelemetryDbRow): TelemetryRow {
  return { ...r, id: Number(r.id) };
}

export type TelemetryFilter = {
  deviceId?: string;
  deviceType?: string;
  limit: number;
  offset: number;
};

export async function listTelemetry(f: TelemetryFilter): Promise<TelemetryRow[]> {
  const text = SQL.telemetry.list({ deviceId: !!f.deviceId, deviceType: !!f.deviceType });
  const values: (string | number)[] = [];
  if (f.deviceId) values.push(f.deviceId);
  if (f.deviceType) values.push(f.deviceType);
  values.push(f.limit, f.offset);
  const { rows } = await pg.query<TelemetryDbRow>(text, values);
  return rows.map(toRow);
}

export async function getLatestTelemetry(deviceId: string): Promise<TelemetryRow | null> {
  const { rows } = await pg.query<TelemetryDbRow>(SQL.telemetry.latestByDevice, [deviceId]);
  return rows[0] ? toRow(rows[0]) : null;
}

export async function getDeviceHistory(deviceId: string, hours: number): Promise<TelemetryRow[]> {
  const { rows } = await pg.query<TelemetryDbRow>(SQL.telemetry.historyByDevice, [deviceId, hours]);
  return rows.map(toRow);
}

export async function listDevices(): Promise<DeviceInfo[]> {
  const { rows } = await pg.query<DeviceInfo>(SQL.devices.list);
  return rows;
}

export async function getTotals() {
  const { rows } = await pg.query<{
    total_messages: number;
    total_devices: number;
    oldest_message: Date | null;
    newest_message: Date | null;
  }>(SQL.stats.totals);
  return rows[0] ?? { total_messages: 0, total_devices: 0, oldest_message: null, newest_message: null };
}

export async function countByDeviceType() {
  const { rows } = await pg.query<{ device_type: string; count: number }>(SQL.stats.byType);
  return rows;
}

export async function deleteOlderThan(days: number): Promise<number> {
  const r = await pg.query(SQL.telemetry.deleteOlderThan, [days]);
  return r.rowCount ?? 0;
}
