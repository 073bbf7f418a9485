import type { JsonObject } from '../pipeline/types.js';

export type TelemetryRow = {
  id: number;
  device_id: string;
  device_type: string | null;
  topic: string | null;
  source: string;
  message_id: string | null;
  timestamp: Date;
  payload: JsonObject;
  received_at: Date;
  created_at: Date;
};

export type DeviceInfo = {
  device_id: string;
  device_type: string;
  last_seen: Date;
  message_count: number;
};

export type TelemetryStats = {
  total_messages: number;
  total_devices: number;
  device_types: Record<string, number>;
  oldest_message: Date | null;
  newest_message: Date | null;
};

export type DeleteResult = {
  status: 'success';
  deleted_records: number;
  older_than_days: number;
};

export type IngestAck = { status: 'queued' };
