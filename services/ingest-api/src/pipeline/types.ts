export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Canonical unit flowing through the pipeline, whatever transport it arrived on. */
export type NormalizedRecord = {
  deviceId: string;
  deviceType: string;
  topic: string | null;
  source: string;
  timestamp: number;      // epoch ms, > 0
  payload: JsonObject;
  receivedAt: Date;
  messageId?: string;
};

// Largest epoch ms a JS Date can hold (year 275760); also inside timestamptz and bigint.
export const MAX_TIMESTAMP_MS = 8.64e15;

export const TELEMETRY_KEY_COLUMNS = ['source', 'message_id', 'device_id', 'topic'] as const;
export type TelemetryKeyColumn = (typeof TELEMETRY_KEY_COLUMNS)[number];

export type DedupStrategy =
  | { kind: 'none' }
  | { kind: 'keyed'; keyColumns: readonly TelemetryKeyColumn[] };

export const NO_DEDUP: DedupStrategy = { kind: 'none' };

export function keyedDedup(keyColumns: readonly TelemetryKeyColumn[]): DedupStrategy {
  if (keyColumns.length === 0) throw new Error('keyed dedup needs at least one column');
  return { kind: 'keyed', keyColumns };
}

/** Anything that can take a batch and persist it in one round trip. */
export interface BatchSink<T> {
  persist(batch: T[]): Promise<number>;
}

export type CollectorOptions = {
  batchSize: number;
  batchTimeoutMs: number;
  pollIntervalMs: number;
  idleSleepMs: number;
  /** back-off after an unexpected loop error */
  errorBackoffMs?: number;
};

export type StatsSnapshot = {
  queue_size: number;
  total_received: number;
  total_ingested: number;
  total_errors: number;
  total_batches: number;
  total_rejected: number;
  success_rate: number;
};
