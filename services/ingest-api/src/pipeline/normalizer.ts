import { logger } from '../logger.js';
import type { IngestBody } from '../utils/validators.js';
import { MAX_TIMESTAMP_MS, type JsonObject, type NormalizedRecord } from './types.js';

export const MAX_CLOCK_SKEW_MS = 7 * 24 * 60 * 60 * 1000;
export const UNKNOWN = 'unknown';
export const PUBSUB_SOURCE = 'pubsub';

const utf8 = new TextDecoder('utf-8', { fatal: true });

// JSON.parse only ever yields JSON values, so a top-level check is enough.
function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** `devices/{device_id}/telemetry` → `device_id`; any other shape → "unknown". */
export function deviceIdFromTopic(topic: string): string {
  const parts = topic.split('/');
  return parts.length > 1 && parts[1] ? parts[1] : UNKNOWN;
}

function deviceTypeOf(payload: JsonObject): string {
  const t = payload.device_type;
  return typeof t === 'string' && t.length > 0 ? t : UNKNOWN;
}

/** Pulls a timestamp in range; far-off clocks are clamped to `now`, not rejected. */
export function clampTimestamp(ts: number, now: number): number {
  return Math.abs(ts - now) > MAX_CLOCK_SKEW_MS ? now : ts;
}

/**
 * Pub/sub input: topic plus opaque bytes. Returns null (and logs) for anything
 * that cannot become a valid record; never throws.
 */
export function normalizePubSub(
  topic: string,
  raw: string | Uint8Array,
  now: number = Date.now(),
): NormalizedRecord | null {
  const deviceId = deviceIdFromTopic(topic);

  let body: unknown;
  try {
    body = JSON.parse(typeof raw === 'string' ? raw : utf8.decode(raw));
  } catch (err) {
    logger.error({ topic, err }, 'telemetry payload is not valid JSON');
    return null;
  }
  if (!isJsonObject(body)) {
    logger.warn({ topic }, 'telemetry payload is not a JSON object');
    return null;
  }

  let ts = now;
  if (body.ts !== undefined) {
    if (typeof body.ts !== 'number' || !Number.isFinite(body.ts)) {
      logger.warn({ deviceId, ts: body.ts }, 'telemetry ts is not a number');
      return null;
    }
    ts = Math.trunc(body.ts);
  }
  if (ts <= 0) {
    logger.warn({ deviceId, ts }, 'invalid telemetry timestamp');
    return null;
  }

  const timestamp = clampTimestamp(ts, now);
  if (timestamp !== ts) logger.warn({ deviceId, ts }, 'timestamp out of range, clamped to now');

  return {
    deviceId,
    deviceType: deviceTypeOf(body),
    topic,
    source: PUBSUB_SOURCE,
    timestamp,
    payload: body,
    receivedAt: new Date(now),
  };
}

/** HTTP input arrives pre-structured; only the timestamp range is checked here. */
export function normalizeHttp(body: IngestBody, now: number = Date.now()): NormalizedRecord | null {
  if (!Number.isFinite(body.ts) || body.ts <= 0 || body.ts > MAX_TIMESTAMP_MS) {
    logger.warn({ app: body.app_id, ts: body.ts }, 'invalid telemetry timestamp');
    return null;
  }
  const record: NormalizedRecord = {
    deviceId: body.device_id ?? body.app_id,
    deviceType: deviceTypeOf(body.payload),
    topic: body.topic ?? null,
    source: body.app_id,
    timestamp: Math.trunc(body.ts),
    payload: body.payload,
    receivedAt: new Date(now),
  };
  if (body.msg_id !== undefined) record.messageId = body.msg_id;
  return record;
}
