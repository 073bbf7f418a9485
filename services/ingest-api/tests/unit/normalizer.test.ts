import { describe, it, expect } from 'vitest';
import {
  normalizePubSub,
  normalizeHttp,
  deviceIdFromTopic,
  clampTimestamp,
  MAX_CLOCK_SKEW_MS,
} from '../../src/pipeline/normalizer.js';

const NOW = 1_700_000_000_000;
const TOPIC = 'devices/esp-1/telemetry';

describe('deviceIdFromTopic', () => {
  it('takes the second segment of the topic', () => {
    expect(deviceIdFromTopic('devices/esp-1/telemetry')).toBe('esp-1');
    expect(deviceIdFromTopic('devices/pico-7')).toBe('pico-7');
  });

  it('falls back to "unknown" for short or empty segments', () => {
    expect(deviceIdFromTopic('telemetry')).toBe('unknown');
    expect(deviceIdFromTopic('devices//telemetry')).toBe('unknown');
  });
});

describe('clampTimestamp', () => {
  it('keeps timestamps within the skew window', () => {
    expect(clampTimestamp(NOW - MAX_CLOCK_SKEW_MS, NOW)).toBe(NOW - MAX_CLOCK_SKEW_MS);
  });

  it('replaces timestamps beyond the window with now', () => {
    expect(clampTimestamp(NOW + MAX_CLOCK_SKEW_MS + 1, NOW)).toBe(NOW);
    expect(clampTimestamp(NOW - MAX_CLOCK_SKEW_MS - 1, NOW)).toBe(NOW);
  });
});

describe('normalizePubSub', () => {
  it('builds a record from a well-formed message', () => {
    const raw = JSON.stringify({ ts: NOW - 1000, device_type: 'ESP32', temperature: 22.5 });
    expect(normalizePubSub(TOPIC, raw, NOW)).toEqual({
      deviceId: 'esp-1',
      deviceType: 'ESP32',
      topic: TOPIC,
      source: 'pubsub',
      timestamp: NOW - 1000,
      payload: { ts: NOW - 1000, device_type: 'ESP32', temperature: 22.5 },
      receivedAt: new Date(NOW),
    });
  });

  it('accepts raw bytes', () => {
    const raw = new TextEncoder().encode(JSON.stringify({ ts: NOW, device_type: 'STM32' }));
    expect(normalizePubSub(TOPIC, raw, NOW)?.deviceType).toBe('STM32');
  });

  it('uses the receive time when ts is absent', () => {
    expect(normalizePubSub(TOPIC, '{"humidity":40}', NOW)?.timestamp).toBe(NOW);
  });

  it('truncates fractional timestamps', () => {
    expect(normalizePubSub(TOPIC, JSON.stringify({ ts: NOW - 10.7 }), NOW)?.timestamp).toBe(NOW - 11);
  });

  it('clamps a positive but implausible ts to now', () => {
    expect(normalizePubSub(TOPIC, '{"ts":1}', NOW)?.timestamp).toBe(NOW);
  });

  it('rejects a non-positive ts before any clamping', () => {
    expect(normalizePubSub(TOPIC, '{"ts":-5}', NOW)).toBeNull();
    expect(normalizePubSub(TOPIC, '{"ts":0}', NOW)).toBeNull();
  });

  it('rejects a ts that is not a number', () => {
    expect(normalizePubSub(TOPIC, '{"ts":"yesterday"}', NOW)).toBeNull();
  });

  it('rejects malformed JSON and non-object payloads', () => {
    expect(normalizePubSub(TOPIC, '{not json', NOW)).toBeNull();
    expect(normalizePubSub(TOPIC, '[1,2,3]', NOW)).toBeNull();
    expect(normalizePubSub(TOPIC, '42', NOW)).toBeNull();
    expect(normalizePubSub(TOPIC, new Uint8Array([0xff, 0xfe]), NOW)).toBeNull();
  });

  it('defaults device type and device id to "unknown"', () => {
    const r = normalizePubSub('telemetry', '{"device_type":7}', NOW);
    expect(r?.deviceId).toBe('unknown');
    expect(r?.deviceType).toBe('unknown');
  });
});

describe('normalizeHttp', () => {
  it('uses app_id as source and as device id fallback', () => {
    const r = normalizeHttp(
      { app_id: 'app-1', ts: NOW, payload: { device_type: 'Arduino', v: 1 }, msg_id: 'm-1' },
      NOW + 5,
    );
    expect(r).toEqual({
      deviceId: 'app-1',
      deviceType: 'Arduino',
      topic: null,
      source: 'app-1',
      timestamp: NOW,
      payload: { device_type: 'Arduino', v: 1 },
      receivedAt: new Date(NOW + 5),
      messageId: 'm-1',
    });
  });

  it('prefers an explicit device id and keeps the topic', () => {
    const r = normalizeHttp({ app_id: 'app-1', device_id: 'dev-9', topic: 't/1', ts: NOW, payload: {} }, NOW);
    expect(r?.deviceId).toBe('dev-9');
    expect(r?.topic).toBe('t/1');
    expect(r?.messageId).toBeUndefined();
  });

  it('does not clamp old timestamps', () => {
    expect(normalizeHttp({ app_id: 'a', ts: 1000, payload: {} }, NOW)?.timestamp).toBe(1000);
  });

  it('rejects a non-positive ts', () => {
    expect(normalizeHttp({ app_id: 'a', ts: 0, payload: {} }, NOW)).toBeNull();
  });

  it('rejects a ts the store cannot hold', () => {
    expect(normalizeHttp({ app_id: 'a', ts: 1e16, payload: {} }, NOW)).toBeNull();
    expect(normalizeHttp({ app_id: 'a', ts: 1e300, payload: {} }, NOW)).toBeNull();
    expect(normalizeHttp({ app_id: 'a', ts: 8.64e15, payload: {} }, NOW)?.timestamp).toBe(8.64e15);
  });
});
