import { describe, it, expect, vi } from 'vitest';
import { IngestBody, TelemetryQuery, HistoryQuery, DeleteQuery } from '../../src/utils/validators.js';
import { parseDedupKey } from '../../src/config.js';

describe('IngestBody', () => {
  it('accepts nested JSON payloads', () => {
    const r = IngestBody.safeParse({ app_id: 'a', ts: 1, payload: { a: { b: [1, 'two', null, false] } } });
    expect(r.success).toBe(true);
  });

  it('rejects a missing app_id, a non-integer ts and a non-object payload', () => {
    expect(IngestBody.safeParse({ ts: 1, payload: {} }).success).toBe(false);
    expect(IngestBody.safeParse({ app_id: 'a', ts: 1.5, payload: {} }).success).toBe(false);
    expect(IngestBody.safeParse({ app_id: 'a', ts: 1, payload: [1] }).success).toBe(false);
  });

  it('rejects a ts beyond the range a timestamp column can hold', () => {
    expect(IngestBody.safeParse({ app_id: 'a', ts: 1e16, payload: {} }).success).toBe(false);
    expect(IngestBody.safeParse({ app_id: 'a', ts: 1e300, payload: {} }).success).toBe(false);
    expect(IngestBody.safeParse({ app_id: 'a', ts: 8.64e15, payload: {} }).success).toBe(true);
  });

  it('explains a non-positive ts', () => {
    const r = IngestBody.safeParse({ app_id: 'a', ts: 0, payload: {} });
    expect(r.success).toBe(false);
    if (!r.success) expect(r.error.issues[0]?.message).toBe('ts must be epoch ms > 0');
  });
});

describe('query schemas', () => {
  it('coerces query strings and applies defaults', () => {
    expect(TelemetryQuery.parse({ limit: '25' })).toEqual({ limit: 25, offset: 0 });
    expect(HistoryQuery.parse({})).toEqual({ hours: 24 });
    expect(DeleteQuery.parse({ days: '7' })).toEqual({ days: 7 });
  });

  it('enforces bounds', () => {
    expect(TelemetryQuery.safeParse({ limit: '1001' }).success).toBe(false);
    expect(TelemetryQuery.safeParse({ offset: '-1' }).success).toBe(false);
    expect(HistoryQuery.safeParse({ hours: '169' }).success).toBe(false);
    expect(DeleteQuery.safeParse({ days: '0' }).success).toBe(false);
  });
});

describe('parseDedupKey', () => {
  it('reads a CSV of known columns', () => {
    expect(parseDedupKey('source, message_id')).toEqual(['source', 'message_id']);
    expect(parseDedupKey('message_id,message_id')).toEqual(['message_id']);
  });

  it('rejects unknown or empty keys', () => {
    expect(() => parseDedupKey('payload')).toThrow(/INGEST_DEDUP_KEY/);
    expect(() => parseDedupKey(' , ')).toThrow(/INGEST_DEDUP_KEY/);
  });

  it('requires message_id so rows without a token never conflict', () => {
    expect(() => parseDedupKey('source,device_id')).toThrow(/including message_id/);
  });
});

describe('config defaults', () => {
  it('keeps pretty logging off unless LOG_PRETTY=1', async () => {
    const saved = process.env.LOG_PRETTY;
    delete process.env.LOG_PRETTY;
    try {
      vi.resetModules();
      const { config } = await import('../../src/config.js');
      expect(config.logPretty).toBe(false);
    } finally {
      if (saved !== undefined) process.env.LOG_PRETTY = saved;
    }
  });
});
