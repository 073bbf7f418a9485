import { describe, it, expect, vi } from 'vitest';
import { BatchWriter, toColumnArrays, type WriterClient, type WriterPool } from '../../src/pipeline/batch-writer.js';
import { buildInsertTelemetryBatch } from '../../src/db/sql.js';
import { keyedDedup, NO_DEDUP, type NormalizedRecord } from '../../src/pipeline/types.js';

type QueryResult = { rowCount: number | null };

function fakePool(respond: (text: string) => Promise<QueryResult>) {
  const texts: string[] = [];
  const values: unknown[][] = [];
  const release = vi.fn();
  const client: WriterClient = {
    query: async (text: string, v?: unknown[]) => {
      texts.push(text.trim().split(/\s+/).slice(0, 3).join(' '));
      if (v) values.push(v);
      return respond(text);
    },
    release,
  };
  const connect = vi.fn(async () => client);
  const pool: WriterPool = { connect };
  return { pool, texts, values, release, connect, client };
}

function rec(i: number, messageId?: string): NormalizedRecord {
  const r: NormalizedRecord = {
    deviceId: `dev-${i}`,
    deviceType: 'ESP32',
    topic: i % 2 ? `devices/dev-${i}/telemetry` : null,
    source: 'app-1',
    timestamp: 1_700_000_000_000 + i,
    payload: { seq: i },
    receivedAt: new Date(0),
  };
  if (messageId) r.messageId = messageId;
  return r;
}

const ok = (rowCount: number | null) => async () => ({ rowCount });

describe('buildInsertTelemetryBatch', () => {
  it('omits the conflict clause without dedup', () => {
    expect(buildInsertTelemetryBatch(NO_DEDUP)).not.toContain('ON CONFLICT');
  });

  it('targets the configured key columns', () => {
    expect(buildInsertTelemetryBatch(keyedDedup(['source', 'message_id']))).toContain(
      'ON CONFLICT (source, message_id) DO NOTHING',
    );
    expect(buildInsertTelemetryBatch(keyedDedup(['device_id', 'topic']))).toContain(
      'ON CONFLICT (device_id, topic) DO NOTHING',
    );
  });

  it('refuses an empty key', () => {
    expect(() => keyedDedup([])).toThrow('keyed dedup needs at least one column');
  });
});

describe('toColumnArrays', () => {
  it('lays the batch out column by column', () => {
    expect(toColumnArrays([rec(1, 'm-1'), rec(2)])).toEqual([
      ['dev-1', 'dev-2'],
      ['ESP32', 'ESP32'],
      ['devices/dev-1/telemetry', null],
      ['app-1', 'app-1'],
      ['m-1', null],
      [1_700_000_000_001, 1_700_000_000_002],
      ['{"seq":1}', '{"seq":2}'],
      ['1970-01-01T00:00:00.000Z', '1970-01-01T00:00:00.000Z'],
    ]);
  });
});

describe('BatchWriter', () => {
  it('writes a batch in one transaction and releases the client', async () => {
    const f = fakePool(ok(2));
    const n = await new BatchWriter(f.pool).persist([rec(1), rec(2)]);

    expect(n).toBe(2);
    expect(f.texts).toEqual(['BEGIN', 'INSERT INTO device_telemetry', 'COMMIT']);
    expect(f.values).toHaveLength(1);
    expect(f.release).toHaveBeenCalledWith(false);
  });

  it('reports rows actually inserted when duplicates were skipped', async () => {
    const f = fakePool(async (text) => ({ rowCount: text.includes('INSERT') ? 1 : null }));
    const writer = new BatchWriter(f.pool, keyedDedup(['source', 'message_id']));
    expect(await writer.persist([rec(1, 'm-1'), rec(2, 'm-1')])).toBe(1);
  });

  it('falls back to the batch length when the driver gives no row count', async () => {
    const f = fakePool(ok(null));
    expect(await new BatchWriter(f.pool).persist([rec(1), rec(2), rec(3)])).toBe(3);
  });

  it('does not touch the pool for an empty batch', async () => {
    const f = fakePool(ok(0));
    expect(await new BatchWriter(f.pool).persist([])).toBe(0);
    expect(f.connect).not.toHaveBeenCalled();
  });

  it('rolls back and rethrows when the insert fails', async () => {
    const boom = new Error('insert failed');
    const f = fakePool(async (text) => {
      if (text.includes('INSERT')) throw boom;
      return { rowCount: null };
    });

    await expect(new BatchWriter(f.pool).persist([rec(1)])).rejects.toBe(boom);
    expect(f.texts).toEqual(['BEGIN', 'INSERT INTO device_telemetry', 'ROLLBACK']);
    expect(f.release).toHaveBeenCalledWith(false);
  });

  it('discards the client when the rollback fails as well', async () => {
    const boom = new Error('connection reset');
    const f = fakePool(async (text) => {
      if (text.includes('INSERT') || text === 'ROLLBACK') throw boom;
      return { rowCount: null };
    });

    await expect(new BatchWriter(f.pool).persist([rec(1)])).rejects.toBe(boom);
    expect(f.release).toHaveBeenCalledWith(true);
  });
});
