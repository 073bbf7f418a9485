import { buildInsertTelemetryBatch } from '../db/sql.js';
import { logger } from '../logger.js';
import type { BatchSink, DedupStrategy, NormalizedRecord } from './types.js';
import { NO_DEDUP } from './types.js';

// The slice of pg's Pool / PoolClient the writer relies on.
export interface WriterClient {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
  release(err?: Error | boolean): void;
}
export interface WriterPool {
  connect(): Promise<WriterClient>;
}

export function toColumnArrays(batch: NormalizedRecord[]): unknown[] {
  return [
    batch.map(r => r.deviceId),
    batch.map(r => r.deviceType),
    batch.map(r => r.topic),
    batch.map(r => r.source),
    batch.map(r => r.messageId ?? null),
    batch.map(r => r.timestamp),
    batch.map(r => JSON.stringify(r.payload)),
    batch.map(r => r.receivedAt.toISOString()),
  ];
}

/**
 * Persists a whole batch in one statement inside one transaction. A client is
 * checked out per batch and handed back right after, so readers sharing the
 * pool are never starved. Any failure rejects the batch as a unit.
 */
export class BatchWriter implements BatchSink<NormalizedRecord> {
  private readonly insertSql: string;

  constructor(
    private readonly pool: WriterPool,
    readonly dedup: DedupStrategy = NO_DEDUP,
  ) {
    this.insertSql = buildInsertTelemetryBatch(dedup);
  }

  async persist(batch: NormalizedRecord[]): Promise<number> {
    if (batch.length === 0) return 0;

    const client = await this.pool.connect();
    let broken = false;
    try {
      await client.query('BEGIN');
      const r = await client.query(this.insertSql, toColumnArrays(batch));
      await client.query('COMMIT');
      return r.rowCount ?? batch.length;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        // connection is unusable; drop it from the pool instead of returning it
        broken = true;
        logger.warn({ err: rollbackErr }, 'rollback failed');
      }
      throw err;
    } finally {
      client.release(broken);
    }
  }
}
