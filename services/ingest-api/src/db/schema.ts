import { SQL, buildDedupIndex } from './sql.js';
import { logger } from '../logger.js';
import type { TelemetryKeyColumn } from '../pipeline/types.js';

export interface SchemaRunner {
  query(text: string): Promise<unknown>;
}

export function schemaStatements(dedupKey: readonly TelemetryKeyColumn[]): string[] {
  const [table, ...indexes] = SQL.schema;
  return [table, buildDedupIndex(dedupKey), ...indexes];
}

/**
 * Creates the telemetry table, the unique index backing the HTTP dedup key and
 * the read indexes; safe to run on every boot.
 */
export async function ensureSchema(db: SchemaRunner, dedupKey: readonly TelemetryKeyColumn[]): Promise<void> {
  const statements = schemaStatements(dedupKey);
  for (const stmt of statements) {
    await db.query(stmt);
  }
  logger.info({ statements: statements.length, dedupKey }, 'database schema ready');
}
