// services/ingest-api/src/db/sql.ts
import type { DedupStrategy, TelemetryKeyColumn } from '../pipeline/types.js';

const TELEMETRY_COLUMNS = `id, device_id, device_type, topic, source, message_id, timestamp, payload, received_at, created_at`;

/*
  One multi-row insert per batch. Arrays are positional:
  $1 device_id, $2 device_type, $3 topic, $4 source, $5 message_id,
  $6 ts (epoch ms), $7 payload (jsonb), $8 received_at
*/
export function buildInsertTelemetryBatch(dedup: DedupStrategy): string {
  const conflict =
    dedup.kind === 'keyed'
      ? `\n  ON CONFLICT (${dedup.keyColumns.join(', ')}) DO NOTHING`
      : '';
  return `
  INSERT INTO device_telemetry
    (device_id, device_type, topic, source, message_id, timestamp, payload, received_at)
  SELECT
    device_id, device_type, topic, source, message_id,
    to_timestamp(ts_ms / 1000.0), payload, received_at
  FROM unnest(
    $1::text[], $2::text[], $3::text[], $4::text[], $5::text[],
    $6::bigint[], $7::jsonb[], $8::timestamptz[]
  ) AS rows(device_id, device_type, topic, source, message_id, ts_ms, payload, received_at)${conflict}
`;
}

/*
  ON CONFLICT needs a unique index on exactly the key columns. The key always
  contains message_id, and NULL message ids never collide, so pub/sub rows
  (inserted without a conflict clause) cannot trip it.
*/
export function buildDedupIndex(keyColumns: readonly TelemetryKeyColumn[]): string {
  return `CREATE UNIQUE INDEX IF NOT EXISTS uq_device_telemetry_${keyColumns.join('_')}
      ON device_telemetry(${keyColumns.join(', ')})`;
}

export const SQL = {
  schema: [
    `CREATE TABLE IF NOT EXISTS device_telemetry (
      id          BIGSERIAL PRIMARY KEY,
      device_id   VARCHAR(255) NOT NULL,
      device_type VARCHAR(100),
      topic       VARCHAR(255),
      source      VARCHAR(255) NOT NULL,
      message_id  VARCHAR(255),
      timestamp   TIMESTAMPTZ NOT NULL,
      payload     JSONB NOT NULL,
      received_at TIMESTAMPTZ NOT NULL,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
    `CREATE INDEX IF NOT EXISTS idx_device_telemetry_device_id ON device_telemetry(device_id)`,
    `CREATE INDEX IF NOT EXISTS idx_device_telemetry_timestamp ON device_telemetry(timestamp DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_device_telemetry_device_type ON device_telemetry(device_type)`,
    `CREATE INDEX IF NOT EXISTS idx_device_telemetry_created_at ON device_telemetry(created_at DESC)`,
  ],
  telemetry: {
    list: (filters: { deviceId: boolean; deviceType: boolean }) => {
      const where: string[] = [];
      let n = 1;
      if (filters.deviceId) where.push(`device_id = $${n++}`);
      if (filters.deviceType) where.push(`device_type = $${n++}`);
      return `
      SELECT ${TELEMETRY_COLUMNS}
      FROM device_telemetry
      ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY timestamp DESC
      LIMIT $${n} OFFSET $${n + 1}
    `;
    },
    latestByDevice: `
      SELECT ${TELEMETRY_COLUMNS}
      FROM device_telemetry
      WHERE device_id = $1
      ORDER BY timestamp DESC
      LIMIT 1
    `,
    historyByDevice: `
      SELECT ${TELEMETRY_COLUMNS}
      FROM device_telemetry
      WHERE device_id = $1
        AND timestamp > now() - make_interval(hours => $2::int)
      ORDER BY timestamp DESC
    `,
    deleteOlderThan: `
      DELETE FROM device_telemetry
      WHERE timestamp < now() - make_interval(days => $1::int)
    `,
  },
  devices: {
    list: `
      SELECT
        device_id,
        COALESCE(device_type, 'unknown') AS device_type,
        MAX(timestamp)                    AS last_seen,
        COUNT(*)::int                     AS message_count
      FROM device_telemetry
      GROUP BY device_id, device_type
      ORDER BY last_seen DESC
    `,
  },
  stats: {
    totals: `
      SELECT
        COUNT(*)::int                  AS total_messages,
        COUNT(DISTINCT device_id)::int AS total_devices,
        MIN(timestamp)                 AS oldest_message,
        MAX(timestamp)                 AS newest_message
      FROM device_telemetry
    `,
    byType: `
      SELECT COALESCE(device_type, 'unknown') AS device_type, COUNT(*)::int AS count
      FROM device_telemetry
      GROUP BY 1
    `,
  },
} as const;
