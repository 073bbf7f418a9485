// services/ingest-api/src/config.ts
import { z } from 'zod';
import { TELEMETRY_KEY_COLUMNS, type TelemetryKeyColumn } from './pipeline/types.js';

const flag = z.union([z.literal('1'), z.literal('0')]);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  API_PREFIX: z.string().default('/api/v1'),

  DATABASE_URL: z.string().optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().optional(),
  PGDATABASE: z.string().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_AUTO_MIGRATE: flag.default('1'),

  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().optional(),
  REDIS_PASSWORD: z.string().optional(),

  PUBSUB_ENABLED: flag.default('1'),
  PUBSUB_PATTERN: z.string().min(1).default('devices/*/telemetry'),

  // pub/sub pipeline
  QUEUE_CAPACITY: z.coerce.number().int().positive().default(10_000),
  BATCH_SIZE: z.coerce.number().int().positive().default(100),
  BATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(10),
  IDLE_SLEEP_MS: z.coerce.number().int().nonnegative().default(100),

  // http pipeline
  HTTP_QUEUE_CAPACITY: z.coerce.number().int().positive().default(10_000),
  HTTP_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  HTTP_BATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(200),
  INGEST_DEDUP_KEY: z.string().default('source,message_id'),
  INGEST_API_KEY: z.string().optional(),

  CORS_ALLOW_ORIGINS: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: flag.default('0'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  console.error('Invalid environment:', parsed.error.flatten());
  process.exit(1);
}
const e = parsed.data;

function buildPgUrl() {
  if (e.DATABASE_URL) return e.DATABASE_URL;
  if (e.PGHOST && e.PGUSER && e.PGDATABASE) {
    const pw = e.PGPASSWORD ? `:${encodeURIComponent(e.PGPASSWORD)}` : '';
    const host = encodeURIComponent(e.PGHOST);
    const port = e.PGPORT ? `:${e.PGPORT}` : '';
    return `postgres://${encodeURIComponent(e.PGUSER)}${pw}@${host}${port}/${encodeURIComponent(e.PGDATABASE)}`;
  }
  return undefined;
}

function buildRedisUrl() {
  if (e.REDIS_URL) return e.REDIS_URL;
  if (e.REDIS_HOST) {
    const port = e.REDIS_PORT ?? 6379;
    const auth = e.REDIS_PASSWORD ? `:${encodeURIComponent(e.REDIS_PASSWORD)}@` : '';
    return `redis://${auth}${e.REDIS_HOST}:${port}`;
  }
  return 'redis://127.0.0.1:6379';
}

function parseCorsOrigins(value?: string) {
  if (!value) return undefined;
  if (value.trim() === '*') return '*';
  const origins = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return origins.length ? origins : undefined;
}

const KeyColumns = z
  .array(z.enum(TELEMETRY_KEY_COLUMNS))
  .min(1)
  .refine((cols) => cols.includes('message_id'), { message: 'must include message_id' });

/**
 * `INGEST_DEDUP_KEY` is a CSV of table columns; anything outside the whitelist
 * is fatal. message_id is mandatory so rows without a token never conflict.
 */
export function parseDedupKey(csv: string): TelemetryKeyColumn[] {
  const parts = csv
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  const r = KeyColumns.safeParse(parts);
  if (!r.success) {
    throw new Error(
      `INGEST_DEDUP_KEY must list columns from ${TELEMETRY_KEY_COLUMNS.join(', ')} including message_id; got "${csv}"`,
    );
  }
  return [...new Set(r.data)];
}

export const config = {
  env: e.NODE_ENV,
  port: e.PORT,
  apiPrefix: e.API_PREFIX,

  databaseUrl: buildPgUrl(),
  dbPoolMax: e.DB_POOL_MAX,
  dbAutoMigrate: e.DB_AUTO_MIGRATE === '1',
  redisUrl: buildRedisUrl(),

  pubsub: {
    enabled: e.PUBSUB_ENABLED === '1',
    pattern: e.PUBSUB_PATTERN,
  },

  pipelines: {
    pubsub: {
      queueCapacity: e.QUEUE_CAPACITY,
      batchSize: e.BATCH_SIZE,
      batchTimeoutMs: e.BATCH_TIMEOUT_MS,
      pollIntervalMs: e.POLL_INTERVAL_MS,
      idleSleepMs: e.IDLE_SLEEP_MS,
    },
    http: {
      queueCapacity: e.HTTP_QUEUE_CAPACITY,
      batchSize: e.HTTP_BATCH_SIZE,
      batchTimeoutMs: e.HTTP_BATCH_TIMEOUT_MS,
      pollIntervalMs: e.POLL_INTERVAL_MS,
      idleSleepMs: e.IDLE_SLEEP_MS,
      dedupKey: parseDedupKey(e.INGEST_DEDUP_KEY),
    },
  },

  ingestApiKey: e.INGEST_API_KEY,
  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',
  cors: {
    origins: parseCorsOrigins(e.CORS_ALLOW_ORIGINS),
  },
} as const;
