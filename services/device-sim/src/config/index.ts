import { DEFAULT_FLEET, parseFleet } from '../devices/fleet.js';

function num(raw: string | undefined, dflt: number): number {
  const val = Number(raw ?? '');
  return raw !== undefined && raw !== '' && Number.isFinite(val) ? val : dflt;
}

export const cfg = {
  env: process.env.NODE_ENV ?? 'development',

  redisUrl: process.env.REDIS_URL ?? 'redis://127.0.0.1:6379',
  publish: (process.env.SIM_PUBLISH ?? '1') === '1',
  latencyPattern: process.env.LATENCY_PATTERN ?? 'devices/*/telemetry',

  fleet: parseFleet(process.env.SIM_FLEET ?? DEFAULT_FLEET),
  // 0.1 runs every device ten times faster than its board default
  intervalScale: Math.max(0.001, num(process.env.SIM_INTERVAL_SCALE, 1)),
  jitter: Math.max(0, Math.min(1, num(process.env.JITTER, 0.2))),

  // e.g. http://localhost:8000/ingest; unset disables the HTTP path
  ingestUrl: process.env.INGEST_URL || undefined,
  appId: process.env.SIM_APP_ID ?? 'device-sim',
  apiKey: process.env.INGEST_API_KEY || undefined,

  timeoutMs: Math.max(1000, num(process.env.TIMEOUT_MS, 8000)),
  retry: Math.max(0, num(process.env.RETRY, 3)),
  retryBaseMs: Math.max(50, num(process.env.RETRY_BASE_MS, 150)),

  opsPort: num(process.env.OPS_PORT ?? process.env.PORT, 0),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logPretty: process.env.LOG_PRETTY === '1',
} as const;
