import { logger } from '../logger.js';
import { config } from '../config.js';
import { dbHealth } from '../db/pool.js';
import { redisHealth } from '../redis/index.js';

const ROUTES: Array<{ method: string; path: string; root?: boolean }> = [
  // write path
  { method: 'POST', path: '/ingest', root: true },
  // ops
  { method: 'GET', path: '/health/liveness' },
  { method: 'GET', path: '/health/readiness' },
  { method: 'GET', path: '/ops/metrics' },
  // query
  { method: 'GET', path: '/telemetry' },
  { method: 'DELETE', path: '/telemetry' },
  { method: 'GET', path: '/devices' },
  { method: 'GET', path: '/device/:deviceId/latest' },
  { method: 'GET', path: '/device/:deviceId/history' },
  { method: 'GET', path: '/stats' },
  { method: 'GET', path: '/pipeline/stats' }
];

export async function logStartupBanner() {
  const [dbOk, rOk] = await Promise.all([
    dbHealth().catch(() => false),
    config.pubsub.enabled ? redisHealth() : Promise.resolve(null)
  ]);

  logger.info({
    env: config.env,
    port: config.port,
    apiPrefix: config.apiPrefix,
    database: dbOk ? 'ok' : 'fail',
    redis: rOk === null ? 'disabled' : rOk ? 'ok' : 'fail',
    pubsubPattern: config.pubsub.enabled ? config.pubsub.pattern : undefined,
    dedupKey: config.pipelines.http.dedupKey.join(',')
  }, 'service startup');

  logger.info('available routes:');
  for (const r of ROUTES) {
    logger.info(`${r.method.padEnd(6)} ${r.root ? '' : config.apiPrefix}${r.path}`);
  }
}
