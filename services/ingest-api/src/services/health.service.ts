import { config } from '../config.js';
import { dbHealth } from '../db/pool.js';
import { redisHealth } from '../redis/index.js';

type Check = 'ok' | 'fail' | 'skipped';

export interface Readiness {
  status: 'ready' | 'not_ready';
  checks: { db: Check; redis: Check };
}

export async function readinessSvc(): Promise<Readiness> {
  const [dbOk, redisOk] = await Promise.allSettled([
    dbHealth(),
    config.pubsub.enabled ? redisHealth() : Promise.resolve(null),
  ]);
  const checks: Readiness['checks'] = {
    db: dbOk.status === 'fulfilled' && dbOk.value ? 'ok' : 'fail',
    redis:
      redisOk.status === 'fulfilled' && redisOk.value === null
        ? 'skipped'
        : redisOk.status === 'fulfilled' && redisOk.value ? 'ok' : 'fail',
  };
  const status = checks.db === 'ok' && checks.redis !== 'fail' ? 'ready' : 'not_ready';
  return { status, checks };
}
