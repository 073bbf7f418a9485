import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { createRedis } from './publish/redis.js';
import { LatencyMonitor } from './latency/monitor.js';

const redis = createRedis();
const monitor = new LatencyMonitor(redis, cfg.latencyPattern);
let stopping = false;

async function shutdown(sig: string) {
  if (stopping) return;
  stopping = true;
  await monitor.stop().catch((err: unknown) => logger.warn({ err }, 'unsubscribe failed'));
  await redis.quit().catch(() => redis.disconnect());
  const stats = monitor.stats();
  if (stats.count === 0) logger.info({ sig }, 'latency monitor stopped, no messages received');
  else logger.info({ sig, ...stats }, 'latency monitor stopped, final stats');
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

monitor.start().catch((e: unknown) => {
  logger.error({ err: e }, 'latency monitor fatal');
  process.exit(1);
});
