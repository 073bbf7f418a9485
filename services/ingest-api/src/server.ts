import { buildApp } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { pg } from './db/pool.js';
import { ensureSchema } from './db/schema.js';
import { createPipelines } from './pipeline/index.js';
import { PubSubConsumer } from './adapters/pubsub.consumer.js';
import { getSubscriber, shutdownRedis } from './redis/index.js';
import { logStartupBanner } from './utils/log-startup.js';

if (config.dbAutoMigrate) {
  await ensureSchema(pg, config.pipelines.http.dedupKey);
}

const pipelines = createPipelines(pg, config.pipelines);
pipelines.pubsub.start();
pipelines.http.start();

const consumer = config.pubsub.enabled
  ? new PubSubConsumer(getSubscriber(), config.pubsub.pattern, pipelines.pubsub)
  : null;
if (consumer) {
  await consumer.start();
}

const app = buildApp({ pipelines });
const server = app.listen(config.port, () => {
  logger.info({ port: config.port, prefix: config.apiPrefix }, 'ingest-api listening');
  logStartupBanner().catch((err) => logger.warn({ err }, 'startup banner failed'));
});

// ---- global process error traps ----
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown(1);
});

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

let closing = false;
async function shutdown(code: number) {
  if (closing) return;
  closing = true;
  logger.info('shutting down...');

  await new Promise<void>((resolve) => server.close(() => resolve()));
  // stop producers first, then let both pipelines drain what is already queued
  if (consumer) {
    await consumer.stop().catch((err) => logger.warn({ err }, 'unsubscribe failed'));
  }
  await Promise.all([pipelines.pubsub.stop(), pipelines.http.stop()]);
  logger.info(pipelineStatsLine(), 'final pipeline stats');

  await Promise.allSettled([shutdownRedis(), pg.end()]);
  logger.info('bye');
  process.exit(code);
}

function pipelineStatsLine() {
  return { pubsub: pipelines.pubsub.stats(), http: pipelines.http.stats() };
}
