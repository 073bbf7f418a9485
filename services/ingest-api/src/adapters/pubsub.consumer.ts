import type { Redis } from 'ioredis';
import { logger } from '../logger.js';
import { ingestInvalid } from '../metrics/metrics.js';
import { normalizePubSub } from '../pipeline/normalizer.js';
import type { IngestionPipeline } from '../pipeline/pipeline.js';

const PROGRESS_LOG_EVERY = 100;

/**
 * Pattern subscription feeding the pub/sub pipeline. The message callback only
 * normalizes and enqueues; it never waits on the database and never throws
 * back into the Redis client.
 */
export class PubSubConsumer {
  private messageCount = 0;
  private subscribed = false;

  constructor(
    private readonly client: Redis,
    private readonly pattern: string,
    private readonly pipeline: IngestionPipeline,
  ) {}

  private readonly onMessage = (_pattern: string, channel: string, message: string) => {
    this.handle(channel, message);
  };

  get received(): number {
    return this.messageCount;
  }

  /** Returns true when the message made it into the queue. */
  handle(topic: string, message: string | Uint8Array): boolean {
    try {
      const record = normalizePubSub(topic, message);
      if (!record) {
        ingestInvalid.inc({ path: 'pubsub' });
        return false;
      }
      if (!this.pipeline.ingest(record)) {
        logger.warn({ deviceId: record.deviceId, topic }, 'pipeline queue full, message dropped');
        return false;
      }

      this.messageCount++;
      if (this.messageCount % PROGRESS_LOG_EVERY === 0) {
        const s = this.pipeline.stats();
        logger.info({ messages: this.messageCount, ingested: s.total_ingested, queue: s.queue_size }, 'pubsub progress');
      }
      return true;
    } catch (err) {
      logger.error({ err, topic }, 'error handling pubsub message');
      return false;
    }
  }

  async start(): Promise<void> {
    if (this.subscribed) return;
    this.client.on('pmessage', this.onMessage);
    await this.client.psubscribe(this.pattern);
    this.subscribed = true;
    logger.info({ pattern: this.pattern }, 'subscribed to telemetry');
  }

  async stop(): Promise<void> {
    if (!this.subscribed) return;
    this.subscribed = false;
    this.client.off('pmessage', this.onMessage);
    await this.client.punsubscribe(this.pattern);
    logger.info({ pattern: this.pattern, messages: this.messageCount }, 'unsubscribed from telemetry');
  }
}
