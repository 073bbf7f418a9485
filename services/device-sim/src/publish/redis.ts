import { Redis } from 'ioredis';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { publishResults } from '../metrics/metrics.js';
import type { JsonObject } from '../types.js';

export const topicFor = (deviceId: string) => `devices/${deviceId}/telemetry`;

// The slice of ioredis the publisher needs
export interface PublishClient {
  publish(channel: string, message: string): Promise<number>;
}

export function createRedis(): Redis {
  const client = new Redis(cfg.redisUrl, { maxRetriesPerRequest: null });
  client.on('ready', () => logger.info('redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ delay }, 'redis reconnecting'));
  client.on('error', (err: Error) => logger.error({ err }, 'redis error'));
  return client;
}

/** Returns the number of subscribers that received the reading. */
export async function publishReading(client: PublishClient, deviceId: string, payload: JsonObject): Promise<number> {
  try {
    const receivers = await client.publish(topicFor(deviceId), JSON.stringify(payload));
    publishResults.inc({ status: receivers > 0 ? 'ok' : 'no_subscribers' });
    return receivers;
  } catch (err) {
    publishResults.inc({ status: 'error' });
    throw err;
  }
}
