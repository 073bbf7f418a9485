import { Redis } from 'ioredis';
import { config } from '../config.js';
import { logger } from '../logger.js';

// One command client, plus a dedicated duplicate for pattern subscriptions
let primary: Redis | null = null;
let subscriber: Redis | null = null;

function attachLoggers(client: Redis, label: string) {
  client.on('connect',    () => logger.info({ label }, 'redis connect'));
  client.on('ready',      () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',        () => logger.warn({ label }, 'redis end'));
  client.on('error',      (err: Error) => logger.error({ label, err }, 'redis error'));
}

export function getRedis(): Redis {
  if (!primary) {
    primary = new Redis(config.redisUrl, { maxRetriesPerRequest: null });
    attachLoggers(primary, 'primary');
  }
  return primary;
}

export function getSubscriber(): Redis {
  if (!subscriber) {
    subscriber = getRedis().duplicate();
    attachLoggers(subscriber, 'subscriber');
  }
  return subscriber;
}

export async function redisHealth() {
  try {
    const pong = await getRedis().ping();
    return pong === 'PONG';
  } catch {
    return false;
  }
}

async function quit(client: Redis) {
  try {
    await client.quit();
  } catch {
    client.disconnect();
  }
}

export async function shutdownRedis(): Promise<void> {
  const clients = [subscriber, primary].filter((c): c is Redis => c !== null);
  subscriber = null;
  primary = null;
  await Promise.all(clients.map(quit));
}
