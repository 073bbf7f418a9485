import type { Redis } from 'ioredis';
import { logger } from '../utils/logger.js';
import { deliveryLatency, lastDeliveryLatency } from '../metrics/metrics.js';

export const TELEMETRY_PATTERN = 'devices/*/telemetry';
const STATS_EVERY = 10;

export interface LatencyStats {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

// devices/<id>/telemetry
function deviceOf(channel: string): string {
  return channel.split('/')[1] ?? 'unknown';
}

function sentAt(message: string): number | null {
  const parsed: unknown = JSON.parse(message);
  if (typeof parsed !== 'object' || parsed === null || !('ts' in parsed)) return null;
  const { ts } = parsed;
  return typeof ts === 'number' && Number.isFinite(ts) && ts > 0 ? ts : null;
}

/**
 * Listens on the telemetry topics and measures publish-to-receive latency from
 * each reading's `ts`. Publisher and monitor must share a clock.
 */
export class LatencyMonitor {
  private count = 0;
  private sum = 0;
  private min = Infinity;
  private max = -Infinity;
  private subscribed = false;

  constructor(
    private readonly client: Redis,
    private readonly pattern = TELEMETRY_PATTERN,
    private readonly reportEvery = STATS_EVERY,
  ) {}

  private readonly onMessage = (_pattern: string, channel: string, message: string) => {
    this.handle(channel, message);
  };

  /** Returns the measured latency in ms, or null when the message carries no usable ts. */
  handle(channel: string, message: string, now = Date.now()): number | null {
    let ts: number | null;
    try {
      ts = sentAt(message);
    } catch (err) {
      logger.warn({ err, channel }, 'invalid JSON on telemetry topic');
      return null;
    }
    if (ts === null) {
      logger.warn({ channel }, 'telemetry message has no timestamp');
      return null;
    }

    const latencyMs = now - ts;
    this.count++;
    this.sum += latencyMs;
    this.min = Math.min(this.min, latencyMs);
    this.max = Math.max(this.max, latencyMs);
    deliveryLatency.observe(latencyMs);
    lastDeliveryLatency.set(latencyMs);

    logger.debug({ deviceId: deviceOf(channel), latencyMs }, 'reading received');
    if (this.count % this.reportEvery === 0) logger.info(this.stats(), 'latency stats');
    return latencyMs;
  }

  stats(): LatencyStats {
    if (this.count === 0) return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
    return { count: this.count, avgMs: this.sum / this.count, minMs: this.min, maxMs: this.max };
  }

  async start(): Promise<void> {
    if (this.subscribed) return;
    this.client.on('pmessage', this.onMessage);
    await this.client.psubscribe(this.pattern);
    this.subscribed = true;
    logger.info({ pattern: this.pattern }, 'monitoring telemetry latency');
  }

  async stop(): Promise<void> {
    if (!this.subscribed) return;
    this.subscribed = false;
    this.client.off('pmessage', this.onMessage);
    await this.client.punsubscribe(this.pattern);
  }
}
