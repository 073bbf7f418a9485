import type { Server } from 'node:http';
import type { Redis } from 'ioredis';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { activeDevices, generatedReadings } from './metrics/metrics.js';
import { startOpsServer } from './server/ops.js';
import { postTelemetry } from './http/client.js';
import { createRedis, publishReading, topicFor } from './publish/redis.js';
import { buildFleet, type FleetMember } from './devices/fleet.js';

let running = true;
const timers = new Set<NodeJS.Timeout>();
const inflight = new Set<Promise<void>>();
const seq = new Map<string, number>();

let redis: Redis | null = null;
let opsServer: Server | undefined;

function nextMsgId(deviceId: string): string {
  const n = (seq.get(deviceId) ?? 0) + 1;
  seq.set(deviceId, n);
  return `${deviceId}:${n}`;
}

async function emit(member: FleetMember): Promise<void> {
  const { device } = member;
  const now = Date.now();
  const payload = device.next(now);
  generatedReadings.inc({ kind: device.kind });

  if (redis) {
    try {
      await publishReading(redis, device.id, payload);
    } catch (err) {
      logger.warn({ err, deviceId: device.id }, 'publish failed');
    }
  }
  if (cfg.ingestUrl) {
    const outcome = await postTelemetry({
      app_id: cfg.appId,
      device_id: device.id,
      ts: now,
      payload,
      msg_id: nextMsgId(device.id),
      topic: topicFor(device.id),
    });
    if (outcome !== 'ok') logger.warn({ deviceId: device.id, outcome }, 'ingest post failed');
  }
  logger.debug({ deviceId: device.id, kind: device.kind }, 'reading sent');
}

// one pacer per device, each on its own jittered cadence
function schedule(member: FleetMember) {
  if (!running) return;
  const jitterFactor = 1 + (Math.random() * 2 - 1) * cfg.jitter; // [1-j, 1+j]
  const interval = Math.max(1, Math.floor(member.intervalMs * jitterFactor));

  const t = setTimeout(() => {
    timers.delete(t);
    if (!running) return;
    const p = emit(member)
      .catch((err: unknown) => logger.error({ err, deviceId: member.device.id }, 'emit failed'))
      .finally(() => inflight.delete(p));
    inflight.add(p);
    schedule(member);
  }, interval);
  timers.add(t);
}

async function shutdown(sig: string) {
  if (!running) return;
  running = false;
  for (const t of timers) clearTimeout(t);
  timers.clear();
  activeDevices.set(0);

  await Promise.allSettled([...inflight]);
  if (redis) await redis.quit().catch(() => redis?.disconnect());
  await new Promise<void>((r) => (opsServer ? opsServer.close(() => r()) : r()));
  logger.info({ sig }, 'device-sim stopped');
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

async function main() {
  const fleet = buildFleet(cfg.fleet, { intervalScale: cfg.intervalScale });
  if (fleet.length === 0) throw new Error('SIM_FLEET describes no devices');
  if (!cfg.publish && !cfg.ingestUrl) throw new Error('nothing to do: SIM_PUBLISH=0 and INGEST_URL unset');

  if (cfg.publish) {
    const client = createRedis();
    redis = client;
    await client.ping();
  }

  if (cfg.opsPort > 0) {
    const client = redis;
    opsServer = startOpsServer(cfg.opsPort, client ? async () => (await client.ping()) === 'PONG' : null);
  }

  logger.info(
    {
      devices: fleet.map((m) => ({ id: m.device.id, kind: m.device.kind, intervalMs: m.intervalMs })),
      publish: cfg.publish,
      ingestUrl: cfg.ingestUrl,
      jitter: cfg.jitter,
    },
    'device-sim starting'
  );

  activeDevices.set(fleet.length);
  for (const member of fleet) schedule(member);
}

main().catch((e: unknown) => {
  logger.error({ err: e }, 'device-sim fatal');
  process.exit(1);
});
