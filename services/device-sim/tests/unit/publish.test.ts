import { describe, it, expect, vi } from 'vitest';
import { publishReading, topicFor, type PublishClient } from '../../src/publish/redis.js';

describe('publishReading', () => {
  it('publishes the JSON reading on the device topic', async () => {
    const publish = vi.fn(async (_channel: string, _message: string) => 1);
    const client: PublishClient = { publish };

    await expect(publishReading(client, 'pico-1', { ts: 5, sensors: { motion: true } })).resolves.toBe(1);
    expect(publish).toHaveBeenCalledWith('devices/pico-1/telemetry', '{"ts":5,"sensors":{"motion":true}}');
  });

  it('propagates publish failures', async () => {
    const client: PublishClient = { publish: async () => { throw new Error('closed'); } };
    await expect(publishReading(client, 'pico-1', {})).rejects.toThrow('closed');
  });

  it('builds topics the ingest service subscribes to', () => {
    expect(topicFor('stm32-9')).toBe('devices/stm32-9/telemetry');
  });
});
