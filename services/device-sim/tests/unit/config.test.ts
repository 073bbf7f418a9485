import { describe, it, expect, vi } from 'vitest';

describe('cfg', () => {
  it('logs plain JSON unless LOG_PRETTY=1', async () => {
    const saved = process.env.LOG_PRETTY;
    delete process.env.LOG_PRETTY;
    try {
      vi.resetModules();
      const { cfg } = await import('../../src/config/index.js');
      expect(cfg.logPretty).toBe(false);
    } finally {
      if (saved !== undefined) process.env.LOG_PRETTY = saved;
    }
  });

  it('watches every device topic for latency by default', async () => {
    vi.resetModules();
    const { cfg } = await import('../../src/config/index.js');
    expect(cfg.latencyPattern).toBe('devices/*/telemetry');
  });
});
