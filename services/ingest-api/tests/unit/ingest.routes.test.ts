import { describe, it, expect, vi } from 'vitest';
import { Router, type Request, type Response } from 'express';
import { ingestRoutes } from '../../src/routes/ingest.routes.js';
import { errorHandler } from '../../src/middleware/error.js';
import { IngestionPipeline } from '../../src/pipeline/pipeline.js';

const NOW = Date.now();

function pipeline(queueCapacity: number) {
  return new IngestionPipeline('http', { persist: async (b) => b.length }, {
    queueCapacity,
    batchSize: 10,
    batchTimeoutMs: 20,
    pollIntervalMs: 2,
    idleSleepMs: 2,
  });
}

function fakeRes() {
  const res = {
    locals: {},
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

async function post(p: IngestionPipeline, body: unknown) {
  const app = Router();
  app.use(ingestRoutes(p));
  app.use(errorHandler);

  const req = { method: 'POST', url: '/ingest', headers: {}, header: () => undefined, body };
  const res = fakeRes();
  const done = vi.fn();
  app(req as unknown as Request, res as unknown as Response, done);
  await vi.waitFor(() => expect(res.json).toHaveBeenCalled());
  expect(done).not.toHaveBeenCalled();
  return res;
}

describe('POST /ingest', () => {
  it('acks a valid reading with 200', async () => {
    const p = pipeline(10);
    const res = await post(p, { app_id: 'app-1', ts: NOW, payload: { t: 1 } });

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ status: 'queued' });
    expect(p.queue.size).toBe(1);
  });

  it('maps a full queue to 503 BACKPRESSURE', async () => {
    const p = pipeline(1);
    await post(p, { app_id: 'a', ts: NOW, payload: {} });
    const res = await post(p, { app_id: 'a', ts: NOW, payload: {} });

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({
      error: { code: 'BACKPRESSURE', message: 'ingest backpressure: queue is at capacity, retry later' },
    });
    expect(p.stats().total_rejected).toBe(1);
  });

  it('maps a negative ts to 422', async () => {
    const p = pipeline(10);
    const res = await post(p, { app_id: 'a', ts: -5, payload: {} });

    expect(res.status).toHaveBeenCalledWith(422);
    expect(res.json).toHaveBeenCalledWith({
      error: expect.objectContaining({ code: 'VALIDATION_ERROR' }),
    });
    expect(p.queue.size).toBe(0);
  });
});
