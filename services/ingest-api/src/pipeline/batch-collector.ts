// services/ingest-api/src/pipeline/batch-collector.ts
import { performance } from 'node:perf_hooks';
import { logger } from '../logger.js';
import { batchSize, batchWriteDuration, ingestDuplicates, ingestErrored, ingestPersisted, queueDepth } from '../metrics/metrics.js';
import type { BoundedQueue } from './bounded-queue.js';
import type { PipelineStats } from './stats.js';
import type { BatchSink, CollectorOptions } from './types.js';

const STATS_LOG_EVERY = 10;

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Drains the queue into batches on a dual trigger: a batch is handed to the
 * sink once it holds `batchSize` records or `batchTimeoutMs` has passed since
 * collection started, whichever comes first.
 *
 * There is one loop per queue and it awaits every write before collecting the
 * next batch, so at most one batch is in flight and batches leave in FIFO order.
 */
export class BatchCollector<T> {
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(
    readonly name: string,
    private readonly queue: BoundedQueue<T>,
    private readonly sink: BatchSink<T>,
    private readonly stats: PipelineStats,
    private readonly opts: CollectorOptions,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.loop) return;
    this.running = true;
    this.loop = this.run();
    logger.info({ pipeline: this.name, batchSize: this.opts.batchSize, batchTimeoutMs: this.opts.batchTimeoutMs }, 'batch collector started');
  }

  /** Stops after the queue has been drained; nothing already queued is dropped. */
  async stop(): Promise<void> {
    this.running = false;
    if (!this.loop) return;
    await this.loop;
    this.loop = null;
    logger.info({ pipeline: this.name }, 'batch collector stopped');
  }

  async collectBatch(): Promise<T[]> {
    const batch: T[] = [];
    const deadline = Date.now() + this.opts.batchTimeoutMs;

    while (batch.length < this.opts.batchSize) {
      if (!this.queue.isEmpty()) {
        batch.push(...this.queue.drainUpTo(this.opts.batchSize - batch.length));
      } else if (!this.running) {
        break; // shutting down and nothing left to wait for
      } else {
        await sleep(this.opts.pollIntervalMs);
      }
      if (Date.now() >= deadline) break;
    }
    return batch;
  }

  async flush(batch: T[]): Promise<void> {
    if (batch.length === 0) return;
    const labels = { pipeline: this.name };
    batchSize.set(labels, batch.length);

    const t0 = performance.now();
    try {
      const written = await this.sink.persist(batch);
      batchWriteDuration.observe({ ...labels, outcome: 'ok' }, performance.now() - t0);
      this.stats.recordPersisted(batch.length);
      ingestPersisted.inc(labels, batch.length);
      if (written < batch.length) {
        ingestDuplicates.inc(labels, batch.length - written);
        logger.debug({ pipeline: this.name, duplicates: batch.length - written }, 'duplicates ignored');
      }
      if (this.stats.totalBatches % STATS_LOG_EVERY === 0) {
        logger.info({ pipeline: this.name, ...this.stats.snapshot(this.queue.size) }, 'pipeline stats');
      }
    } catch (err) {
      // the batch is a unit of loss: counted, logged, never requeued
      batchWriteDuration.observe({ ...labels, outcome: 'error' }, performance.now() - t0);
      this.stats.recordFailed(batch.length);
      ingestErrored.inc(labels, batch.length);
      logger.error({ err, pipeline: this.name, size: batch.length }, 'failed to persist batch');
    }
  }

  private async idle(): Promise<void> {
    const until = Date.now() + this.opts.idleSleepMs;
    while (this.running && this.queue.isEmpty() && Date.now() < until) {
      await sleep(Math.min(this.opts.pollIntervalMs, until - Date.now()));
    }
  }

  private async run(): Promise<void> {
    while (this.running || !this.queue.isEmpty()) {
      try {
        const batch = await this.collectBatch();
        queueDepth.set({ pipeline: this.name }, this.queue.size);
        if (batch.length) await this.flush(batch);
        else await this.idle();
      } catch (err) {
        logger.error({ err, pipeline: this.name }, 'batch collector error');
        await sleep(this.opts.errorBackoffMs ?? 1000);
      }
    }
  }
}
