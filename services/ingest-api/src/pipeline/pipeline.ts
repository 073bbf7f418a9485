import { ingestReceived, ingestRejected } from '../metrics/metrics.js';
import { BatchCollector } from './batch-collector.js';
import { BoundedQueue } from './bounded-queue.js';
import { PipelineStats } from './stats.js';
import type { BatchSink, CollectorOptions, NormalizedRecord, StatsSnapshot } from './types.js';

export type PipelineOptions = CollectorOptions & { queueCapacity: number };

/**
 * One ingestion path: bounded queue → batch collector → sink, with its own
 * counters. Adapters only ever call `ingest`.
 */
export class IngestionPipeline {
  readonly queue: BoundedQueue<NormalizedRecord>;
  readonly counters = new PipelineStats();
  private readonly collector: BatchCollector<NormalizedRecord>;

  constructor(readonly name: string, sink: BatchSink<NormalizedRecord>, opts: PipelineOptions) {
    this.queue = new BoundedQueue<NormalizedRecord>(opts.queueCapacity);
    this.collector = new BatchCollector(name, this.queue, sink, this.counters, opts);
  }

  get isRunning(): boolean {
    return this.collector.isRunning;
  }

  start(): void {
    this.collector.start();
  }

  stop(): Promise<void> {
    return this.collector.stop();
  }

  /** `false` means backpressure: the queue is full and the record was not taken. */
  ingest(record: NormalizedRecord): boolean {
    if (!this.queue.push(record)) {
      this.counters.recordRejected();
      ingestRejected.inc({ pipeline: this.name });
      return false;
    }
    this.counters.recordReceived();
    ingestReceived.inc({ pipeline: this.name });
    return true;
  }

  stats(): StatsSnapshot {
    return this.counters.snapshot(this.queue.size);
  }
}
