import type { StatsSnapshot } from './types.js';

export function successRate(ingested: number, received: number): number {
  return received > 0 ? ingested / received : 0;
}

/**
 * Running counters for one pipeline. The collector and the adapters write,
 * the introspection endpoint reads; a snapshot may trail an in-flight batch.
 */
export class PipelineStats {
  private received = 0;
  private ingested = 0;
  private errored = 0;
  private batches = 0;
  private rejected = 0;

  recordReceived(): void { this.received++; }
  recordRejected(): void { this.rejected++; }

  recordPersisted(batchSize: number): void {
    this.ingested += batchSize;
    this.batches++;
  }

  recordFailed(batchSize: number): void {
    this.errored += batchSize;
  }

  get totalBatches(): number {
    return this.batches;
  }

  snapshot(queueSize: number): StatsSnapshot {
    return {
      queue_size: queueSize,
      total_received: this.received,
      total_ingested: this.ingested,
      total_errors: this.errored,
      total_batches: this.batches,
      total_rejected: this.rejected,
      success_rate: successRate(this.ingested, this.received),
    };
  }
}

/** Sums several pipeline snapshots into one view. */
export function combineSnapshots(snapshots: StatsSnapshot[]): StatsSnapshot {
  const sum = snapshots.reduce(
    (acc, s) => ({
      queue_size: acc.queue_size + s.queue_size,
      total_received: acc.total_received + s.total_received,
      total_ingested: acc.total_ingested + s.total_ingested,
      total_errors: acc.total_errors + s.total_errors,
      total_batches: acc.total_batches + s.total_batches,
      total_rejected: acc.total_rejected + s.total_rejected,
      success_rate: 0,
    }),
    { queue_size: 0, total_received: 0, total_ingested: 0, total_errors: 0, total_batches: 0, total_rejected: 0, success_rate: 0 },
  );
  return { ...sum, success_rate: successRate(sum.total_ingested, sum.total_received) };
}
