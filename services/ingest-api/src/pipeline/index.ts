import { BatchWriter, type WriterPool } from './batch-writer.js';
import { IngestionPipeline, type PipelineOptions } from './pipeline.js';
import { combineSnapshots } from './stats.js';
import { keyedDedup, NO_DEDUP, type StatsSnapshot, type TelemetryKeyColumn } from './types.js';

export type Pipelines = {
  pubsub: IngestionPipeline;
  http: IngestionPipeline;
};

export type PipelinesConfig = {
  pubsub: PipelineOptions;
  http: PipelineOptions & { dedupKey: readonly TelemetryKeyColumn[] };
};

/**
 * Both ingest paths share one pipeline implementation and differ only in the
 * dedup strategy handed to the writer: pub/sub messages carry no idempotency
 * token, HTTP producers may send one.
 */
export function createPipelines(pool: WriterPool, cfg: PipelinesConfig): Pipelines {
  return {
    pubsub: new IngestionPipeline('pubsub', new BatchWriter(pool, NO_DEDUP), cfg.pubsub),
    http: new IngestionPipeline('http', new BatchWriter(pool, keyedDedup(cfg.http.dedupKey)), cfg.http),
  };
}

export function pipelineStats(p: Pipelines): StatsSnapshot & { pipelines: Record<keyof Pipelines, StatsSnapshot> } {
  const pubsub = p.pubsub.stats();
  const http = p.http.stats();
  return { ...combineSnapshots([pubsub, http]), pipelines: { pubsub, http } };
}

export { IngestionPipeline } from './pipeline.js';
