import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const httpReqDuration = new Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'code'],
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000]
});
registry.registerMetric(httpReqDuration);

export const ingestReceived   = new Counter({ name: 'ingest_received_total',   help: 'records accepted into a pipeline queue', labelNames: ['pipeline'] });
export const ingestRejected   = new Counter({ name: 'ingest_rejected_total',   help: 'records refused by backpressure', labelNames: ['pipeline'] });
export const ingestInvalid    = new Counter({ name: 'ingest_invalid_total',    help: 'inputs discarded by the normalizer', labelNames: ['path'] });
export const ingestPersisted  = new Counter({ name: 'ingest_persisted_total',  help: 'records in committed batches', labelNames: ['pipeline'] });
export const ingestDuplicates = new Counter({ name: 'ingest_duplicates_total', help: 'records skipped by ON CONFLICT', labelNames: ['pipeline'] });
export const ingestErrored    = new Counter({ name: 'ingest_errored_total',    help: 'records in failed batches', labelNames: ['pipeline'] });
registry.registerMetric(ingestReceived);
registry.registerMetric(ingestRejected);
registry.registerMetric(ingestInvalid);
registry.registerMetric(ingestPersisted);
registry.registerMetric(ingestDuplicates);
registry.registerMetric(ingestErrored);

export const batchSize = new Gauge({ name: 'ingest_batch_size', help: 'Last batch size', labelNames: ['pipeline'] });
export const batchWriteDuration = new Histogram({
  name: 'ingest_batch_write_duration_ms',
  help: 'Batch write round trip',
  labelNames: ['pipeline', 'outcome'],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000]
});
export const queueDepth = new Gauge({ name: 'ingest_queue_depth', help: 'Records waiting in the queue', labelNames: ['pipeline'] });
registry.registerMetric(batchSize);
registry.registerMetric(queueDepth);
registry.registerMetric(batchWriteDuration);
