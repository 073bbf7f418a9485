import type { IngestionPipeline } from '../pipeline/pipeline.js';
import { normalizeHttp } from '../pipeline/normalizer.js';
import { ingestInvalid } from '../metrics/metrics.js';
import type { IngestAck } from '../types/domain.js';
import type { IngestBody } from '../utils/validators.js';
import { httpError } from '../utils/http-error.js';
import { MAX_TIMESTAMP_MS } from '../pipeline/types.js';

/**
 * Normalizes one HTTP telemetry item and offers it to the pipeline.
 * Throws 422 for an invalid timestamp and 503 when the queue is full, so callers
 * can tell "fix your request" from "back off and retry".
 */
export function ingestTelemetrySvc(pipeline: IngestionPipeline, body: IngestBody): IngestAck {
  const record = normalizeHttp(body);
  if (!record) {
    ingestInvalid.inc({ path: 'http' });
    throw httpError(422, 'VALIDATION_ERROR', `ts must be epoch ms between 1 and ${MAX_TIMESTAMP_MS}`);
  }
  if (!pipeline.ingest(record)) {
    throw httpError(503, 'BACKPRESSURE', 'ingest backpressure: queue is at capacity, retry later');
  }
  return { status: 'queued' };
}
