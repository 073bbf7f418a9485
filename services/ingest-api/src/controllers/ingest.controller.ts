import type { Request, Response } from 'express';
import type { IngestionPipeline } from '../pipeline/pipeline.js';
import { ingestInvalid } from '../metrics/metrics.js';
import { IngestBody } from '../utils/validators.js';
import { ingestTelemetrySvc } from '../services/ingest.service.js';

export function ingestCtrl(pipeline: IngestionPipeline) {
  return async (req: Request, res: Response) => {
    const parsed = IngestBody.safeParse(req.body);
    if (!parsed.success) {
      ingestInvalid.inc({ path: 'http' });
      return res.status(422).json({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }

    const result = ingestTelemetrySvc(pipeline, parsed.data);
    return res.status(200).json(result);
  };
}
