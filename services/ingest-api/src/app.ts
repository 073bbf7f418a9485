// services/ingest-api/src/app.ts
import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import swaggerUi from 'swagger-ui-express';
import { pinoHttp } from 'pino-http';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error.js';
import { apiRouter, timing } from './routes/index.js';
import { ingestRoutes } from './routes/ingest.routes.js';
import { config } from './config.js';
import { logger } from './logger.js';
import type { Pipelines } from './pipeline/index.js';

export interface AppContext {
  pipelines: Pipelines;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function mountDocs(app: express.Express) {
  const candidates = [
    fileURLToPath(new URL('./openapi/openapi.yaml', import.meta.url)),
    path.resolve('src/openapi/openapi.yaml'),
    path.resolve('services/ingest-api/src/openapi/openapi.yaml'),
  ];
  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) {
    logger.warn('openapi file not found, skipping docs');
    return;
  }
  try {
    const doc: unknown = YAML.parse(fs.readFileSync(found, 'utf8'));
    if (!isRecord(doc)) throw new Error('openapi document is not a mapping');
    app.get('/docs.json', (_req, res) => res.json(doc));
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(doc));
    logger.info({ file: found }, 'swagger UI mounted at /docs');
  } catch (err) {
    logger.error({ err, file: found }, 'failed to parse openapi');
  }
}

export function buildApp(ctx: AppContext) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.cors.origins ?? true, credentials: false }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId);

  if (config.env !== 'production') {
    app.use(pinoHttp({ logger, autoLogging: config.env !== 'test' }));
    mountDocs(app);
  }

  // write path lives at the root, the query API under the prefix
  app.use(timing, ingestRoutes(ctx.pipelines.http));
  app.use(config.apiPrefix, apiRouter(ctx.pipelines));

  app.use(errorHandler);

  return app;
}
