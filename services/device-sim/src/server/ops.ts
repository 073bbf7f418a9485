import http from 'node:http';
import { registry } from '../metrics/metrics.js';
import { logger } from '../utils/logger.js';

export type ReadinessProbe = () => Promise<boolean>;

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function startOpsServer(port: number, redisReady: ReadinessProbe | null) {
  const server = http.createServer((req, res) => {
    const url = req.url || '/';
    if (url === '/ops/health/liveness') {
      json(res, 200, { ok: true });
      return;
    }
    if (url === '/ops/health/readiness') {
      const probe = redisReady ? redisReady().catch(() => false) : Promise.resolve(true);
      void probe.then((ok) =>
        json(res, ok ? 200 : 503, {
          status: ok ? 'ready' : 'not_ready',
          checks: { redis: redisReady ? (ok ? 'ok' : 'fail') : 'skipped' }
        })
      );
      return;
    }
    if (url === '/ops/metrics') {
      registry.metrics().then(
        (body) => {
          res.writeHead(200, { 'content-type': registry.contentType });
          res.end(body);
        },
        (err: unknown) => {
          logger.error({ err }, 'metrics render failed');
          json(res, 500, { error: { code: 'INTERNAL_ERROR' } });
        }
      );
      return;
    }
    json(res, 404, { error: { code: 'NOT_FOUND' } });
  });
  server.listen(port, () => logger.info({ port }, 'ops server listening'));
  return server;
}
