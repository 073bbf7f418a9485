import { fetch } from 'undici';
import { cfg } from '../config/index.js';
import { httpLatency, postAttempts } from '../metrics/metrics.js';
import type { JsonObject } from '../types.js';

export type IngestItem = {
  app_id: string;
  device_id: string;
  ts: number;          // epoch ms
  payload: JsonObject;
  msg_id: string;      // stable across retries so the server can dedup
  topic?: string;
};

export type PostOutcome = 'ok' | 'rejected' | 'gave_up';

const retriable = (status: number) => status >= 500;

export async function postTelemetry(item: IngestItem): Promise<PostOutcome> {
  if (!cfg.ingestUrl) return 'rejected';
  const url = cfg.ingestUrl;
  const body = JSON.stringify(item);
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (cfg.apiKey) headers['x-api-key'] = cfg.apiKey;

  let attempt = 0;
  const endTimer = httpLatency.startTimer();
  for (;;) {
    attempt++;
    const ac = new AbortController();
    const to = setTimeout(() => ac.abort(), cfg.timeoutMs);
    try {
      const res = await fetch(url, { method: 'POST', body, headers, signal: ac.signal });

      if (res.ok) {
        postAttempts.inc({ status: 'ok' });
        endTimer();
        return 'ok';
      }
      postAttempts.inc({ status: `http_${res.status}` });
      // 4xx other than backpressure is the caller's fault; resending will not help
      if (!retriable(res.status)) {
        endTimer();
        return 'rejected';
      }
    } catch {
      // network error or timeout: retry like a 5xx
      postAttempts.inc({ status: 'network' });
    } finally {
      clearTimeout(to);
    }

    if (attempt > cfg.retry) {
      endTimer();
      return 'gave_up';
    }
    const backoff = cfg.retryBaseMs * Math.pow(2, attempt - 1);
    await new Promise((r) => setTimeout(r, backoff));
  }
}
