import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const generatedReadings = new Counter({ name: 'sim_generated_total', help: 'readings produced', labelNames: ['kind'] });
export const publishResults = new Counter({ name: 'sim_publish_total', help: 'pub/sub publishes', labelNames: ['status'] });
export const postAttempts = new Counter({ name: 'sim_post_attempts_total', help: 'POST /ingest attempts', labelNames: ['status'] });
export const httpLatency = new Histogram({
  name: 'sim_post_duration_ms',
  help: 'POST /ingest round trip incl. retries',
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000]
});
export const activeDevices = new Gauge({ name: 'sim_active_devices', help: 'devices currently publishing' });
export const deliveryLatency = new Histogram({
  name: 'sim_delivery_latency_ms',
  help: 'reading ts to pub/sub receipt',
  buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000]
});
export const lastDeliveryLatency = new Gauge({ name: 'sim_last_delivery_latency_ms', help: 'latency of the latest reading' });
registry.registerMetric(generatedReadings);
registry.registerMetric(publishResults);
registry.registerMetric(postAttempts);
registry.registerMetric(httpLatency);
registry.registerMetric(activeDevices);
registry.registerMetric(deliveryLatency);
registry.registerMetric(lastDeliveryLatency);
