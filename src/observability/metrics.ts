import client from 'prom-client';

export const registry = new client.Registry();

export const httpRequestDuration = new client.Histogram({
  name: 'voiceorder_http_request_duration_seconds',
  help: 'HTTP request latency',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

export const cartOperations = new client.Counter({
  name: 'voiceorder_cart_operations_total',
  help: 'Cart operations by kind and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [registry],
});

export const checkoutsTotal = new client.Counter({
  name: 'voiceorder_checkouts_total',
  help: 'Completed checkouts',
  registers: [registry],
});

export const orderStatusTransitions = new client.Counter({
  name: 'voiceorder_order_status_transitions_total',
  help: 'Order status transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const storeErrors = new client.Counter({
  name: 'voiceorder_store_errors_total',
  help: 'Key-value store failures by operation',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}

/** Process-level metrics (CPU, memory, event loop); enabled by the server entrypoint only */
export function enableDefaultMetrics(): void {
  client.collectDefaultMetrics({ register: registry, prefix: 'voiceorder_' });
}
