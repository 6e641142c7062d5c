import { FastifyInstance } from 'fastify';
import { Catalog } from '../catalog/catalog';
import { KeyValueStore } from '../store/types';
import { getMetrics, getContentType } from '../observability/metrics';

export interface HealthRouteOptions {
  enableMetrics: boolean;
}

export function registerHealthRoutes(
  app: FastifyInstance,
  kv: KeyValueStore,
  catalog: Catalog,
  options: HealthRouteOptions,
): void {
  app.get('/', async (_req, reply) => {
    return reply.send({ message: 'Restaurant Voice Agent API is running' });
  });

  /** Liveness probe — always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe — checks the key-value store */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number; detail?: string }> = {};

    const start = Date.now();
    const storeOk = await kv.ping();
    checks.store = { status: storeOk ? 'ok' : 'error', latencyMs: Date.now() - start, detail: kv.kind };
    checks.menu = { status: 'ok', detail: `${catalog.itemCount} items` };

    const allOk = Object.values(checks).every((c) => c.status === 'ok');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (options.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
