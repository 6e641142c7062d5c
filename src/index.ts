import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';
import { enableDefaultMetrics } from './observability/metrics';

async function main(): Promise<void> {
  if (env.observability.enableMetrics) enableDefaultMetrics();

  const { app, kv } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({ port: env.port, env: env.nodeEnv, store: kv.kind }, 'Voice order API started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
