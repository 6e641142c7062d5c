import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { Catalog } from './catalog/catalog';
import { CatalogLoader, fileCatalogSource } from './catalog/catalog-loader';
import { KeyValueStore } from './store/types';
import { createKeyValueStore } from './store/kv-store';
import { KeyValueCartStore } from './cart/cart-store';
import { CartService } from './cart/cart-service';
import { KeyValueOrderStore } from './orders/order-store';
import { OrderService } from './orders/order-service';
import { CheckoutService } from './checkout/checkout-service';
import { registerErrorHandler } from './routes/error-handler';
import { registerMenuRoutes } from './routes/menu-routes';
import { registerCartRoutes } from './routes/cart-routes';
import { registerOrderRoutes } from './routes/order-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppSettings {
  menuPath: string;
  cartTtlSeconds: number;
  orderTtlSeconds: number;
  maxCartQuantity: number;
  estimatedTime: string;
  adminApiKey: string;
  enableMetrics: boolean;
}

export interface AppOptions {
  /** Pre-built menu; loaded from `settings.menuPath` when absent */
  catalog?: Catalog;
  /** Pre-built store; Redis (or the in-memory fallback) when absent */
  kv?: KeyValueStore;
  settings?: Partial<AppSettings>;
}

export interface AppContext {
  app: FastifyInstance;
  catalog: Catalog;
  kv: KeyValueStore;
  redis?: Redis;
}

function defaultSettings(): AppSettings {
  return {
    menuPath: env.menu.path,
    cartTtlSeconds: env.cart.ttlSeconds,
    orderTtlSeconds: env.orders.ttlSeconds,
    maxCartQuantity: env.cart.maxTotalQuantity,
    estimatedTime: env.orders.estimatedTime,
    adminApiKey: env.security.adminApiKey,
    enableMetrics: env.observability.enableMetrics,
  };
}

/** Reconnect attempts allowed before the first successful connect */
export const REDIS_STARTUP_RETRIES = 5;

/**
 * Backoff for ioredis. Until Redis has been reached once, give up after a few
 * attempts so startup can fall back to memory. After that Redis holds every
 * cart and order, so keep reconnecting forever with a capped delay.
 */
export function redisRetryStrategy(hasConnected: () => boolean): (times: number) => number | null {
  return (times) => {
    if (!hasConnected() && times > REDIS_STARTUP_RETRIES) return null; // stop retrying
    return Math.min(times * 200, 2000);
  };
}

async function connectRedis(): Promise<Redis | undefined> {
  if (env.redis.disabled) {
    logger.info('Redis disabled by configuration; using in-memory store');
    return undefined;
  }

  let connected = false;
  const redisInstance = new Redis(env.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy: redisRetryStrategy(() => connected),
    lazyConnect: true,
  });
  // Attach error handler BEFORE connect to prevent unhandled error events
  redisInstance.on('error', (err: Error) => {
    logger.debug({ err: err.message }, 'Redis connection error (handled)');
  });
  redisInstance.on('ready', () => {
    connected = true;
  });

  try {
    await redisInstance.connect();
    connected = true;
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    redisInstance.disconnect();
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const settings: AppSettings = { ...defaultSettings(), ...options.settings };

  // Menu is loaded once, before any route exists; a bad menu aborts startup
  const catalog = options.catalog ?? new CatalogLoader(fileCatalogSource(settings.menuPath)).load();

  let redis: Redis | undefined;
  let kv = options.kv;
  if (!kv) {
    redis = await connectRedis();
    kv = createKeyValueStore(redis, env.redis.keyPrefix);
  }
  const store = kv;

  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE'],
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    logger.debug(
      { requestId: req.id, method: req.method, route, statusCode: reply.statusCode, durationMs: reply.elapsedTime },
      'Request completed',
    );
    done();
  });

  app.addHook('onClose', async () => {
    await store.close();
  });

  // ───── Core Services ─────
  const cartStore = new KeyValueCartStore(store, settings.cartTtlSeconds);
  const orderStore = new KeyValueOrderStore(store, settings.orderTtlSeconds);
  const cartService = new CartService(catalog, cartStore, { maxTotalQuantity: settings.maxCartQuantity });
  const checkoutService = new CheckoutService(catalog, cartStore, orderStore, {
    estimatedTime: settings.estimatedTime,
  });
  const orderService = new OrderService(orderStore);

  logger.info(
    {
      store: store.kind,
      cartTtlSeconds: settings.cartTtlSeconds,
      orderTtlSeconds: settings.orderTtlSeconds,
      maxCartQuantity: settings.maxCartQuantity,
    },
    'Cart and order services initialized',
  );

  // ───── Register Routes ─────
  registerErrorHandler(app);
  registerHealthRoutes(app, store, catalog, { enableMetrics: settings.enableMetrics });
  registerMenuRoutes(app, catalog);
  registerCartRoutes(app, cartService, checkoutService);
  registerOrderRoutes(app, orderService, settings.adminApiKey);

  return { app, catalog, kv: store, redis };
}
