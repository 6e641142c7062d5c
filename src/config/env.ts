import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${key} must be an integer, got '${val}'`);
  }
  return parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'voiceorder:'),
    /** Skip Redis entirely and keep carts/orders in process memory */
    disabled: optionalBool('REDIS_DISABLED', false),
  },

  menu: {
    path: optional('MENU_PATH', path.join(projectRoot, 'data', 'menu.json')),
  },

  // ───── Cart & Orders ─────
  cart: {
    ttlSeconds: optionalInt('CART_TTL_SECONDS', 3600),
    maxTotalQuantity: optionalInt('MAX_CART_QUANTITY', 50),
  },

  orders: {
    ttlSeconds: optionalInt('ORDER_TTL_SECONDS', 86400),
    estimatedTime: optional('ESTIMATED_TIME', '25-30 minutes'),
  },

  security: {
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
