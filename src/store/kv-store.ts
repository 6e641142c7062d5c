/**
 * Key-Value Store
 *
 * Redis-backed with in-memory fallback. Unlike a cache, failures are not
 * swallowed: every Redis fault surfaces as StoreUnavailableError so callers
 * can tell "nothing stored" apart from "storage is down".
 */

import Redis from 'ioredis';
import { KeyValueStore } from './types';
import { StoreUnavailableError } from '../errors';
import { logger } from '../observability/logger';
import { storeErrors } from '../observability/metrics';

// ───── Redis Implementation ─────────────────────────────────────

export class RedisKeyValueStore implements KeyValueStore {
  readonly kind = 'redis' as const;
  private readonly log = logger.child({ component: 'kv-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string,
  ) {}

  async get(key: string): Promise<string | null> {
    return this.run('get', key, () => this.redis.get(this.prefixKey(key)));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('set', key, () => this.redis.set(this.prefixKey(key), value, 'EX', ttlSeconds));
  }

  async del(key: string): Promise<void> {
    await this.run('del', key, () => this.redis.del(this.prefixKey(key)));
  }

  async ttl(key: string): Promise<number | null> {
    const seconds = await this.run('ttl', key, () => this.redis.ttl(this.prefixKey(key)));
    // -2: no such key, -1: no expiry
    return seconds === -2 ? null : seconds;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      this.log.warn({ err }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.redis.disconnect();
  }

  private async run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      storeErrors.inc({ operation });
      this.log.error({ err, key, operation }, 'Redis operation failed');
      throw new StoreUnavailableError(operation, err);
    }
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  readonly kind = 'memory' as const;
  private readonly store = new Map<string, MemoryEntry>();
  private readonly sweeper: NodeJS.Timeout;

  constructor(private readonly now: () => number = Date.now) {
    // Periodic cleanup every 60s
    this.sweeper = setInterval(() => this.evict(), 60_000);
    this.sweeper.unref();
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.store.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  async ttl(key: string): Promise<number | null> {
    const entry = this.live(key);
    if (!entry) return null;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    clearInterval(this.sweeper);
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.store.get(key);
    if (entry && this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  private evict(): void {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(key);
    }
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createKeyValueStore(redis: Redis | undefined, keyPrefix: string): KeyValueStore {
  if (redis) {
    logger.info('Key-value store: Redis-backed');
    return new RedisKeyValueStore(redis, keyPrefix);
  }
  logger.info('Key-value store: In-memory');
  return new InMemoryKeyValueStore();
}
