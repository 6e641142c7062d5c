/**
 * Key-value store contract shared by the cart and order stores.
 *
 * Values are serialized text. Every entry carries a TTL; expiry is the only
 * garbage collection for abandoned carts and old orders.
 */
export interface KeyValueStore {
  readonly kind: 'redis' | 'memory';
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  /** Remaining TTL in seconds, or null when the key is absent */
  ttl(key: string): Promise<number | null>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
