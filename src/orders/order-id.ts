import { v4 as uuid } from 'uuid';

/**
 * `order_<epoch-ms>_<uuid>`. The random part makes ids unique without
 * checking the store, so two checkouts in the same millisecond cannot collide.
 */
export function generateOrderId(now: number = Date.now()): string {
  return `order_${now}_${uuid()}`;
}
