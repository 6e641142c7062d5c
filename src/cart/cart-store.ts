import { Cart, CartStore } from './types';
import { KeyValueStore } from '../store/types';
import { ajv, describeErrors } from '../validation';
import { logger } from '../observability/logger';

const cartSchema = {
  type: 'object',
  required: ['sessionId', 'lines', 'createdAt', 'updatedAt'],
  properties: {
    sessionId: { type: 'string' },
    createdAt: { type: 'number' },
    updatedAt: { type: 'number' },
    lines: {
      type: 'array',
      items: {
        type: 'object',
        required: ['itemId', 'name', 'quantity', 'unitPriceAtAdd', 'specialRequests'],
        properties: {
          itemId: { type: 'string' },
          name: { type: 'string' },
          quantity: { type: 'integer', minimum: 1 },
          unitPriceAtAdd: { type: 'number' },
          specialRequests: { type: ['string', 'null'] },
        },
      },
    },
  },
};

const validateCart = ajv.compile<Cart>(cartSchema);

export function cartKey(sessionId: string): string {
  return `cart:${sessionId}`;
}

/** Carts live under `cart:<session_id>` and expire after `ttlSeconds` of inactivity */
export class KeyValueCartStore implements CartStore {
  private readonly log = logger.child({ component: 'cart-store' });

  constructor(
    private readonly kv: KeyValueStore,
    private readonly ttlSeconds: number,
  ) {}

  async get(sessionId: string): Promise<Cart | null> {
    const raw = await this.kv.get(cartKey(sessionId));
    if (!raw) return null;

    const parsed: unknown = JSON.parse(raw);
    if (!validateCart(parsed)) {
      const reason = describeErrors(validateCart.errors);
      this.log.error({ sessionId, reason }, 'Stored cart is corrupt');
      throw new Error(`Stored cart for session ${sessionId} is corrupt: ${reason}`);
    }
    return parsed;
  }

  async save(cart: Cart): Promise<void> {
    await this.kv.set(cartKey(cart.sessionId), JSON.stringify(cart), this.ttlSeconds);
  }

  async delete(sessionId: string): Promise<void> {
    await this.kv.del(cartKey(sessionId));
  }
}
