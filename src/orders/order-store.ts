import { Order, OrderStore, ORDER_STATUSES } from './types';
import { KeyValueStore } from '../store/types';
import { ajv, describeErrors } from '../validation';
import { logger } from '../observability/logger';

const orderSchema = {
  type: 'object',
  required: [
    'orderId', 'sessionId', 'items', 'customerName', 'customerPhone',
    'specialInstructions', 'totalAmount', 'status', 'createdAt', 'updatedAt',
  ],
  properties: {
    orderId: { type: 'string' },
    sessionId: { type: 'string' },
    customerName: { type: 'string' },
    customerPhone: { type: 'string' },
    specialInstructions: { type: 'string' },
    totalAmount: { type: 'number' },
    status: { type: 'string', enum: ORDER_STATUSES },
    createdAt: { type: 'number' },
    updatedAt: { type: 'number' },
    items: {
      type: 'array',
      items: {
        type: 'object',
        required: ['itemId', 'name', 'quantity', 'unitPrice', 'lineTotal', 'specialRequests'],
        properties: {
          itemId: { type: 'string' },
          name: { type: 'string' },
          quantity: { type: 'integer', minimum: 1 },
          unitPrice: { type: 'number' },
          lineTotal: { type: 'number' },
          specialRequests: { type: ['string', 'null'] },
        },
      },
    },
  },
};

const validateOrder = ajv.compile<Order>(orderSchema);

export function orderKey(orderId: string): string {
  return `order:${orderId}`;
}

/** Orders live under `order:<order_id>` for `ttlSeconds` after checkout */
export class KeyValueOrderStore implements OrderStore {
  private readonly log = logger.child({ component: 'order-store' });

  constructor(
    private readonly kv: KeyValueStore,
    private readonly ttlSeconds: number,
  ) {}

  async get(orderId: string): Promise<Order | null> {
    const raw = await this.kv.get(orderKey(orderId));
    if (!raw) return null;

    const parsed: unknown = JSON.parse(raw);
    if (!validateOrder(parsed)) {
      const reason = describeErrors(validateOrder.errors);
      this.log.error({ orderId, reason }, 'Stored order is corrupt');
      throw new Error(`Stored order ${orderId} is corrupt: ${reason}`);
    }
    return parsed;
  }

  async create(order: Order): Promise<void> {
    await this.kv.set(orderKey(order.orderId), JSON.stringify(order), this.ttlSeconds);
  }

  async update(order: Order): Promise<boolean> {
    const key = orderKey(order.orderId);
    const remaining = await this.kv.ttl(key);
    if (remaining === null) return false;
    // -1 means the key has no expiry; give it the standard window
    await this.kv.set(key, JSON.stringify(order), remaining > 0 ? remaining : this.ttlSeconds);
    return true;
  }
}
