import { OrderService, canTransition } from '../../src/orders/order-service';
import { KeyValueOrderStore } from '../../src/orders/order-store';
import { Order } from '../../src/orders/types';
import { InMemoryKeyValueStore } from '../../src/store/kv-store';
import { InvalidStatusTransitionError, OrderNotFoundError } from '../../src/errors';
import { createClock } from '../helpers/fixtures';

function sampleOrder(overrides: Partial<Order> = {}): Order {
  return {
    orderId: 'order_1_abc',
    sessionId: 'call-1',
    items: [
      { itemId: 'main2', name: 'Fish Tacos', quantity: 2, unitPrice: 17.5, lineTotal: 35, specialRequests: null },
    ],
    customerName: 'Ana',
    customerPhone: '555-0000',
    specialInstructions: '',
    totalAmount: 35,
    status: 'confirmed',
    createdAt: 0,
    updatedAt: 0,
    ...overrides,
  };
}

describe('OrderService', () => {
  let clock: ReturnType<typeof createClock>;
  let kv: InMemoryKeyValueStore;
  let store: KeyValueOrderStore;
  let service: OrderService;

  beforeEach(async () => {
    clock = createClock(0);
    kv = new InMemoryKeyValueStore(clock.now);
    store = new KeyValueOrderStore(kv, 86_400);
    service = new OrderService(store, clock.now);
    await store.create(sampleOrder());
  });

  afterEach(async () => {
    await kv.close();
  });

  describe('getOrder', () => {
    it('should return a stored order', async () => {
      expect(await service.getOrder('order_1_abc')).toEqual(sampleOrder());
    });

    it('should fail for an unknown order', async () => {
      await expect(service.getOrder('order_nope')).rejects.toBeInstanceOf(OrderNotFoundError);
    });

    it('should fail once the order has expired', async () => {
      clock.advance(86_400_000);
      await expect(service.getOrder('order_1_abc')).rejects.toBeInstanceOf(OrderNotFoundError);
    });
  });

  describe('updateStatus', () => {
    it('should walk the kitchen flow to completion', async () => {
      clock.advance(60_000);
      const preparing = await service.updateStatus('order_1_abc', 'preparing');
      expect(preparing.change).toEqual({ orderId: 'order_1_abc', from: 'confirmed', to: 'preparing', timestamp: 60_000 });
      expect(preparing.order.updatedAt).toBe(60_000);

      await service.updateStatus('order_1_abc', 'ready');
      const completed = await service.updateStatus('order_1_abc', 'completed');
      expect(completed.order.status).toBe('completed');
      expect((await service.getOrder('order_1_abc')).status).toBe('completed');
    });

    it('should reject a transition outside the table and keep the order', async () => {
      await expect(service.updateStatus('order_1_abc', 'completed')).rejects.toBeInstanceOf(
        InvalidStatusTransitionError,
      );
      expect((await service.getOrder('order_1_abc')).status).toBe('confirmed');
    });

    it('should treat the current status as a no-op', async () => {
      const result = await service.updateStatus('order_1_abc', 'confirmed');
      expect(result.change).toBeNull();
      expect(result.order).toEqual(sampleOrder());
    });

    it('should keep cancelled orders terminal', async () => {
      await service.updateStatus('order_1_abc', 'cancelled');
      await expect(service.updateStatus('order_1_abc', 'preparing')).rejects.toThrow(
        "Cannot move order from 'cancelled' to 'preparing'",
      );
    });

    it('should not extend the order expiry', async () => {
      clock.advance(1_000_000);
      await service.updateStatus('order_1_abc', 'preparing');
      expect(await kv.ttl('order:order_1_abc')).toBe(85_400);
    });

    it('should leave the rest of the order untouched', async () => {
      const { order } = await service.updateStatus('order_1_abc', 'preparing');
      expect(order).toEqual({ ...sampleOrder(), status: 'preparing', updatedAt: 0 });
    });
  });

  describe('canTransition', () => {
    it.each([
      ['confirmed', 'preparing', true],
      ['confirmed', 'cancelled', true],
      ['preparing', 'ready', true],
      ['ready', 'cancelled', false],
      ['completed', 'confirmed', false],
    ] as const)('%s -> %s is %p', (from, to, allowed) => {
      expect(canTransition(from, to)).toBe(allowed);
    });
  });
});
