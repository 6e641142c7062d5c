import { Order, OrderStatus, OrderStatusChange, OrderStore, ORDER_STATUS_TRANSITIONS } from './types';
import { InvalidStatusTransitionError, OrderNotFoundError } from '../errors';
import { logger } from '../observability/logger';
import { orderStatusTransitions } from '../observability/metrics';

const log = logger.child({ component: 'order-service' });

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_STATUS_TRANSITIONS[from].includes(to);
}

export class OrderService {
  constructor(
    private readonly store: OrderStore,
    private readonly now: () => number = Date.now,
  ) {}

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.store.get(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    return order;
  }

  /**
   * Move an order to `status`. Asking for the status it already has is a
   * no-op; anything outside the transition table is rejected.
   */
  async updateStatus(orderId: string, status: OrderStatus): Promise<{ order: Order; change: OrderStatusChange | null }> {
    const order = await this.getOrder(orderId);
    if (order.status === status) {
      return { order, change: null };
    }

    if (!canTransition(order.status, status)) {
      log.warn({ orderId, from: order.status, to: status }, 'Invalid order status transition attempted');
      throw new InvalidStatusTransitionError(order.status, status);
    }

    const change: OrderStatusChange = { orderId, from: order.status, to: status, timestamp: this.now() };
    const updated: Order = { ...order, status, updatedAt: change.timestamp };

    if (!(await this.store.update(updated))) {
      // Expired between the read and the write
      throw new OrderNotFoundError(orderId);
    }

    orderStatusTransitions.inc({ from: change.from, to: change.to });
    log.info(change, 'Order status changed');
    return { order: updated, change };
  }
}
