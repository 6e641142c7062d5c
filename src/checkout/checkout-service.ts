/**
 * Checkout — turns an open cart into a confirmed order.
 *
 * Open → Checked Out. The order is written before the cart is deleted, so a
 * failed order write leaves the cart in place for a retry.
 */

import { CheckoutOptions, CheckoutResult, CustomerDetails } from './types';
import { CartStore } from '../cart/types';
import { lineTotal, sumAmounts } from '../cart/pricing';
import { requireSessionId } from '../cart/cart-service';
import { Catalog } from '../catalog/catalog';
import { Order, OrderLine, OrderStore } from '../orders/types';
import { generateOrderId } from '../orders/order-id';
import { CartNotFoundError, EmptyCartError, InvalidArgumentError } from '../errors';
import { logger } from '../observability/logger';
import { checkoutsTotal } from '../observability/metrics';

const log = logger.child({ component: 'checkout' });

export class CheckoutService {
  private readonly now: () => number;
  private readonly nextOrderId: (now: number) => string;

  constructor(
    private readonly catalog: Catalog,
    private readonly carts: CartStore,
    private readonly orders: OrderStore,
    private readonly options: CheckoutOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.nextOrderId = options.generateOrderId ?? generateOrderId;
  }

  async checkout(sessionId: string, customer: CustomerDetails): Promise<CheckoutResult> {
    const session = requireSessionId(sessionId);

    const cart = await this.carts.get(session);
    if (!cart) throw new CartNotFoundError(session);
    if (cart.lines.length === 0) throw new EmptyCartError();

    const customerName = customer.customerName.trim();
    const customerPhone = customer.customerPhone.trim();
    if (!customerName || !customerPhone) {
      throw new InvalidArgumentError('Customer name and phone are required');
    }

    // Prices come from the menu as it is now, not as it was when items were added
    const items: OrderLine[] = cart.lines.map((line) => {
      const item = this.catalog.findItem(line.itemId);
      return {
        itemId: item.id,
        name: item.name,
        quantity: line.quantity,
        unitPrice: item.price,
        lineTotal: lineTotal(item.price, line.quantity),
        specialRequests: line.specialRequests,
      };
    });
    const totalAmount = sumAmounts(items.map((i) => i.lineTotal));

    const now = this.now();
    const order: Order = {
      orderId: this.nextOrderId(now),
      sessionId: session,
      items,
      customerName,
      customerPhone,
      specialInstructions: customer.specialInstructions?.trim() ?? '',
      totalAmount,
      status: 'confirmed',
      createdAt: now,
      updatedAt: now,
    };

    await this.orders.create(order);
    await this.carts.delete(session);

    checkoutsTotal.inc();
    log.info(
      { sessionId: session, orderId: order.orderId, lines: items.length, totalAmount },
      'Cart checked out',
    );

    return {
      orderId: order.orderId,
      status: order.status,
      message: `Order placed successfully! Your order ID is ${order.orderId}`,
      totalAmount,
      estimatedTime: this.options.estimatedTime,
    };
  }
}
