/**
 * Cart Service — per-call shopping cart
 *
 * Add, remove, view and clear operations for the cart of one voice session.
 * Lines are unique by item id: adding an item already in the cart bumps its
 * quantity instead of creating a second line.
 */

import { Cart, CartLine, CartServiceOptions, CartStore, CartSummary, CartSummaryLine } from './types';
import { lineTotal, sumAmounts } from './pricing';
import { Catalog } from '../catalog/catalog';
import { InvalidArgumentError, ItemNotInCartError, QuantityLimitExceededError } from '../errors';
import { logger } from '../observability/logger';
import { cartOperations } from '../observability/metrics';

const log = logger.child({ component: 'cart-service' });

/** Session ids are opaque: a blank id is rejected, anything else is used as given */
export function requireSessionId(sessionId: string): string {
  if (!sessionId.trim()) throw new InvalidArgumentError('session_id is required');
  return sessionId;
}

function normalizeNote(note: string | null | undefined): string | null {
  const trimmed = note?.trim();
  return trimmed ? trimmed : null;
}

export function totalQuantity(lines: readonly CartLine[]): number {
  return lines.reduce((acc, line) => acc + line.quantity, 0);
}

export class CartService {
  private readonly now: () => number;

  constructor(
    private readonly catalog: Catalog,
    private readonly store: CartStore,
    private readonly options: CartServiceOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Add a menu item to the session's cart, creating the cart on first use */
  async addItem(
    sessionId: string,
    itemId: string,
    quantity = 1,
    specialRequests?: string | null,
  ): Promise<CartSummary> {
    const session = requireSessionId(sessionId);
    if (!Number.isInteger(quantity) || quantity <= 0) {
      cartOperations.inc({ operation: 'add', outcome: 'rejected' });
      throw new InvalidArgumentError(`quantity must be a positive integer, got ${quantity}`);
    }

    const item = this.catalog.findItem(itemId);
    const cart = (await this.store.get(session)) ?? this.emptyCart(session);

    const requestedTotal = totalQuantity(cart.lines) + quantity;
    if (requestedTotal > this.options.maxTotalQuantity) {
      cartOperations.inc({ operation: 'add', outcome: 'rejected' });
      throw new QuantityLimitExceededError(this.options.maxTotalQuantity, requestedTotal);
    }

    const note = normalizeNote(specialRequests);
    const existing = cart.lines.find((line) => line.itemId === item.id);
    if (existing) {
      existing.quantity += quantity;
      existing.unitPriceAtAdd = item.price;
      // Last write wins, including clearing an earlier note
      existing.specialRequests = note;
    } else {
      cart.lines.push({
        itemId: item.id,
        name: item.name,
        quantity,
        unitPriceAtAdd: item.price,
        specialRequests: note,
      });
    }
    cart.updatedAt = this.now();

    await this.store.save(cart);
    cartOperations.inc({ operation: 'add', outcome: 'ok' });
    log.info(
      { sessionId: session, itemId: item.id, quantity, lineQuantity: existing?.quantity ?? quantity },
      'Item added to cart',
    );
    return this.summarize(cart);
  }

  /** Remove a whole line (not a decrement). A cart left with no lines is deleted. */
  async removeItem(sessionId: string, itemId: string): Promise<{ removed: CartLine; cart: CartSummary }> {
    const session = requireSessionId(sessionId);
    const cart = await this.store.get(session);
    const idx = cart ? cart.lines.findIndex((line) => line.itemId === itemId) : -1;

    if (!cart || idx === -1) {
      cartOperations.inc({ operation: 'remove', outcome: 'rejected' });
      throw new ItemNotInCartError(itemId);
    }

    const [removed] = cart.lines.splice(idx, 1);
    cart.updatedAt = this.now();

    if (cart.lines.length === 0) {
      await this.store.delete(session);
    } else {
      await this.store.save(cart);
    }

    cartOperations.inc({ operation: 'remove', outcome: 'ok' });
    log.info({ sessionId: session, itemId, remainingLines: cart.lines.length }, 'Item removed from cart');
    return { removed, cart: this.summarize(cart) };
  }

  /**
   * Current cart for the session. A session that never added anything, or
   * whose cart expired or was checked out, gets the canonical empty cart.
   */
  async getCart(sessionId: string): Promise<CartSummary> {
    const session = requireSessionId(sessionId);
    const cart = await this.store.get(session);
    return this.summarize(cart ?? this.emptyCart(session));
  }

  /** Drop the cart entirely. Idempotent. */
  async clearCart(sessionId: string): Promise<void> {
    const session = requireSessionId(sessionId);
    await this.store.delete(session);
    cartOperations.inc({ operation: 'clear', outcome: 'ok' });
    log.info({ sessionId: session }, 'Cart cleared');
  }

  /** Derive totals from current menu prices */
  summarize(cart: Cart): CartSummary {
    const items: CartSummaryLine[] = cart.lines.map((line) => {
      const unitPrice = this.catalog.hasItem(line.itemId)
        ? this.catalog.findItem(line.itemId).price
        : line.unitPriceAtAdd;
      return {
        itemId: line.itemId,
        name: line.name,
        quantity: line.quantity,
        unitPrice,
        lineTotal: lineTotal(unitPrice, line.quantity),
        specialRequests: line.specialRequests,
      };
    });

    return {
      sessionId: cart.sessionId,
      items,
      itemsInCart: items.length,
      totalItems: totalQuantity(cart.lines),
      totalAmount: sumAmounts(items.map((i) => i.lineTotal)),
    };
  }

  private emptyCart(sessionId: string): Cart {
    const now = this.now();
    return { sessionId, lines: [], createdAt: now, updatedAt: now };
  }
}
