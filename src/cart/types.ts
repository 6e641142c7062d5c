/**
 * Cart Types — per-call shopping cart
 *
 * One cart per voice session. Totals are never stored; they are derived from
 * the current menu prices every time a cart is read.
 */

export interface CartLine {
  itemId: string;
  name: string;
  quantity: number;
  /** Price when the line was last added; only used if the item leaves the menu */
  unitPriceAtAdd: number;
  specialRequests: string | null;
}

export interface Cart {
  sessionId: string;
  lines: CartLine[];
  createdAt: number;
  updatedAt: number;
}

export interface CartSummaryLine {
  itemId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
  specialRequests: string | null;
}

export interface CartSummary {
  sessionId: string;
  items: CartSummaryLine[];
  /** Distinct lines */
  itemsInCart: number;
  /** Sum of quantities */
  totalItems: number;
  totalAmount: number;
}

export interface CartStore {
  get(sessionId: string): Promise<Cart | null>;
  save(cart: Cart): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

export interface CartServiceOptions {
  /** Upper bound on the sum of quantities across all lines */
  maxTotalQuantity: number;
  now?: () => number;
}
