export type OrderStatus = 'confirmed' | 'preparing' | 'ready' | 'completed' | 'cancelled';

export const ORDER_STATUSES: readonly OrderStatus[] = ['confirmed', 'preparing', 'ready', 'completed', 'cancelled'];

/** Allowed next states. `completed` and `cancelled` are terminal. */
export const ORDER_STATUS_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  confirmed: ['preparing', 'cancelled'],
  preparing: ['ready', 'cancelled'],
  ready: ['completed'],
  completed: [],
  cancelled: [],
};

export interface OrderLine {
  itemId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
  specialRequests: string | null;
}

/** Immutable snapshot of a checked-out cart; only `status` changes afterwards */
export interface Order {
  orderId: string;
  sessionId: string;
  items: OrderLine[];
  customerName: string;
  customerPhone: string;
  specialInstructions: string;
  totalAmount: number;
  status: OrderStatus;
  createdAt: number;
  updatedAt: number;
}

export interface OrderStore {
  get(orderId: string): Promise<Order | null>;
  create(order: Order): Promise<void>;
  /** Overwrite an existing order, keeping its remaining expiry. Returns false if it expired. */
  update(order: Order): Promise<boolean>;
}

export interface OrderStatusChange {
  orderId: string;
  from: OrderStatus;
  to: OrderStatus;
  timestamp: number;
}
