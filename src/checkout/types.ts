import { OrderStatus } from '../orders/types';

export interface CustomerDetails {
  customerName: string;
  customerPhone: string;
  specialInstructions?: string;
}

export interface CheckoutResult {
  orderId: string;
  status: OrderStatus;
  message: string;
  totalAmount: number;
  estimatedTime: string;
}

export interface CheckoutOptions {
  /** Caller-facing preparation estimate, e.g. "25-30 minutes" */
  estimatedTime: string;
  now?: () => number;
  generateOrderId?: (now: number) => string;
}
