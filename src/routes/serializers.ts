/**
 * Wire shapes. The voice platform's tool definitions use snake_case, so
 * responses are mapped here rather than leaking domain field names.
 */

import { CartSummary } from '../cart/types';
import { CheckoutResult } from '../checkout/types';
import { Order } from '../orders/types';

export function toCartResponse(summary: CartSummary) {
  return {
    session_id: summary.sessionId,
    items: summary.items.map((item) => ({
      item_id: item.itemId,
      name: item.name,
      quantity: item.quantity,
      unit_price: item.unitPrice,
      line_total: item.lineTotal,
      special_requests: item.specialRequests,
    })),
    items_in_cart: summary.itemsInCart,
    total_items: summary.totalItems,
    total_amount: summary.totalAmount,
  };
}

export function toCheckoutResponse(result: CheckoutResult) {
  return {
    order_id: result.orderId,
    status: result.status,
    message: result.message,
    total_amount: result.totalAmount,
    estimated_time: result.estimatedTime,
  };
}

export function toOrderResponse(order: Order) {
  return {
    order_id: order.orderId,
    session_id: order.sessionId,
    status: order.status,
    customer_name: order.customerName,
    customer_phone: order.customerPhone,
    special_instructions: order.specialInstructions,
    items: order.items.map((item) => ({
      item_id: item.itemId,
      name: item.name,
      quantity: item.quantity,
      unit_price: item.unitPrice,
      line_total: item.lineTotal,
      special_requests: item.specialRequests,
    })),
    total_amount: order.totalAmount,
    created_at: new Date(order.createdAt).toISOString(),
    updated_at: new Date(order.updatedAt).toISOString(),
  };
}
