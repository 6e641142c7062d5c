/**
 * Domain errors. Each carries a stable code and the HTTP status the
 * route layer replies with.
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidArgumentError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT', 400);
  }
}

// ───── Not found family ─────────────────────────────────────────

export class ItemNotFoundError extends DomainError {
  constructor(itemId: string) {
    super(`Menu item ${itemId} not found`, 'ITEM_NOT_FOUND', 404);
  }
}

export class CategoryNotFoundError extends DomainError {
  constructor(category: string) {
    super(`Category '${category}' not found`, 'CATEGORY_NOT_FOUND', 404);
  }
}

export class CartNotFoundError extends DomainError {
  constructor(sessionId: string) {
    super(`No cart found for session ${sessionId}`, 'CART_NOT_FOUND', 404);
  }
}

export class ItemNotInCartError extends DomainError {
  constructor(itemId: string) {
    super(`Item ${itemId} is not in the cart`, 'ITEM_NOT_IN_CART', 404);
  }
}

export class OrderNotFoundError extends DomainError {
  constructor(orderId: string) {
    super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND', 404);
  }
}

// ───── Business rules ───────────────────────────────────────────

export class EmptyCartError extends DomainError {
  constructor() {
    super('Cart is empty', 'EMPTY_CART', 400);
  }
}

export class QuantityLimitExceededError extends DomainError {
  constructor(limit: number, requested: number) {
    super(
      `A cart can hold at most ${limit} items; this would bring it to ${requested}`,
      'QUANTITY_LIMIT_EXCEEDED',
      422,
    );
  }
}

export class InvalidStatusTransitionError extends DomainError {
  constructor(from: string, to: string) {
    super(`Cannot move order from '${from}' to '${to}'`, 'INVALID_STATUS_TRANSITION', 409);
  }
}

// ───── Infrastructure ───────────────────────────────────────────

export class StoreUnavailableError extends DomainError {
  constructor(operation: string, cause?: unknown) {
    super(`Order storage is temporarily unavailable (${operation})`, 'STORE_UNAVAILABLE', 503);
    if (cause !== undefined) this.cause = cause;
  }
}

export class CatalogLoadError extends DomainError {
  constructor(message: string) {
    super(message, 'CATALOG_LOAD_FAILED', 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
