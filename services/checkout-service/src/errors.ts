import type { CheckoutFailure, CheckoutFailureCode } from '@storefront/types';

export type StorefrontErrorCode =
  | CheckoutFailureCode
  | 'CONCURRENT_MODIFICATION'
  | 'CHECKOUT_IN_PROGRESS'
  | 'DUPLICATE_ORDER'
  | 'NOT_FOUND'
  | 'PAYMENT_REVIEW';

export class StorefrontError extends Error {
  constructor(
    message: string,
    readonly code: StorefrontErrorCode,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Errors that end a checkout attempt in the `rejected` state. */
export abstract class CheckoutRejectedError extends StorefrontError {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly code: CheckoutFailureCode,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message, code, statusCode, details);
  }

  toFailure(): CheckoutFailure {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export class ConcurrentModificationError extends StorefrontError {
  constructor(ownerId: string, expectedVersion: number, actualVersion: number) {
    super('Cart was modified concurrently; reload and retry', 'CONCURRENT_MODIFICATION', 409, {
      ownerId,
      expectedVersion,
      actualVersion,
    });
  }
}

export class EmptyCartError extends CheckoutRejectedError {
  readonly retryable = false;

  constructor() {
    super('Cart is empty', 'EMPTY_CART', 400);
  }
}

export class ProductUnavailableError extends CheckoutRejectedError {
  readonly retryable = false;

  constructor(productId: string) {
    super(`Product ${productId} is not available`, 'PRODUCT_UNAVAILABLE', 422, { productId });
  }
}

export class InvalidQuantityError extends CheckoutRejectedError {
  readonly retryable = false;

  constructor(productId: string, quantity: number, max: number) {
    super(`Quantity for ${productId} must be between 1 and ${max}`, 'INVALID_QUANTITY', 422, {
      productId,
      quantity,
      max,
    });
  }
}

export interface PriceDrift {
  productId: string;
  expected: number;
  current: number;
}

export class PriceChangedError extends CheckoutRejectedError {
  readonly retryable = false;

  constructor(readonly changes: PriceDrift[]) {
    super('Prices changed since the items were added; review the cart', 'PRICE_CHANGED', 409, {
      changes,
    });
  }
}

export class InsufficientStockError extends CheckoutRejectedError {
  readonly retryable = false;

  constructor(
    readonly productId: string,
    readonly requested: number,
    readonly available: number
  ) {
    super(`Insufficient stock for ${productId}`, 'INSUFFICIENT_STOCK', 409, {
      productId,
      requested,
      available,
    });
  }
}

export class PaymentDeclinedError extends CheckoutRejectedError {
  readonly retryable = false;

  constructor(reason: string) {
    super(`Payment declined: ${reason}`, 'PAYMENT_DECLINED', 402, { reason });
  }
}

export class PaymentError extends CheckoutRejectedError {
  readonly retryable = true;

  constructor(reason: string) {
    super(`Payment could not be processed: ${reason}`, 'PAYMENT_ERROR', 503, { reason });
  }
}

export class CheckoutTimeoutError extends CheckoutRejectedError {
  readonly retryable = true;

  /** `chargeInFlight` marks an attempt closed while its payment call had not answered. */
  constructor(checkoutId: string, chargeInFlight = false) {
    super('Checkout attempt timed out', 'TIMEOUT', 408, { checkoutId, ...(chargeInFlight && { chargeInFlight }) });
  }
}

export class CheckoutInProgressError extends StorefrontError {
  constructor(checkoutId: string) {
    super('Checkout is already in progress for this key', 'CHECKOUT_IN_PROGRESS', 409, {
      checkoutId,
    });
  }
}

/** A payment was approved but no order can be written for it without a person looking at it. */
export class PaymentReviewError extends StorefrontError {
  constructor(checkoutId: string, transactionId?: string) {
    super('Payment was approved but the order could not be completed; it is held for review', 'PAYMENT_REVIEW', 409, {
      checkoutId,
      ...(transactionId !== undefined && { transactionId }),
    });
  }
}

export class DuplicateOrderError extends StorefrontError {
  constructor(orderId: string, idempotencyKey: string) {
    super('Order already exists', 'DUPLICATE_ORDER', 500, { orderId, idempotencyKey });
  }
}

export class NotFoundError extends StorefrontError {
  constructor(resource: string, id: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404, { id });
  }
}
