import { randomUUID } from 'crypto';

import type { EventPublisher } from '@storefront/event-bus';
import { createChildLogger } from '@storefront/logger';
import { addSpanAttributes, traceBusiness } from '@storefront/observability';
import type {
  CartSnapshot,
  CheckoutAttempt,
  CheckoutRejectedEvent,
  CheckoutResult,
  Order,
  OrderCreatedEvent,
  OrderItem,
  PaymentDetails,
  PaymentOutcome,
  PaymentRecord,
  Reservation,
} from '@storefront/types';

import {
  CheckoutInProgressError,
  CheckoutRejectedError,
  CheckoutTimeoutError,
  DuplicateOrderError,
  EmptyCartError,
  InsufficientStockError,
  InvalidQuantityError,
  NotFoundError,
  PaymentDeclinedError,
  PaymentError,
  PaymentReviewError,
  PriceChangedError,
  ProductUnavailableError,
  type PriceDrift,
} from '../errors.js';
import { EventTypes, publishEvent } from '../events.js';
import type { PaymentGateway } from '../payments/payment-gateway.js';
import type { CheckoutAttemptChanges, CheckoutAttemptRepository } from '../repositories/types.js';
import type { CartService } from './cart.service.js';
import type { CatalogService } from './catalog.service.js';
import type { InventoryLedger } from './inventory-ledger.service.js';
import { generateOrderNumber, type OrderLedger } from './order-ledger.service.js';

const log = createChildLogger({ component: 'checkout-coordinator' });

/** Extra time a `payment_pending` attempt gets past its deadline before it counts as abandoned. */
export const PAYMENT_GRACE_MS = 60_000;

const LATE_OUTCOME_TRIES = 3;

export interface CheckoutCommand {
  idempotencyKey?: string;
  paymentDetails: PaymentDetails;
}

export interface CheckoutOptions {
  timeoutSeconds: number;
  maxLineQuantity: number;
}

export interface CheckoutDependencies {
  attempts: CheckoutAttemptRepository;
  carts: CartService;
  catalog: CatalogService;
  inventory: InventoryLedger;
  orders: OrderLedger;
  payments: PaymentGateway;
  events: EventPublisher;
}

export function clientIdempotencyKey(ownerId: string, key: string): string {
  return `${ownerId}:${key}`;
}

export function derivedIdempotencyKey(ownerId: string, cartVersion: number): string {
  return `cart:${ownerId}:v${cartVersion}`;
}

export function isTerminal(attempt: CheckoutAttempt): boolean {
  return attempt.state === 'committed' || attempt.state === 'rejected';
}

export function hasApprovedPayment(attempt: CheckoutAttempt): boolean {
  return attempt.payment?.status === 'approved';
}

/** An in-flight attempt nobody will finish; a payment call gets a grace period. */
export function isAbandoned(attempt: CheckoutAttempt, now: Date): boolean {
  if (isTerminal(attempt) || hasApprovedPayment(attempt)) {
    return false;
  }
  const grace = attempt.state === 'payment_pending' ? PAYMENT_GRACE_MS : 0;
  return attempt.deadline.getTime() + grace <= now.getTime();
}

/** Timed out while its charge was unanswered; the provider may still approve it. */
function hasUnansweredCharge(attempt: CheckoutAttempt): boolean {
  return attempt.failure?.details?.chargeInFlight === true && attempt.payment === undefined;
}

function snapshotTotal(snapshot: CartSnapshot): number {
  return snapshot.items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0);
}

function byProductId(a: { productId: string }, b: { productId: string }): number {
  if (a.productId === b.productId) {
    return 0;
  }
  return a.productId < b.productId ? -1 : 1;
}

/**
 * Turns a cart into an order: validate, reserve, charge, commit. Each step is
 * recorded on the checkout attempt with a revision check, so concurrent
 * requests for the same idempotency key cannot both advance it, and a replay
 * after a crash completes the commit without charging again.
 */
export class CheckoutCoordinator {
  constructor(
    private readonly deps: CheckoutDependencies,
    private readonly options: CheckoutOptions
  ) {}

  async checkout(ownerId: string, command: CheckoutCommand): Promise<CheckoutResult> {
    return traceBusiness('checkout', 'cart', ownerId, async () => {
      // A client key is resolved before the cart is read: after a successful
      // checkout the cart is empty but the retry must still see its order
      if (command.idempotencyKey !== undefined) {
        const key = clientIdempotencyKey(ownerId, command.idempotencyKey);
        const existing = await this.deps.attempts.findByIdempotencyKey(key);
        if (existing) {
          return this.resume(existing, command.paymentDetails);
        }
        return this.start(ownerId, key, await this.deps.carts.snapshot(ownerId), command.paymentDetails);
      }

      const snapshot = await this.deps.carts.snapshot(ownerId);
      const key = derivedIdempotencyKey(ownerId, snapshot.version);
      const existing = await this.deps.attempts.findByIdempotencyKey(key);
      if (existing) {
        return this.resume(existing, command.paymentDetails);
      }
      return this.start(ownerId, key, snapshot, command.paymentDetails);
    });
  }

  async getAttempt(checkoutId: string): Promise<CheckoutAttempt> {
    const attempt = await this.deps.attempts.findById(checkoutId);
    if (!attempt) {
      throw new NotFoundError('Checkout attempt', checkoutId);
    }
    return attempt;
  }

  /**
   * Completes an attempt whose payment is approved: writes the order, commits
   * the reservations, settles the cart and marks the attempt committed. Every
   * step tolerates having already run.
   */
  async finalize(attempt: CheckoutAttempt): Promise<Order> {
    return traceBusiness('finalize', 'checkout', attempt.checkoutId, async () => {
      const transactionId = attempt.payment?.status === 'approved' ? attempt.payment.transactionId : undefined;
      if (!attempt.payment || transactionId === undefined) {
        throw new Error(`Checkout ${attempt.checkoutId} has no approved payment to finalize`);
      }

      // An approval that arrived after the attempt was closed has to take its stock again
      const held = attempt.state === 'rejected' ? await this.reacquire(attempt, transactionId) : attempt;

      const order = await this.recordOrder(held, attempt.payment.provider, transactionId);

      for (const reservation of held.reservations) {
        await this.deps.inventory.commit(reservation);
      }

      await this.deps.carts.settle(held.ownerId, held.checkoutId, held.cart.version, held.cart.items);

      if (held.state !== 'committed') {
        const committed = await this.deps.attempts.update(held.checkoutId, held.revision, {
          state: 'committed',
        });

        if (committed) {
          log.info(
            { checkoutId: attempt.checkoutId, orderId: order.orderId, ownerId: attempt.ownerId, total: order.total },
            'Checkout committed'
          );
          await publishEvent<OrderCreatedEvent>(
            this.deps.events,
            EventTypes.ORDER_CREATED,
            {
              orderId: order.orderId,
              orderNumber: order.orderNumber,
              ownerId: order.ownerId,
              items: order.items,
              total: order.total,
            },
            order.orderId
          );
        } else {
          const current = await this.deps.attempts.findById(attempt.checkoutId);
          if (current?.state !== 'committed') {
            throw new CheckoutInProgressError(attempt.checkoutId);
          }
        }
      }

      return order;
    });
  }

  /** Rejects an abandoned attempt with TIMEOUT and releases its stock. Returns false if it moved meanwhile. */
  async expire(attempt: CheckoutAttempt): Promise<boolean> {
    return this.close(attempt, new CheckoutTimeoutError(attempt.checkoutId, attempt.state === 'payment_pending'));
  }

  private async start(
    ownerId: string,
    idempotencyKey: string,
    snapshot: CartSnapshot,
    paymentDetails: PaymentDetails
  ): Promise<CheckoutResult> {
    if (snapshot.items.length === 0) {
      throw new EmptyCartError();
    }

    const now = new Date();
    const attempt: CheckoutAttempt = {
      checkoutId: randomUUID(),
      idempotencyKey,
      ownerId,
      orderId: randomUUID(),
      cart: snapshot,
      state: 'initiated',
      revision: 0,
      run: 1,
      reservations: [],
      total: snapshotTotal(snapshot),
      deadline: this.deadlineFrom(now),
      createdAt: now,
      updatedAt: now,
    };

    if (!(await this.deps.attempts.create(attempt))) {
      // Lost the race to a concurrent request with the same key
      const existing = await this.deps.attempts.findByIdempotencyKey(idempotencyKey);
      if (!existing) {
        throw new Error(`Checkout attempt for key ${idempotencyKey} could not be created`);
      }
      return this.resume(existing, paymentDetails);
    }

    log.info(
      { checkoutId: attempt.checkoutId, ownerId, cartVersion: snapshot.version, total: attempt.total },
      'Checkout started'
    );
    return this.drive(attempt, paymentDetails);
  }

  private async resume(attempt: CheckoutAttempt, paymentDetails: PaymentDetails): Promise<CheckoutResult> {
    addSpanAttributes({ 'checkout.id': attempt.checkoutId, 'checkout.state': attempt.state });

    if (attempt.state === 'committed') {
      const order = await this.deps.orders.get(attempt.orderId);
      if (!order) {
        throw new NotFoundError('Order', attempt.orderId);
      }
      return { orderId: order.orderId, status: 'committed', replayed: true, order };
    }

    if (hasApprovedPayment(attempt)) {
      log.info({ checkoutId: attempt.checkoutId }, 'Replaying commit for an approved checkout');
      const order = await this.finalize(attempt);
      return { orderId: order.orderId, status: 'committed', replayed: true, order };
    }

    if (attempt.state === 'rejected') {
      return this.restart(attempt, paymentDetails);
    }

    if (isAbandoned(attempt, new Date())) {
      await this.expire(attempt);
      throw new CheckoutTimeoutError(attempt.checkoutId);
    }

    throw new CheckoutInProgressError(attempt.checkoutId);
  }

  private async restart(attempt: CheckoutAttempt, paymentDetails: PaymentDetails): Promise<CheckoutResult> {
    // A second charge is never sent while the first one can still come back approved
    if (hasApprovedPayment(attempt) || hasUnansweredCharge(attempt)) {
      throw new CheckoutInProgressError(attempt.checkoutId);
    }

    const snapshot = await this.deps.carts.snapshot(attempt.ownerId);
    if (snapshot.items.length === 0) {
      throw new EmptyCartError();
    }

    const restarted = await this.deps.attempts.update(attempt.checkoutId, attempt.revision, {
      state: 'initiated',
      run: attempt.run + 1,
      cart: snapshot,
      reservations: [],
      total: snapshotTotal(snapshot),
      deadline: this.deadlineFrom(new Date()),
      payment: null,
      failure: null,
    });
    if (!restarted) {
      throw new CheckoutInProgressError(attempt.checkoutId);
    }

    log.info(
      { checkoutId: attempt.checkoutId, run: restarted.run, previousFailure: attempt.failure?.code },
      'Checkout restarted'
    );
    return this.drive(restarted, paymentDetails);
  }

  private async drive(attempt: CheckoutAttempt, paymentDetails: PaymentDetails): Promise<CheckoutResult> {
    const pending = await this.prepare(attempt);

    const outcome = await this.charge(pending, paymentDetails);
    const record: PaymentRecord = {
      status: outcome.status,
      provider: this.deps.payments.provider,
      amount: pending.total,
      ...(outcome.status === 'approved'
        ? { transactionId: outcome.transactionId }
        : { reason: outcome.reason }),
      at: new Date(),
    };

    if (outcome.status === 'declined') {
      return this.reject(pending, new PaymentDeclinedError(outcome.reason), record);
    }
    if (outcome.status === 'error') {
      return this.reject(pending, new PaymentError(outcome.reason), record);
    }

    // The approval is durable before any commit effect so a crash from here on is replayable
    const approved = await this.deps.attempts.update(pending.checkoutId, pending.revision, { payment: record });
    if (approved) {
      const order = await this.finalize(approved);
      return { orderId: order.orderId, status: 'committed', replayed: false, order };
    }

    const late = await this.recordLateOutcome(pending, record);
    if (!late) {
      log.error(
        { checkoutId: pending.checkoutId, run: pending.run, transactionId: outcome.transactionId, amount: pending.total },
        'Consistency alarm: payment approved for a checkout run that was superseded'
      );
      throw new PaymentReviewError(pending.checkoutId, outcome.transactionId);
    }

    log.warn(
      { checkoutId: pending.checkoutId, transactionId: outcome.transactionId },
      'Payment approved after the checkout timed out; completing the order'
    );
    const order = await this.finalize(late);
    return { orderId: order.orderId, status: 'committed', replayed: false, order };
  }

  /**
   * Keeps a payment outcome that came back after its attempt was closed.
   * Returns null when the attempt has since moved to another run.
   */
  private async recordLateOutcome(pending: CheckoutAttempt, record: PaymentRecord): Promise<CheckoutAttempt | null> {
    for (let tries = 0; tries < LATE_OUTCOME_TRIES; tries += 1) {
      const current = await this.deps.attempts.findById(pending.checkoutId);
      if (!current || current.run !== pending.run || current.state !== 'rejected' || current.payment) {
        return null;
      }
      const updated = await this.deps.attempts.update(current.checkoutId, current.revision, { payment: record });
      if (updated) {
        return updated;
      }
    }
    return null;
  }

  private async reacquire(attempt: CheckoutAttempt, transactionId: string): Promise<CheckoutAttempt> {
    const revived: CheckoutAttempt = { ...attempt, deadline: this.deadlineFrom(new Date()) };

    let reservations: Reservation[];
    try {
      reservations = await this.reserveAll(revived);
    } catch (error) {
      if (!(error instanceof InsufficientStockError)) {
        throw error;
      }
      log.error(
        { checkoutId: attempt.checkoutId, transactionId, productId: error.productId, amount: attempt.total },
        'Consistency alarm: approved payment has no stock left to fill it'
      );
      throw new PaymentReviewError(attempt.checkoutId, transactionId);
    }

    const updated = await this.deps.attempts.update(attempt.checkoutId, attempt.revision, {
      state: 'reserved',
      reservations,
      deadline: revived.deadline,
      failure: null,
    });
    if (!updated) {
      for (const reservation of reservations) {
        await this.deps.inventory.release(reservation);
      }
      throw new CheckoutInProgressError(attempt.checkoutId);
    }
    return updated;
  }

  /** Runs the attempt up to `payment_pending`, rejecting it on any business failure. */
  private async prepare(attempt: CheckoutAttempt): Promise<CheckoutAttempt> {
    let current = attempt;
    try {
      await this.validate(current.cart);
      current = await this.advance(current, { state: 'validated' });

      const reservations = await this.reserveAll(current);
      current = await this.advance(current, { state: 'reserved', reservations });

      if (Date.now() >= current.deadline.getTime()) {
        throw new CheckoutTimeoutError(current.checkoutId);
      }
      return await this.advance(current, { state: 'payment_pending' });
    } catch (error) {
      if (error instanceof CheckoutRejectedError) {
        return this.reject(current, error);
      }
      throw error;
    }
  }

  private async validate(snapshot: CartSnapshot): Promise<void> {
    const drift: PriceDrift[] = [];

    for (const line of snapshot.items) {
      const product = await this.deps.catalog.getProduct(line.productId);
      if (!product || !product.active) {
        throw new ProductUnavailableError(line.productId);
      }
      if (!Number.isInteger(line.quantity) || line.quantity < 1 || line.quantity > this.options.maxLineQuantity) {
        throw new InvalidQuantityError(line.productId, line.quantity, this.options.maxLineQuantity);
      }
      if (product.price !== line.unitPrice) {
        drift.push({ productId: line.productId, expected: line.unitPrice, current: product.price });
      }
    }

    if (drift.length > 0) {
      throw new PriceChangedError(drift);
    }
  }

  /** Lines are reserved in ascending productId order; a failure returns what was taken. */
  private async reserveAll(attempt: CheckoutAttempt): Promise<Reservation[]> {
    const acquired: Reservation[] = [];
    const lines = [...attempt.cart.items].sort(byProductId);

    try {
      for (const line of lines) {
        acquired.push(
          await this.deps.inventory.reserve(line.productId, line.quantity, {
            checkoutId: attempt.checkoutId,
            expiresAt: attempt.deadline,
          })
        );
      }
      return acquired;
    } catch (error) {
      for (const reservation of acquired) {
        await this.deps.inventory.release(reservation);
      }
      throw error;
    }
  }

  private async charge(attempt: CheckoutAttempt, paymentDetails: PaymentDetails): Promise<PaymentOutcome> {
    try {
      return await this.deps.payments.charge({
        amount: attempt.total,
        reference: `${attempt.checkoutId}:${attempt.run}`,
        paymentDetails,
      });
    } catch (error) {
      log.error({ error, checkoutId: attempt.checkoutId }, 'Payment provider call failed');
      return {
        status: 'error',
        reason: error instanceof Error ? error.message : 'payment provider failure',
      };
    }
  }

  private async recordOrder(attempt: CheckoutAttempt, provider: string, transactionId: string): Promise<Order> {
    const existing = await this.deps.orders.get(attempt.orderId);
    if (existing) {
      return existing;
    }

    const order: Order = {
      orderId: attempt.orderId,
      orderNumber: generateOrderNumber(attempt.orderId, attempt.createdAt),
      checkoutId: attempt.checkoutId,
      idempotencyKey: attempt.idempotencyKey,
      ownerId: attempt.ownerId,
      items: await this.orderItems(attempt.cart),
      total: attempt.total,
      payment: { status: 'approved', provider, transactionId, amount: attempt.total },
      createdAt: new Date(),
    };

    try {
      return await this.deps.orders.append(order);
    } catch (error) {
      if (!(error instanceof DuplicateOrderError)) {
        throw error;
      }
      log.error(
        { checkoutId: attempt.checkoutId, orderId: order.orderId, idempotencyKey: order.idempotencyKey },
        'Consistency alarm: duplicate order write'
      );
      const written = await this.deps.orders.get(attempt.orderId);
      if (!written) {
        throw error;
      }
      return written;
    }
  }

  private async orderItems(snapshot: CartSnapshot): Promise<OrderItem[]> {
    const items: OrderItem[] = [];
    for (const line of snapshot.items) {
      const product = await this.deps.catalog.getProduct(line.productId);
      items.push({
        productId: line.productId,
        sku: product?.sku ?? line.productId,
        name: line.name,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        lineTotal: line.quantity * line.unitPrice,
      });
    }
    return items;
  }

  private async advance(attempt: CheckoutAttempt, changes: CheckoutAttemptChanges): Promise<CheckoutAttempt> {
    const updated = await this.deps.attempts.update(attempt.checkoutId, attempt.revision, changes);
    if (!updated) {
      throw new CheckoutInProgressError(attempt.checkoutId);
    }
    return updated;
  }

  private async reject(
    attempt: CheckoutAttempt,
    error: CheckoutRejectedError,
    payment?: PaymentRecord
  ): Promise<never> {
    await this.close(attempt, error, payment);
    throw error;
  }

  private async close(
    attempt: CheckoutAttempt,
    error: CheckoutRejectedError,
    payment?: PaymentRecord
  ): Promise<boolean> {
    const rejected = await this.deps.attempts.update(attempt.checkoutId, attempt.revision, {
      state: 'rejected',
      failure: error.toFailure(),
      ...(payment && { payment }),
    });

    if (!rejected) {
      log.warn({ checkoutId: attempt.checkoutId, code: error.code }, 'Checkout attempt changed before it could be rejected');
      if (payment) {
        await this.recordLateOutcome(attempt, payment);
      }
      return false;
    }

    // Stock goes back only once the attempt can no longer reach payment
    await this.deps.inventory.releaseForCheckout(attempt.checkoutId);

    log.info(
      { checkoutId: attempt.checkoutId, ownerId: attempt.ownerId, code: error.code, retryable: error.retryable },
      'Checkout rejected'
    );
    await publishEvent<CheckoutRejectedEvent>(
      this.deps.events,
      EventTypes.CHECKOUT_REJECTED,
      {
        checkoutId: attempt.checkoutId,
        ownerId: attempt.ownerId,
        code: error.code,
        retryable: error.retryable,
      },
      `${attempt.checkoutId}:${attempt.run}:rejected`
    );
    return true;
  }

  private deadlineFrom(now: Date): Date {
    return new Date(now.getTime() + this.options.timeoutSeconds * 1000);
  }
}
