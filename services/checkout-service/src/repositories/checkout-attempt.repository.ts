import type { HydratedDocument } from 'mongoose';

import { BaseRepository, isDuplicateKeyError } from '@storefront/db';
import type { CheckoutAttempt } from '@storefront/types';

import {
  CheckoutAttemptModel,
  type CheckoutAttemptRecord,
} from '../models/checkout-attempt.model.js';
import type { CheckoutAttemptChanges, CheckoutAttemptRepository } from './types.js';

const IN_FLIGHT_STATES = ['initiated', 'validated', 'reserved', 'payment_pending'];

function toAttempt(doc: HydratedDocument<CheckoutAttemptRecord>): CheckoutAttempt {
  const { cart, payment, failure } = doc;

  return {
    checkoutId: doc.checkoutId,
    idempotencyKey: doc.idempotencyKey,
    ownerId: doc.ownerId,
    orderId: doc.orderId,
    cart: {
      ownerId: cart.ownerId,
      version: cart.version,
      items: cart.items.map((item) => ({
        productId: item.productId,
        name: item.name,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        addedAt: item.addedAt,
      })),
      capturedAt: cart.capturedAt,
    },
    state: doc.state,
    revision: doc.revision,
    run: doc.run,
    reservations: doc.reservations.map((reservation) => ({
      reservationId: reservation.reservationId,
      checkoutId: reservation.checkoutId,
      productId: reservation.productId,
      quantity: reservation.quantity,
      status: reservation.status,
      expiresAt: reservation.expiresAt,
      createdAt: reservation.createdAt,
    })),
    total: doc.total,
    ...(payment && {
      payment: {
        status: payment.status,
        provider: payment.provider,
        amount: payment.amount,
        transactionId: payment.transactionId,
        reason: payment.reason,
        at: payment.at,
      },
    }),
    ...(failure && {
      failure: {
        code: failure.code,
        message: failure.message,
        retryable: failure.retryable,
        details: failure.details,
      },
    }),
    deadline: doc.deadline,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoCheckoutAttemptRepository
  extends BaseRepository<CheckoutAttemptRecord>
  implements CheckoutAttemptRepository
{
  constructor() {
    super(CheckoutAttemptModel, 'checkoutattempts');
  }

  async create(attempt: CheckoutAttempt): Promise<boolean> {
    return this.trace('create', async () => {
      try {
        await this.model.create({
          ...attempt,
          cart: { ...attempt.cart, items: attempt.cart.items.map((item) => ({ ...item })) },
        });
        return true;
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          return false;
        }
        throw error;
      }
    });
  }

  async findById(checkoutId: string): Promise<CheckoutAttempt | null> {
    return this.trace('findById', async () => {
      const doc = await this.findOneDocument({ checkoutId });
      return doc ? toAttempt(doc) : null;
    });
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<CheckoutAttempt | null> {
    return this.trace('findByIdempotencyKey', async () => {
      const doc = await this.findOneDocument({ idempotencyKey });
      return doc ? toAttempt(doc) : null;
    });
  }

  async update(
    checkoutId: string,
    expectedRevision: number,
    changes: CheckoutAttemptChanges
  ): Promise<CheckoutAttempt | null> {
    return this.trace('update', async () => {
      const $set: Record<string, unknown> = {};
      const $unset: Record<string, ''> = {};

      for (const [key, value] of Object.entries(changes)) {
        if (value === null) {
          $unset[key] = '';
        } else if (value !== undefined) {
          $set[key] = value;
        }
      }

      const doc = await this.model
        .findOneAndUpdate(
          { checkoutId, revision: expectedRevision },
          {
            $set,
            ...(Object.keys($unset).length > 0 && { $unset }),
            $inc: { revision: 1 },
          },
          { new: true }
        )
        .exec();
      return doc ? toAttempt(doc) : null;
    });
  }

  async findApprovedUncommitted(): Promise<CheckoutAttempt[]> {
    return this.trace('findApprovedUncommitted', async () => {
      const docs = await this.model
        .find({ state: { $ne: 'committed' }, 'payment.status': 'approved' })
        .sort({ createdAt: 1 })
        .exec();
      return docs.map(toAttempt);
    });
  }

  async findExpiredInFlight(now: Date): Promise<CheckoutAttempt[]> {
    return this.trace('findExpiredInFlight', async () => {
      const docs = await this.model
        .find({
          state: { $in: IN_FLIGHT_STATES },
          deadline: { $lte: now },
          'payment.status': { $ne: 'approved' },
        })
        .sort({ deadline: 1 })
        .exec();
      return docs.map(toAttempt);
    });
  }
}
