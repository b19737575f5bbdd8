import type { CheckoutAttempt } from '@storefront/types';

import type { CheckoutAttemptChanges, CheckoutAttemptRepository } from '../types.js';

function isInFlight(attempt: CheckoutAttempt): boolean {
  return attempt.state !== 'committed' && attempt.state !== 'rejected';
}

export class InMemoryCheckoutAttemptRepository implements CheckoutAttemptRepository {
  private readonly attempts = new Map<string, CheckoutAttempt>();
  private readonly byKey = new Map<string, string>();

  async create(attempt: CheckoutAttempt): Promise<boolean> {
    if (this.attempts.has(attempt.checkoutId) || this.byKey.has(attempt.idempotencyKey)) {
      return false;
    }
    this.attempts.set(attempt.checkoutId, structuredClone(attempt));
    this.byKey.set(attempt.idempotencyKey, attempt.checkoutId);
    return true;
  }

  async findById(checkoutId: string): Promise<CheckoutAttempt | null> {
    const attempt = this.attempts.get(checkoutId);
    return attempt ? structuredClone(attempt) : null;
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<CheckoutAttempt | null> {
    const checkoutId = this.byKey.get(idempotencyKey);
    return checkoutId === undefined ? null : this.findById(checkoutId);
  }

  async update(
    checkoutId: string,
    expectedRevision: number,
    changes: CheckoutAttemptChanges
  ): Promise<CheckoutAttempt | null> {
    const current = this.attempts.get(checkoutId);
    if (!current || current.revision !== expectedRevision) {
      return null;
    }

    const { payment, failure, ...rest } = changes;
    const next: CheckoutAttempt = {
      ...current,
      ...structuredClone(rest),
      revision: current.revision + 1,
      updatedAt: new Date(),
    };

    if (payment === null) {
      delete next.payment;
    } else if (payment !== undefined) {
      next.payment = structuredClone(payment);
    }

    if (failure === null) {
      delete next.failure;
    } else if (failure !== undefined) {
      next.failure = structuredClone(failure);
    }

    this.attempts.set(checkoutId, next);
    return structuredClone(next);
  }

  async findApprovedUncommitted(): Promise<CheckoutAttempt[]> {
    return [...this.attempts.values()]
      .filter((attempt) => attempt.state !== 'committed' && attempt.payment?.status === 'approved')
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((attempt) => structuredClone(attempt));
  }

  async findExpiredInFlight(now: Date): Promise<CheckoutAttempt[]> {
    return [...this.attempts.values()]
      .filter(
        (attempt) =>
          isInFlight(attempt) &&
          attempt.deadline.getTime() <= now.getTime() &&
          attempt.payment?.status !== 'approved'
      )
      .sort((a, b) => a.deadline.getTime() - b.deadline.getTime())
      .map((attempt) => structuredClone(attempt));
  }
}
