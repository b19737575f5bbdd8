import { createHash } from 'crypto';

import { createChildLogger } from '@storefront/logger';
import { traceProviderCall } from '@storefront/observability';
import type { ChargeRequest, PaymentOutcome } from '@storefront/types';

import type { PaymentGateway } from './payment-gateway.js';

const log = createChildLogger({ component: 'payment-simulator' });

export type SimulatedOutcome = PaymentOutcome['status'];

export const DEFAULT_TOKEN_OUTCOMES: Readonly<Record<string, SimulatedOutcome>> = {
  tok_approve: 'approved',
  tok_decline: 'declined',
  tok_error: 'error',
};

export interface PaymentSimulatorOptions {
  /** Outcome for tokens without a rule. */
  defaultOutcome?: SimulatedOutcome;
  /** Replaces the default token rules. */
  tokenOutcomes?: Record<string, SimulatedOutcome>;
  /** Charges above this amount are declined. */
  maxAmount?: number;
  /** Probability (0..1) of an injected provider error. */
  failureRate?: number;
  seed?: number;
  latencyMs?: number;
}

/** Seeded PRNG (mulberry32) so injected failures replay identically. */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function simulatedTransactionId(reference: string): string {
  return `sim_${createHash('sha256').update(reference).digest('hex').slice(0, 24)}`;
}

export class PaymentSimulator implements PaymentGateway {
  readonly provider = 'simulator';

  private readonly tokenOutcomes: Map<string, SimulatedOutcome>;
  private readonly random: () => number;

  constructor(private readonly options: PaymentSimulatorOptions = {}) {
    this.tokenOutcomes = new Map(Object.entries(options.tokenOutcomes ?? DEFAULT_TOKEN_OUTCOMES));
    this.random = createRandom(options.seed ?? 42);
  }

  async charge(request: ChargeRequest): Promise<PaymentOutcome> {
    return traceProviderCall(this.provider, 'charge', async () => {
      const latency = this.options.latencyMs ?? 0;
      if (latency > 0) {
        await new Promise((resolve) => setTimeout(resolve, latency));
      }

      const outcome = this.decide(request);
      log.info(
        { reference: request.reference, amount: request.amount, status: outcome.status },
        'Simulated charge'
      );
      return outcome;
    });
  }

  private decide(request: ChargeRequest): PaymentOutcome {
    if (!Number.isInteger(request.amount) || request.amount <= 0) {
      return { status: 'declined', reason: 'invalid_amount' };
    }

    const failureRate = this.options.failureRate ?? 0;
    if (failureRate > 0 && this.random() < failureRate) {
      return { status: 'error', reason: 'injected_failure' };
    }

    if (this.options.maxAmount !== undefined && request.amount > this.options.maxAmount) {
      return { status: 'declined', reason: 'amount_limit_exceeded' };
    }

    const status =
      this.tokenOutcomes.get(request.paymentDetails.token) ?? this.options.defaultOutcome ?? 'approved';

    switch (status) {
      case 'approved':
        return { status, transactionId: simulatedTransactionId(request.reference) };
      case 'declined':
        return { status, reason: 'card_declined' };
      case 'error':
        return { status, reason: 'processor_unavailable' };
    }
  }
}
