import type { Config } from '@storefront/config';
import type { ChargeRequest, PaymentOutcome } from '@storefront/types';

import { PaymentSimulator } from './payment-simulator.js';

/**
 * Capability to take a payment. Implementations report declines and provider
 * failures as outcomes; a thrown error is treated as a provider failure by
 * the caller. Implementations never retry.
 */
export interface PaymentGateway {
  readonly provider: string;
  charge(request: ChargeRequest): Promise<PaymentOutcome>;
}

export function createPaymentGateway(config: Config): PaymentGateway {
  switch (config.PAYMENT_PROVIDER) {
    case 'simulator':
      return new PaymentSimulator({
        defaultOutcome: config.PAYMENT_SIMULATOR_DEFAULT_OUTCOME,
        failureRate: config.PAYMENT_SIMULATOR_FAILURE_RATE,
        seed: config.PAYMENT_SIMULATOR_SEED,
        latencyMs: config.PAYMENT_SIMULATOR_LATENCY_MS,
        maxAmount: config.PAYMENT_SIMULATOR_MAX_AMOUNT,
      });
  }
}
