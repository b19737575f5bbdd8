import { createChildLogger } from '@storefront/logger';

import type { CheckoutAttemptRepository } from '../repositories/types.js';
import { isAbandoned, type CheckoutCoordinator } from './checkout.service.js';
import type { InventoryLedger } from './inventory-ledger.service.js';

const log = createChildLogger({ component: 'recovery' });

export interface RecoveryReport {
  finalized: number;
  expired: number;
  released: number;
  failed: number;
}

export interface RecoveryOptions {
  intervalSeconds: number;
}

/**
 * Periodic sweep that finishes checkouts left behind by a crash: approved
 * payments are committed, abandoned attempts are rejected and expired holds
 * go back to stock.
 */
export class RecoveryService {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<RecoveryReport> | null = null;

  constructor(
    private readonly attempts: CheckoutAttemptRepository,
    private readonly coordinator: CheckoutCoordinator,
    private readonly inventory: InventoryLedger,
    private readonly options: RecoveryOptions
  ) {}

  /** Runs one sweep. Overlapping calls share the sweep already in progress. */
  async run(now: Date = new Date()): Promise<RecoveryReport> {
    if (!this.current) {
      this.current = this.sweep(now).finally(() => {
        this.current = null;
      });
    }
    return this.current;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.run().catch((error: unknown) => {
        log.error({ error }, 'Recovery sweep failed');
      });
    }, this.options.intervalSeconds * 1000);
    this.timer.unref();
    log.info({ intervalSeconds: this.options.intervalSeconds }, 'Recovery sweeper started');
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current;
    }
  }

  private async sweep(now: Date): Promise<RecoveryReport> {
    const report: RecoveryReport = { finalized: 0, expired: 0, released: 0, failed: 0 };

    for (const attempt of await this.attempts.findApprovedUncommitted()) {
      try {
        await this.coordinator.finalize(attempt);
        report.finalized += 1;
      } catch (error) {
        report.failed += 1;
        log.error({ error, checkoutId: attempt.checkoutId }, 'Failed to finalize approved checkout');
      }
    }

    for (const attempt of await this.attempts.findExpiredInFlight(now)) {
      if (!isAbandoned(attempt, now)) {
        continue;
      }
      try {
        if (await this.coordinator.expire(attempt)) {
          report.expired += 1;
        }
      } catch (error) {
        report.failed += 1;
        log.error({ error, checkoutId: attempt.checkoutId }, 'Failed to expire checkout');
      }
    }

    report.released = await this.inventory.releaseExpired({ now });

    if (report.finalized + report.expired + report.released + report.failed > 0) {
      log.info(report, 'Recovery sweep completed');
    }
    return report;
  }
}
