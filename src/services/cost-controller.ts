import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';
import { BudgetExceededError } from '../errors.js';
import type { Logger } from '../logger.js';
import { systemClock, type Clock } from '../types/clock.js';

export const ALERT_THRESHOLDS = [50, 80, 100] as const;
export type AlertThreshold = (typeof ALERT_THRESHOLDS)[number];

export const CostLedgerSchema = z.object({
  /** UTC month, `YYYY-MM`. */
  period: z.string().regex(/^\d{4}-\d{2}$/),
  spentMicroUsd: z.number().int().nonnegative(),
  calls: z.number().int().nonnegative(),
  failedCalls: z.number().int().nonnegative(),
  alerted: z.array(z.union([z.literal(50), z.literal(80), z.literal(100)])),
  exhausted: z.boolean(),
});
export type CostLedger = z.infer<typeof CostLedgerSchema>;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CostAlert {
  threshold: AlertThreshold;
  period: string;
  spentUsd: number;
  ceilingUsd: number;
}

export type BudgetCheck =
  | { ok: true }
  | { ok: false; reason: 'exhausted' | 'insufficient'; period: string; remainingUsd: number };

export interface CostControllerOptions {
  monthlyUsd: number;
  inputCostPer1k: number;
  outputCostPer1k: number;
  logger: Logger;
  now?: Clock;
  onAlert?: (alert: CostAlert) => void;
  /** Called with a copy of the ledger after every change. */
  onChange?: (ledger: CostLedger) => void;
}

const MICRO = 1_000_000;

export function toMicroUsd(usd: number): number {
  return Math.round(usd * MICRO);
}

export function periodOf(date: Date): string {
  return formatInTimeZone(date, 'UTC', 'yyyy-MM');
}

function emptyLedger(period: string): CostLedger {
  return { period, spentMicroUsd: 0, calls: 0, failedCalls: 0, alerted: [], exhausted: false };
}

/**
 * Monthly LLM spend ledger with a hard ceiling. Amounts are kept in integer
 * micro-dollars; every read and write first rolls the ledger over when the
 * UTC month has changed.
 */
export class CostController {
  private readonly ceilingMicroUsd: number;
  private readonly logger: Logger;
  private readonly now: Clock;
  private state: CostLedger;

  constructor(private readonly options: CostControllerOptions) {
    this.ceilingMicroUsd = toMicroUsd(options.monthlyUsd);
    this.logger = options.logger.child({ component: 'cost-controller' });
    this.now = options.now ?? systemClock;
    this.state = emptyLedger(periodOf(this.now()));
  }

  /** Adopts a persisted ledger; one from an earlier month is discarded on the next access. */
  restore(ledger: CostLedger): void {
    this.state = { ...ledger, alerted: [...ledger.alerted] };
  }

  ledger(): CostLedger {
    this.roll();
    return this.copy();
  }

  costOf(usage: TokenUsage): number {
    return (
      (usage.inputTokens / 1000) * this.options.inputCostPer1k +
      (usage.outputTokens / 1000) * this.options.outputCostPer1k
    );
  }

  checkBudget(estimateUsd = 0): BudgetCheck {
    this.roll();
    const { period, spentMicroUsd, exhausted } = this.state;
    const remainingUsd = Math.max(0, this.ceilingMicroUsd - spentMicroUsd) / MICRO;

    if (exhausted || spentMicroUsd >= this.ceilingMicroUsd) {
      return { ok: false, reason: 'exhausted', period, remainingUsd };
    }
    if (spentMicroUsd + toMicroUsd(estimateUsd) > this.ceilingMicroUsd) {
      return { ok: false, reason: 'insufficient', period, remainingUsd };
    }
    return { ok: true };
  }

  assertBudget(estimateUsd = 0): void {
    const check = this.checkBudget(estimateUsd);
    if (!check.ok) {
      throw new BudgetExceededError(check.period);
    }
  }

  /**
   * Adds one finished call to the ledger and returns the alert thresholds it
   * crossed. A charge that would pass the ceiling is refused as a whole: the
   * ledger keeps its previous total and is marked exhausted.
   */
  record(amountUsd: number, outcome: 'success' | 'failure' = 'success'): AlertThreshold[] {
    this.roll();
    const amount = toMicroUsd(amountUsd);
    const spent = this.state.spentMicroUsd + amount;

    if (spent > this.ceilingMicroUsd) {
      this.state = { ...this.state, exhausted: true };
      this.changed();
      this.logger.warn(
        { period: this.state.period, spentUsd: this.state.spentMicroUsd / MICRO, refusedUsd: amount / MICRO },
        'LLM budget exhausted'
      );
      throw new BudgetExceededError(this.state.period);
    }

    const crossed = ALERT_THRESHOLDS.filter(
      (threshold) => !this.state.alerted.includes(threshold) && spent * 100 >= threshold * this.ceilingMicroUsd
    );
    this.state = {
      ...this.state,
      spentMicroUsd: spent,
      calls: this.state.calls + 1,
      failedCalls: this.state.failedCalls + (outcome === 'failure' ? 1 : 0),
      alerted: [...this.state.alerted, ...crossed],
      exhausted: spent >= this.ceilingMicroUsd,
    };
    this.changed();

    for (const threshold of crossed) {
      const alert: CostAlert = {
        threshold,
        period: this.state.period,
        spentUsd: spent / MICRO,
        ceilingUsd: this.ceilingMicroUsd / MICRO,
      };
      this.logger.warn({ ...alert }, `LLM budget threshold reached: ${threshold}%`);
      this.options.onAlert?.(alert);
    }
    return crossed;
  }

  private roll(): void {
    const period = periodOf(this.now());
    if (period !== this.state.period) {
      this.logger.info({ from: this.state.period, to: period }, 'Cost ledger rolled over');
      this.state = emptyLedger(period);
      this.changed();
    }
  }

  private changed(): void {
    this.options.onChange?.(this.copy());
  }

  private copy(): CostLedger {
    return { ...this.state, alerted: [...this.state.alerted] };
  }
}
