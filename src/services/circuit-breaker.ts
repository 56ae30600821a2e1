import { z } from 'zod';
import { CircuitOpenError } from '../errors.js';
import type { Logger } from '../logger.js';
import { systemClock, type Clock } from '../types/clock.js';

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  /** Normal operation - requests go through */
  CLOSED = 'CLOSED',
  /** Failing - requests are rejected immediately */
  OPEN = 'OPEN',
  /** Testing - one trial request is allowed through */
  HALF_OPEN = 'HALF_OPEN',
}

export const CircuitSnapshotSchema = z.object({
  state: z.nativeEnum(CircuitState),
  consecutiveFailures: z.number().int().nonnegative(),
  openUntil: z.coerce.date().nullable(),
});
export type CircuitSnapshot = z.infer<typeof CircuitSnapshotSchema>;

/**
 * How a finished operation affects the breaker. `ignored` outcomes (errors
 * that say nothing about upstream health) leave the streak untouched.
 */
export type CallOutcome = 'success' | 'failure' | 'ignored';

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening the circuit */
  maxFailures: number;
  /** Time in ms the circuit stays open before allowing a trial */
  resetTimeout: number;
  name: string;
  /** Maps a thrown error to its effect on the breaker; defaults to `failure` */
  classify?: (error: unknown) => CallOutcome;
  now?: Clock;
  logger?: Logger;
  /** Called with a snapshot after every state change */
  onChange?: (snapshot: CircuitSnapshot) => void;
}

/**
 * Circuit breaker for protecting external calls.
 *
 * State transitions:
 * CLOSED -> OPEN: after maxFailures consecutive failures
 * OPEN -> HALF_OPEN: once resetTimeout has elapsed
 * HALF_OPEN -> CLOSED: if the single trial request succeeds
 * HALF_OPEN -> OPEN: if the trial fails, with a fresh timeout
 *
 * While a half-open trial is in flight every other call is rejected.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private openUntil: Date | null = null;
  private trialInFlight = false;
  private readonly name: string;
  private readonly now: Clock;

  constructor(private readonly config: CircuitBreakerConfig) {
    this.name = config.name;
    this.now = config.now ?? systemClock;
  }

  /**
   * Get current circuit state.
   */
  getState(): CircuitState {
    if (this.state === CircuitState.OPEN && this.openUntil && this.now().getTime() >= this.openUntil.getTime()) {
      this.state = CircuitState.HALF_OPEN;
      this.log('info', 'Transitioning to HALF_OPEN');
      this.changed();
    }
    return this.state;
  }

  /**
   * Execute an operation through the circuit breaker.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const currentState = this.getState();

    if (currentState === CircuitState.OPEN || (currentState === CircuitState.HALF_OPEN && this.trialInFlight)) {
      this.log('warn', 'Request rejected - circuit is open');
      throw new CircuitOpenError(this.name, this.openUntil);
    }

    const isTrial = currentState === CircuitState.HALF_OPEN;
    if (isTrial) {
      this.trialInFlight = true;
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      const outcome = this.config.classify ? this.config.classify(error) : 'failure';
      if (outcome === 'failure') {
        this.onFailure();
      } else if (outcome === 'success') {
        this.onSuccess();
      }
      throw error;
    } finally {
      if (isTrial) {
        this.trialInFlight = false;
      }
    }
  }

  snapshot(): CircuitSnapshot {
    return { state: this.state, consecutiveFailures: this.failures, openUntil: this.openUntil };
  }

  /** Restores persisted state; a trial that was in flight at shutdown is forgotten. */
  restore(snapshot: CircuitSnapshot): void {
    this.state = snapshot.state;
    this.failures = snapshot.consecutiveFailures;
    this.openUntil = snapshot.openUntil;
    this.trialInFlight = false;
  }

  private onSuccess(): void {
    if (this.state === CircuitState.CLOSED && this.failures === 0) {
      return;
    }
    if (this.state === CircuitState.HALF_OPEN) {
      this.log('info', 'Test request succeeded, closing circuit');
    }
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.openUntil = null;
    this.changed();
  }

  private onFailure(): void {
    this.failures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      this.log('warn', 'Test request failed, reopening circuit');
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.config.maxFailures) {
      this.open();
      this.log('warn', `Opening circuit after ${String(this.failures)} failures`);
    }
    this.changed();
  }

  private open(): void {
    this.state = CircuitState.OPEN;
    this.openUntil = new Date(this.now().getTime() + this.config.resetTimeout);
  }

  private changed(): void {
    this.config.onChange?.(this.snapshot());
  }

  private log(level: 'info' | 'warn', message: string): void {
    if (this.config.logger) {
      this.config.logger[level]({ circuit: this.name, state: this.state }, message);
    }
  }
}
