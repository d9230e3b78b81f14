/**
 * Reconnection delay policies. The gateway asks a strategy for each delay
 * instead of sleeping inline, so tests can substitute a fixed policy.
 */

import { InvalidArgument } from '../errors';

export interface BackoffStrategy {
  /** Delay before attempt number `attempt` (starting at 0). */
  delayFor(attempt: number): number;
}

export type RandomSource = () => number;

export interface ExponentialBackoffOptions {
  /** Delay in milliseconds before the first attempt */
  initialDelayMs?: number;
  /** Upper bound for any single delay */
  maxDelayMs?: number;
  /** Fraction of the delay that is randomized (0 = none, 1 = full jitter) */
  jitter?: number;
}

/**
 * Doubles the delay with every attempt up to a ceiling, then spreads it
 * randomly so that many clients do not reconnect in lockstep.
 */
export class ExponentialBackoff implements BackoffStrategy {
  private readonly options: Required<ExponentialBackoffOptions>;

  constructor(
    options?: ExponentialBackoffOptions,
    private readonly random: RandomSource = Math.random
  ) {
    this.options = {
      initialDelayMs: options?.initialDelayMs ?? 1000,
      maxDelayMs: options?.maxDelayMs ?? 30000,
      jitter: options?.jitter ?? 0.5
    };
  }

  delayFor(attempt: number): number {
    const base = Math.min(
      this.options.initialDelayMs * Math.pow(2, attempt),
      this.options.maxDelayMs
    );
    const spread = base * this.options.jitter;
    return Math.round(base - spread + this.random() * spread);
  }
}

/**
 * Uniformly distributed delay in [minDelayMs, maxDelayMs), regardless of
 * the attempt number.
 */
export class RandomBackoff implements BackoffStrategy {
  constructor(
    private readonly minDelayMs: number = 1000,
    private readonly maxDelayMs: number = 6000,
    private readonly random: RandomSource = Math.random
  ) {
    if (maxDelayMs < minDelayMs) {
      throw new InvalidArgument(`maxDelayMs (${maxDelayMs}) is less than minDelayMs (${minDelayMs})`);
    }
  }

  delayFor(attempt: number): number {
    return Math.floor(this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs));
  }
}

export class FixedBackoff implements BackoffStrategy {
  constructor(private readonly delayMs: number) { }

  delayFor(attempt: number): number {
    return this.delayMs;
  }
}
