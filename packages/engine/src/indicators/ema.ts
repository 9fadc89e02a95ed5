/**
 * Exponential smoothers
 *
 * Both seed with the first input. EMA uses α = 2/(N+1) and
 * v = α·x + (1−α)·v; Wilder uses α = 1/N and v = v + α·(x − v),
 * which equals (prev·(N−1) + x)/N.
 */

import type { Indicator } from '@candlelab/shared';
import { requirePositiveInt } from './guards.js';

abstract class ExponentialSmoother implements Indicator<[value: number], number> {
  readonly alpha: number;
  private value: number | null = null;

  protected constructor(readonly period: number, alpha: (period: number) => number) {
    requirePositiveInt('Period', period);
    this.alpha = alpha(period);
  }

  protected abstract step(previous: number, value: number): number;

  update(value: number): number {
    this.value = this.value === null ? value : this.step(this.value, value);
    return this.value;
  }

  /**
   * Current value, 0 before the first update
   */
  get(): number {
    return this.value ?? 0;
  }

  isInitialized(): boolean {
    return this.value !== null;
  }
}

/**
 * Standard EMA, α = 2/(period + 1)
 */
export class EmaState extends ExponentialSmoother {
  constructor(period: number) {
    super(period, (n) => 2 / (n + 1));
  }

  protected step(previous: number, value: number): number {
    return this.alpha * value + (1 - this.alpha) * previous;
  }
}

/**
 * Wilder's smoothing (RSI, ATR, ADX), α = 1/period
 */
export class WilderEmaState extends ExponentialSmoother {
  constructor(period: number) {
    super(period, (n) => 1 / n);
  }

  protected step(previous: number, value: number): number {
    return previous + this.alpha * (value - previous);
  }
}
