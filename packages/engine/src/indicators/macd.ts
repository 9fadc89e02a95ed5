/**
 * MACD (Moving Average Convergence Divergence)
 *
 * macd = EMA(fast) − EMA(slow), signal = EMA(signal) of macd,
 * histogram = macd − signal.
 */

import type { Indicator, MacdValue } from '@candlelab/shared';
import { EmaState } from './ema.js';

export class MacdState implements Indicator<[close: number], MacdValue> {
  private readonly emaFast: EmaState;
  private readonly emaSlow: EmaState;
  private readonly emaSignal: EmaState;

  private macd = 0;
  private signal = 0;
  private histogram = 0;

  constructor(fastPeriod = 12, slowPeriod = 26, signalPeriod = 9) {
    if (fastPeriod >= slowPeriod) {
      throw new Error(`MACD fast period (${fastPeriod}) must be shorter than slow period (${slowPeriod})`);
    }
    this.emaFast = new EmaState(fastPeriod);
    this.emaSlow = new EmaState(slowPeriod);
    this.emaSignal = new EmaState(signalPeriod);
  }

  update(close: number): MacdValue {
    this.macd = this.emaFast.update(close) - this.emaSlow.update(close);
    this.signal = this.emaSignal.update(this.macd);
    this.histogram = this.macd - this.signal;
    return this.get();
  }

  get(): MacdValue {
    return { macd: this.macd, signal: this.signal, histogram: this.histogram };
  }
}
