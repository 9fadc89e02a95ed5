/**
 * RSI (Relative Strength Index) with Wilder smoothing
 *
 * The first bar seeds both smoothers with zero and reports a neutral 50.
 * When the average loss is ~0 the value is 100 if there was any gain, else 50.
 */

import type { Indicator } from '@candlelab/shared';
import { WilderEmaState } from './ema.js';
import { EPSILON } from './guards.js';

export const RSI_NEUTRAL = 50;

export class RsiState implements Indicator<[close: number], number> {
  private readonly gainSmooth: WilderEmaState;
  private readonly lossSmooth: WilderEmaState;
  private prevClose: number | null = null;
  private rsi = RSI_NEUTRAL;

  constructor(readonly period = 14) {
    this.gainSmooth = new WilderEmaState(period);
    this.lossSmooth = new WilderEmaState(period);
  }

  update(close: number): number {
    if (this.prevClose === null) {
      this.prevClose = close;
      this.gainSmooth.update(0);
      this.lossSmooth.update(0);
      return RSI_NEUTRAL;
    }

    const change = close - this.prevClose;
    this.prevClose = close;

    const avgGain = this.gainSmooth.update(Math.max(change, 0));
    const avgLoss = this.lossSmooth.update(Math.max(-change, 0));

    if (avgLoss < EPSILON) {
      this.rsi = avgGain > EPSILON ? 100 : RSI_NEUTRAL;
    } else {
      this.rsi = 100 - 100 / (1 + avgGain / avgLoss);
    }

    return this.rsi;
  }

  get(): number {
    return this.rsi;
  }
}
