/**
 * ATR (Average True Range)
 *
 * Wilder-smoothed True Range. The first bar has no previous close, so its
 * TR is simply high − low.
 */

import type { Indicator } from '@candlelab/shared';
import { WilderEmaState } from './ema.js';

/**
 * True Range against the previous close
 */
export function trueRange(high: number, low: number, prevClose: number | null): number {
  if (prevClose === null) {
    return high - low;
  }
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

export class AtrState implements Indicator<[high: number, low: number, close: number], number> {
  private readonly smoother: WilderEmaState;
  private prevClose: number | null = null;

  constructor(readonly period = 14) {
    this.smoother = new WilderEmaState(period);
  }

  update(high: number, low: number, close: number): number {
    const tr = trueRange(high, low, this.prevClose);
    this.prevClose = close;
    return this.smoother.update(tr);
  }

  get(): number {
    return this.smoother.get();
  }
}
