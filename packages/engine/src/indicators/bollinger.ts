/**
 * Bollinger Bands
 *
 * mid = SMA(close), upper/lower = mid ± k·std over the same window.
 * Until the window is full the bands collapse onto the current close
 * (width 0, position 0.5). Position is not clamped, so closes outside the
 * bands read below 0 or above 1.
 */

import type { BollingerValue, Indicator } from '@candlelab/shared';
import { RollingWindow } from './rolling-window.js';
import { EPSILON } from './guards.js';

export class BollingerBandsState implements Indicator<[close: number], BollingerValue> {
  private readonly window: RollingWindow;

  private mid = 0;
  private upper = 0;
  private lower = 0;
  private std = 0;
  private width = 0;
  private position = 0.5;

  constructor(readonly period = 20, readonly numStd = 2.0) {
    if (!(numStd > 0)) {
      throw new Error(`Bollinger std multiplier must be positive, got ${numStd}`);
    }
    this.window = new RollingWindow(period);
  }

  update(close: number): BollingerValue {
    this.window.update(close);

    if (!this.window.isFull()) {
      this.mid = close;
      this.upper = close;
      this.lower = close;
      this.std = 0;
      this.width = 0;
      this.position = 0.5;
      return this.get();
    }

    this.mid = this.window.mean();
    this.std = this.window.std();
    this.upper = this.mid + this.numStd * this.std;
    this.lower = this.mid - this.numStd * this.std;

    this.width = Math.abs(close) > EPSILON ? (this.upper - this.lower) / close : 0;

    const bandRange = this.upper - this.lower;
    this.position = bandRange > EPSILON ? (close - this.lower) / bandRange : 0.5;

    return this.get();
  }

  get(): BollingerValue {
    return { upper: this.upper, mid: this.mid, lower: this.lower };
  }

  /** Band width as a fraction of close */
  getWidth(): number {
    return this.width;
  }

  /** Close position within the bands (0 = lower, 1 = upper) */
  getPosition(): number {
    return this.position;
  }

  /** Standard deviation of the window, 0 before it fills */
  getStd(): number {
    return this.std;
  }
}
