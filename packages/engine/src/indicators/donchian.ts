/**
 * Donchian Channels
 *
 * Highest high / lowest low over the prior N bars, excluding the current
 * bar: each update first pushes the previous bar's extremes, then reads.
 * On the very first bar there is no history and the bar's own range is used.
 */

import type { DonchianValue, Indicator } from '@candlelab/shared';
import { RollingWindow } from './rolling-window.js';

export class DonchianState implements Indicator<[high: number, low: number], DonchianValue> {
  private readonly highs: RollingWindow;
  private readonly lows: RollingWindow;

  private upper = 0;
  private lower = 0;

  private prevHigh: number | null = null;
  private prevLow: number | null = null;

  constructor(readonly period = 32) {
    this.highs = new RollingWindow(period);
    this.lows = new RollingWindow(period);
  }

  update(high: number, low: number): DonchianValue {
    if (this.prevHigh !== null && this.prevLow !== null) {
      this.highs.update(this.prevHigh);
      this.lows.update(this.prevLow);
    }

    if (this.highs.length > 0) {
      this.upper = this.highs.max();
      this.lower = this.lows.min();
    } else {
      this.upper = high;
      this.lower = low;
    }

    this.prevHigh = high;
    this.prevLow = low;

    return this.get();
  }

  get(): DonchianValue {
    return { upper: this.upper, lower: this.lower };
  }
}
