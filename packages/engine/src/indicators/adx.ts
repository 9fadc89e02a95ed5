/**
 * ADX (Average Directional Index) with +DI / -DI
 *
 * Wilder smoothing throughout. The first bar only seeds the smoothers
 * (TR = high − low, zero directional movement) and reports all zeros; this
 * boundary convention is kept so historical runs reproduce exactly.
 */

import type { AdxValue, Indicator } from '@candlelab/shared';
import { WilderEmaState } from './ema.js';
import { trueRange } from './atr.js';
import { EPSILON } from './guards.js';

interface PreviousBar {
  high: number;
  low: number;
  close: number;
}

export class AdxState implements Indicator<[high: number, low: number, close: number], AdxValue> {
  private readonly trSmooth: WilderEmaState;
  private readonly plusDmSmooth: WilderEmaState;
  private readonly minusDmSmooth: WilderEmaState;
  private readonly adxSmooth: WilderEmaState;

  private prev: PreviousBar | null = null;

  private adx = 0;
  private diPlus = 0;
  private diMinus = 0;

  constructor(readonly period = 14) {
    this.trSmooth = new WilderEmaState(period);
    this.plusDmSmooth = new WilderEmaState(period);
    this.minusDmSmooth = new WilderEmaState(period);
    this.adxSmooth = new WilderEmaState(period);
  }

  update(high: number, low: number, close: number): AdxValue {
    const prev = this.prev;
    this.prev = { high, low, close };

    if (prev === null) {
      this.trSmooth.update(high - low);
      this.plusDmSmooth.update(0);
      this.minusDmSmooth.update(0);
      return { adx: 0, diPlus: 0, diMinus: 0 };
    }

    const tr = trueRange(high, low, prev.close);

    // Only the larger positive move counts
    const upMove = high - prev.high;
    const downMove = prev.low - low;
    const plusDm = upMove > downMove && upMove > 0 ? upMove : 0;
    const minusDm = downMove > upMove && downMove > 0 ? downMove : 0;

    const trSmoothed = this.trSmooth.update(tr);
    const plusSmoothed = this.plusDmSmooth.update(plusDm);
    const minusSmoothed = this.minusDmSmooth.update(minusDm);

    if (trSmoothed > EPSILON) {
      this.diPlus = (100 * plusSmoothed) / trSmoothed;
      this.diMinus = (100 * minusSmoothed) / trSmoothed;
    } else {
      this.diPlus = 0;
      this.diMinus = 0;
    }

    const diSum = this.diPlus + this.diMinus;
    const dx = diSum > EPSILON ? (100 * Math.abs(this.diPlus - this.diMinus)) / diSum : 0;

    this.adx = this.adxSmooth.update(dx);

    return this.get();
  }

  get(): AdxValue {
    return { adx: this.adx, diPlus: this.diPlus, diMinus: this.diMinus };
  }
}
