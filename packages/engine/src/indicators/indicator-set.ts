/**
 * Indicator Set
 *
 * All per-symbol indicator state in one place. The pipeline owns exactly
 * one set per symbol; resetting means building a fresh set. Periods are
 * fixed because they are baked into the feature key names.
 */

import type { Bar } from '@candlelab/shared';
import { EmaState } from './ema.js';
import { AtrState } from './atr.js';
import { AdxState } from './adx.js';
import { RsiState } from './rsi.js';
import { MacdState } from './macd.js';
import { BollingerBandsState } from './bollinger.js';
import { DonchianState } from './donchian.js';

export const INDICATOR_PERIODS = {
  emaFast: 20,
  emaMid: 50,
  emaSlow: 200,
  atr: 14,
  adx: 14,
  rsi: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  bollinger: 20,
  bollingerStd: 2.0,
  donchian: 32,
} as const;

export interface IndicatorSet {
  readonly ema20: EmaState;
  readonly ema50: EmaState;
  readonly ema200: EmaState;
  readonly atr: AtrState;
  readonly adx: AdxState;
  readonly rsi: RsiState;
  readonly macd: MacdState;
  readonly bb: BollingerBandsState;
  readonly donchian: DonchianState;
}

export function createIndicatorSet(): IndicatorSet {
  const p = INDICATOR_PERIODS;
  return {
    ema20: new EmaState(p.emaFast),
    ema50: new EmaState(p.emaMid),
    ema200: new EmaState(p.emaSlow),
    atr: new AtrState(p.atr),
    adx: new AdxState(p.adx),
    rsi: new RsiState(p.rsi),
    macd: new MacdState(p.macdFast, p.macdSlow, p.macdSignal),
    bb: new BollingerBandsState(p.bollinger, p.bollingerStd),
    donchian: new DonchianState(p.donchian),
  };
}

/**
 * Feed one bar into every indicator. Each indicator owns disjoint state,
 * so the order here does not matter.
 */
export function updateIndicatorSet(set: IndicatorSet, bar: Bar): void {
  set.ema20.update(bar.close);
  set.ema50.update(bar.close);
  set.ema200.update(bar.close);
  set.atr.update(bar.high, bar.low, bar.close);
  set.adx.update(bar.high, bar.low, bar.close);
  set.rsi.update(bar.close);
  set.macd.update(bar.close);
  set.bb.update(bar.close);
  set.donchian.update(bar.high, bar.low);
}
