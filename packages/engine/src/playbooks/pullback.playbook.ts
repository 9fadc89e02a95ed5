/**
 * Pullback Playbook
 *
 * Buy a dip to EMA20 inside an established uptrend.
 *
 * Entry (all required):
 * 1. ema50 > ema200
 * 2. adx14 >= minTrendStrength
 * 3. low <= ema20 <= close (tagged and reclaimed)
 * 4. close >= open OR close > prev_close
 * 5. rsi14 <= maxRsi
 * 6. optionally pullback_dist_ema50_atr <= maxDistanceToEma50Atr
 */

import type { FeatureVector } from '@candlelab/shared';
import { BasePlaybook, type AtrExitParams, type Candidate } from './base-playbook.js';

export interface PullbackParams extends AtrExitParams {
  minTrendStrength: number;
  maxRsi: number;
  checkEma50Distance: boolean;
  maxDistanceToEma50Atr: number;
}

export const DEFAULT_PULLBACK_PARAMS: PullbackParams = {
  // === Entry ===
  minTrendStrength: 16,
  maxRsi: 55,
  checkEma50Distance: true,
  maxDistanceToEma50Atr: 1.0,

  // === Exit ===
  stopLossAtr: 1.0,
  takeProfitAtr: 1.8,
  timeStopBars: 48,
  trailingActivationR: 0.8,
  trailingDistanceAtr: 1.0,
};

export class PullbackPlaybook extends BasePlaybook<PullbackParams> {
  readonly name = 'pullback' as const;

  constructor(params: Partial<PullbackParams> = {}) {
    super(DEFAULT_PULLBACK_PARAMS, params);
  }

  evaluate(features: FeatureVector): Candidate | null {
    const { close, open, low, atr, ema20 } = features;
    if (close <= 0 || atr <= 0) {
      return null;
    }

    const p = this.params;

    if (features.ema50 <= features.ema200) return null;
    if (features.adx14 < p.minTrendStrength) return null;
    if (!(low <= ema20 && close >= ema20)) return null;
    if (!(close >= open || close > features.prev_close)) return null;
    if (features.rsi14 > p.maxRsi) return null;
    if (p.checkEma50Distance && features.pullback_dist_ema50_atr > p.maxDistanceToEma50Atr) return null;

    const qualityFlags = {
      emaAlignment: features.ema20_slope_bps > 0 && features.ema50_slope_bps > 0,
      shallowPullback: features.pullback_dist_ema50_atr <= 0.5,
      bullishClose: close >= open,
    };

    const notes =
      `Pullback: close=${close.toFixed(2)} ema20=${ema20.toFixed(2)}, ADX=${features.adx14.toFixed(1)}, ` +
      `RSI=${features.rsi14.toFixed(1)}, dist_ema50=${features.pullback_dist_ema50_atr.toFixed(2)}atr`;

    return this.createCandidate(features, qualityFlags, notes);
  }
}
