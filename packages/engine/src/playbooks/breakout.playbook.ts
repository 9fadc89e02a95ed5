/**
 * Breakout Playbook
 *
 * Trend continuation when price clears the prior Donchian high with
 * trend, volume and liquidity confirmation.
 *
 * Entry (all required):
 * 1. close >= donchian_high_32 + breakBufferAtr x ATR
 * 2. adx14 >= minTrendStrength
 * 3. close > ema200
 * 4. volume_ratio_96 >= minVolumeRatio OR vol_z_96 >= minVolumeZ
 * 5. adv_usd >= minAdvUsd
 */

import type { FeatureVector } from '@candlelab/shared';
import { BasePlaybook, type AtrExitParams, type Candidate } from './base-playbook.js';

export interface BreakoutParams extends AtrExitParams {
  breakBufferAtr: number;
  minTrendStrength: number;
  minVolumeRatio: number;
  minVolumeZ: number;
  minAdvUsd: number;
}

export const DEFAULT_BREAKOUT_PARAMS: BreakoutParams = {
  // === Entry ===
  breakBufferAtr: 0.1,
  minTrendStrength: 18,
  minVolumeRatio: 1.2,
  minVolumeZ: 0.5,
  minAdvUsd: 5_000_000,

  // === Exit ===
  stopLossAtr: 1.2,
  takeProfitAtr: 2.4,
  timeStopBars: 32,
  trailingActivationR: 1.0,
  trailingDistanceAtr: 1.2,
};

export class BreakoutPlaybook extends BasePlaybook<BreakoutParams> {
  readonly name = 'breakout' as const;

  constructor(params: Partial<BreakoutParams> = {}) {
    super(DEFAULT_BREAKOUT_PARAMS, params);
  }

  evaluate(features: FeatureVector): Candidate | null {
    const { close, atr } = features;
    if (close <= 0 || atr <= 0) {
      return null;
    }

    const p = this.params;
    const breakThreshold = features.donchian_high_32 + p.breakBufferAtr * atr;

    if (close < breakThreshold) return null;
    if (features.adx14 < p.minTrendStrength) return null;
    if (close <= features.ema200) return null;

    const volumeConfirmed = features.volume_ratio_96 >= p.minVolumeRatio || features.vol_z_96 >= p.minVolumeZ;
    if (!volumeConfirmed) return null;
    if (features.adv_usd < p.minAdvUsd) return null;

    const qualityFlags = {
      compression: features.bb_width_z_96 < -0.5,
      volExpansion: features.atr_z_96 > 0.3,
      volumeConfirm: features.vol_z_96 > 0.5,
    };

    const bufferPct = ((close - breakThreshold) / breakThreshold) * 100;
    const notes =
      `Breakout: ${bufferPct.toFixed(2)}% above threshold, ADX=${features.adx14.toFixed(1)}, ` +
      `vol_ratio=${features.volume_ratio_96.toFixed(2)}, vol_z=${features.vol_z_96.toFixed(2)}`;

    return this.createCandidate(features, qualityFlags, notes);
  }
}
