/**
 * Feature Pipeline
 *
 * Consumes one bar at a time, keeps every indicator and history it needs,
 * and emits the full feature vector once `warmupBars` bars have been seen.
 *
 * Usage:
 * 1. `const pipeline = new FeaturePipeline({ symbol: 'BTC-USD' })`
 * 2. `pipeline.onBar(bar, context)` on every closed bar
 * 3. `null` during warmup, a frozen FeatureVector afterwards
 */

import {
  DEFAULT_PORTFOLIO_CONTEXT,
  type Bar,
  type FeatureKey,
  type FeatureVector,
  type PortfolioContext,
} from '@candlelab/shared';
import {
  EPSILON,
  RollingWindow,
  createIndicatorSet,
  safeDiv,
  toBps,
  updateIndicatorSet,
  type IndicatorSet,
} from '../indicators/index.js';
import { finalizeFeatures } from './sanitize.js';

export interface FeaturePipelineOptions {
  symbol: string;
  /** Bars required before the first vector is emitted */
  warmupBars?: number;
  /** Assumed quoted spread, copied into `spread_bps` */
  spreadBps?: number;
}

// =============================================================================
// HISTORY SIZES
// =============================================================================

const CLOSE_HISTORY = 200;
const SHORT_WINDOW = 16;
const LONG_WINDOW = 96;
const SLOPE_LAG = 4;
const MAX_SLIPPAGE_BPS = 15;

function zScore(value: number, window: RollingWindow): number {
  return safeDiv(value - window.mean(), window.std());
}

function pctChange(current: number, past: number | null): number {
  if (past === null || past <= EPSILON) {
    return 0;
  }
  return current / past - 1;
}

interface PipelineHistory {
  closes: RollingWindow;
  ema20: RollingWindow;
  ema50: RollingWindow;
  rsi: RollingWindow;
  logReturns16: RollingWindow;
  logReturns96: RollingWindow;
  absDeltas16: RollingWindow;
  upBars16: RollingWindow;
  atrBps96: RollingWindow;
  rangeBps96: RollingWindow;
  bbWidthBps96: RollingWindow;
  volume96: RollingWindow;
  turnover96: RollingWindow;
}

function createHistory(): PipelineHistory {
  return {
    closes: new RollingWindow(CLOSE_HISTORY),
    ema20: new RollingWindow(SLOPE_LAG + 1),
    ema50: new RollingWindow(SLOPE_LAG + 1),
    rsi: new RollingWindow(SLOPE_LAG + 1),
    logReturns16: new RollingWindow(SHORT_WINDOW),
    logReturns96: new RollingWindow(LONG_WINDOW),
    absDeltas16: new RollingWindow(SHORT_WINDOW),
    upBars16: new RollingWindow(SHORT_WINDOW),
    atrBps96: new RollingWindow(LONG_WINDOW),
    rangeBps96: new RollingWindow(LONG_WINDOW),
    bbWidthBps96: new RollingWindow(LONG_WINDOW),
    volume96: new RollingWindow(LONG_WINDOW),
    turnover96: new RollingWindow(LONG_WINDOW),
  };
}

export class FeaturePipeline {
  private readonly symbol: string;
  private readonly warmupBars: number;
  private readonly spreadBps: number;

  private indicators: IndicatorSet;
  private history: PipelineHistory;
  private barCount = 0;

  constructor(options: FeaturePipelineOptions) {
    this.symbol = options.symbol;
    this.warmupBars = options.warmupBars ?? 400;
    this.spreadBps = options.spreadBps ?? 1.5;

    if (!Number.isInteger(this.warmupBars) || this.warmupBars < 1) {
      throw new Error(`warmupBars must be an integer >= 1, got ${this.warmupBars}`);
    }
    if (!Number.isFinite(this.spreadBps) || this.spreadBps < 0) {
      throw new Error(`spreadBps must be >= 0, got ${this.spreadBps}`);
    }

    this.indicators = createIndicatorSet();
    this.history = createHistory();
  }

  /**
   * Process one closed bar. Returns null until warmup is satisfied.
   */
  onBar(bar: Bar, context: Partial<PortfolioContext> = {}): FeatureVector | null {
    this.barCount += 1;

    const prevClose = this.history.closes.at(0);
    updateIndicatorSet(this.indicators, bar);
    this.updateHistory(bar, prevClose);

    if (this.barCount < this.warmupBars) {
      return null;
    }

    return this.buildVector(bar, prevClose, { ...DEFAULT_PORTFOLIO_CONTEXT, ...context });
  }

  /**
   * Drop all state. Replaying the same bars reproduces the same vectors.
   */
  reset(): void {
    this.indicators = createIndicatorSet();
    this.history = createHistory();
    this.barCount = 0;
  }

  isWarmedUp(): boolean {
    return this.barCount >= this.warmupBars;
  }

  getBarCount(): number {
    return this.barCount;
  }

  getSymbol(): string {
    return this.symbol;
  }

  // ===========================================================================
  // STATE UPDATE
  // ===========================================================================

  private updateHistory(bar: Bar, prevClose: number | null): void {
    const h = this.history;
    const { close } = bar;

    h.closes.update(close);
    h.ema20.update(this.indicators.ema20.get());
    h.ema50.update(this.indicators.ema50.get());
    h.rsi.update(this.indicators.rsi.get());

    if (prevClose !== null) {
      if (prevClose > EPSILON && close > EPSILON) {
        const logReturn = Math.log(close / prevClose);
        h.logReturns16.update(logReturn);
        h.logReturns96.update(logReturn);
      }
      h.absDeltas16.update(Math.abs(close - prevClose));
      h.upBars16.update(close > prevClose ? 1 : 0);
    }

    h.atrBps96.update(toBps(safeDiv(this.indicators.atr.get(), close)));
    h.rangeBps96.update(toBps(safeDiv(bar.high - bar.low, close)));
    h.bbWidthBps96.update(toBps(this.indicators.bb.getWidth()));
    h.volume96.update(bar.volume);
    h.turnover96.update(close * bar.volume);
  }

  // ===========================================================================
  // VECTOR ASSEMBLY
  // ===========================================================================

  private buildVector(bar: Bar, prevClose: number | null, ctx: PortfolioContext): FeatureVector {
    const ind = this.indicators;
    const h = this.history;
    const { open, high, low, close, volume } = bar;

    const prev = prevClose ?? close;
    const bps = (numerator: number): number => toBps(safeDiv(numerator, close));

    // Volatility
    const atr = ind.atr.get();
    const atrBps = bps(atr);
    const rangeBps = bps(high - low);
    const perAtr = (numerator: number): number => (atr > EPSILON ? numerator / atr : 0);

    // Trend
    const ema20 = ind.ema20.get();
    const ema50 = ind.ema50.get();
    const ema200 = ind.ema200.get();
    const adx = ind.adx.get();
    const slopeBps = (series: RollingWindow): number => {
      const past = series.at(SLOPE_LAG);
      const latest = series.at(0);
      return past === null || latest === null ? 0 : bps(latest - past);
    };
    const trendDir = ema50 > ema200 ? 1 : ema50 < ema200 ? -1 : 0;

    const close16 = h.closes.at(SHORT_WINDOW);
    const pathLength = h.absDeltas16.sum();
    const efficiency =
      h.absDeltas16.isFull() && close16 !== null && pathLength > EPSILON
        ? Math.abs(close - close16) / pathLength
        : 0;

    // Momentum
    const rsi = ind.rsi.get();
    const rsiPast = h.rsi.at(SLOPE_LAG);
    const macd = ind.macd.get();

    // Levels
    const donchian = ind.donchian.get();
    const donchianWidth = donchian.upper - donchian.lower;

    // Bollinger
    const bb = ind.bb.get();
    const bbStd = ind.bb.getStd();
    const bbWidthBps = toBps(ind.bb.getWidth());

    // Volume
    const turnover = close * volume;
    const volumeFull = h.volume96.isFull();
    const volSma = volumeFull ? h.volume96.mean() : volume;
    const advUsd = h.turnover96.isFull() ? h.turnover96.mean() : turnover;

    const values: Record<FeatureKey, number> = {
      // price
      timestamp: bar.timestamp,
      open,
      high,
      low,
      close,
      prev_close: prev,
      volume,
      ret_1: pctChange(close, h.closes.at(1)),
      ret_4: pctChange(close, h.closes.at(4)),
      ret_16: pctChange(close, h.closes.at(16)),
      ret_96: pctChange(close, h.closes.at(96)),
      logret_1: prevClose !== null && prevClose > EPSILON && close > EPSILON ? Math.log(close / prevClose) : 0,
      range_bps: rangeBps,
      body_bps: bps(close - open),
      upper_wick_bps: bps(high - Math.max(open, close)),
      lower_wick_bps: bps(Math.min(open, close) - low),
      close_loc: safeDiv(close - low, high - low, 0.5),
      gap_bps: prevClose !== null ? toBps(safeDiv(open - prevClose, prevClose)) : 0,

      // volatility
      atr,
      atr_bps: atrBps,
      atr_z_96: zScore(atrBps, h.atrBps96),
      range_z_96: zScore(rangeBps, h.rangeBps96),
      realized_vol_16: h.logReturns16.isFull() ? h.logReturns16.std() : 0,
      realized_vol_96: h.logReturns96.isFull() ? h.logReturns96.std() : 0,

      // trend
      ema20,
      ema50,
      ema200,
      ema20_slope_bps: slopeBps(h.ema20),
      ema50_slope_bps: slopeBps(h.ema50),
      ema20_50_spread_bps: bps(ema20 - ema50),
      ema50_200_spread_bps: bps(ema50 - ema200),
      close_ema200_bps: bps(close - ema200),
      adx14: adx.adx,
      di_plus_14: adx.diPlus,
      di_minus_14: adx.diMinus,
      di_spread: adx.diPlus - adx.diMinus,
      trend_strength: adx.adx,
      trend_dir: trendDir,
      efficiency_ratio_16: efficiency,

      // momentum
      rsi14: rsi,
      rsi14_delta_4: rsiPast === null ? 0 : rsi - rsiPast,
      macd: macd.macd,
      macd_signal: macd.signal,
      macd_hist: macd.histogram,
      macd_hist_bps: bps(macd.histogram),
      up_bar_frac_16: h.upBars16.length > 0 ? h.upBars16.mean() : 0.5,

      // levels
      donchian_high_32: donchian.upper,
      donchian_low_32: donchian.lower,
      donchian_mid_32: (donchian.upper + donchian.lower) / 2,
      donchian_width_bps: bps(donchianWidth),
      donchian_pos: safeDiv(close - donchian.lower, donchianWidth, 0.5),
      breakout_dist_atr: perAtr(close - donchian.upper),
      breakdown_dist_atr: perAtr(donchian.lower - close),
      pullback_dist_ema20_atr: perAtr(close - ema20),
      pullback_dist_ema50_atr: perAtr(close - ema50),

      // bollinger
      bb_mid: bb.mid,
      bb_upper: bb.upper,
      bb_lower: bb.lower,
      bb_std: bbStd,
      bb_width_bps: bbWidthBps,
      bb_pos: ind.bb.getPosition(),
      bb_z: safeDiv(close - bb.mid, bbStd),
      bb_width_z_96: zScore(bbWidthBps, h.bbWidthBps96),

      // volume
      turnover_usd: turnover,
      adv_usd: advUsd,
      vol_sma_96: volSma,
      volume_ratio_96: volumeFull && volSma > EPSILON ? volume / volSma : 1,
      vol_z_96: volumeFull ? zScore(volume, h.volume96) : 0,

      // microstructure
      spread_bps: this.spreadBps,
      slippage_bps_est: Math.min(0.5 * this.spreadBps + 0.02 * atrBps, MAX_SLIPPAGE_BPS),

      // portfolio
      open_positions: ctx.openPositions,
      exposure_frac: ctx.exposureFrac,
      dd_24h_bps: ctx.dd24hBps,
      halt_flag: ctx.haltFlag,

      // derivatives (no feed wired)
      funding_rate: 0,
      funding_rate_24h_avg: 0,
      open_interest_usd: 0,
      open_interest_chg_24h_pct: 0,
      derivs_data_available: 0,

      // llm
      llm_confidence: 0,
    };

    return finalizeFeatures(values);
  }
}
