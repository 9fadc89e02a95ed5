/**
 * Streaming Technical Indicators
 *
 * O(1)-per-bar incremental indicators for online bar processing.
 */

export { EPSILON, safeDiv, toBps, requirePositiveInt } from './guards.js';
export { RollingWindow } from './rolling-window.js';
export { EmaState, WilderEmaState } from './ema.js';
export { AtrState, trueRange } from './atr.js';
export { AdxState } from './adx.js';
export { RsiState, RSI_NEUTRAL } from './rsi.js';
export { MacdState } from './macd.js';
export { BollingerBandsState } from './bollinger.js';
export { DonchianState } from './donchian.js';
export {
  createIndicatorSet,
  updateIndicatorSet,
  INDICATOR_PERIODS,
  type IndicatorSet,
} from './indicator-set.js';
