/**
 * Feature Vector Contract
 *
 * The key set, order and units below are consumed by the decision layer.
 * Changing any of them is a breaking change and must bump
 * FEATURE_SCHEMA_VERSION.
 *
 * Units: `_bps` keys are basis points of close, `_atr` keys are multiples
 * of ATR14, `ret_*` / `exposure_frac` are decimals, raw keys are prices or
 * quantities as they appear on the bar.
 */

export const FEATURE_SCHEMA_VERSION = 'v1';

export const FEATURE_GROUPS = {
  price: [
    'timestamp',
    'open',
    'high',
    'low',
    'close',
    'prev_close',
    'volume',
    'ret_1',
    'ret_4',
    'ret_16',
    'ret_96',
    'logret_1',
    'range_bps',
    'body_bps',
    'upper_wick_bps',
    'lower_wick_bps',
    'close_loc',
    'gap_bps',
  ],
  volatility: [
    'atr',
    'atr_bps',
    'atr_z_96',
    'range_z_96',
    'realized_vol_16',
    'realized_vol_96',
  ],
  trend: [
    'ema20',
    'ema50',
    'ema200',
    'ema20_slope_bps',
    'ema50_slope_bps',
    'ema20_50_spread_bps',
    'ema50_200_spread_bps',
    'close_ema200_bps',
    'adx14',
    'di_plus_14',
    'di_minus_14',
    'di_spread',
    'trend_strength',
    'trend_dir',
    'efficiency_ratio_16',
  ],
  momentum: [
    'rsi14',
    'rsi14_delta_4',
    'macd',
    'macd_signal',
    'macd_hist',
    'macd_hist_bps',
    'up_bar_frac_16',
  ],
  levels: [
    'donchian_high_32',
    'donchian_low_32',
    'donchian_mid_32',
    'donchian_width_bps',
    'donchian_pos',
    'breakout_dist_atr',
    'breakdown_dist_atr',
    'pullback_dist_ema20_atr',
    'pullback_dist_ema50_atr',
  ],
  bollinger: [
    'bb_mid',
    'bb_upper',
    'bb_lower',
    'bb_std',
    'bb_width_bps',
    'bb_pos',
    'bb_z',
    'bb_width_z_96',
  ],
  volume: ['turnover_usd', 'adv_usd', 'vol_sma_96', 'volume_ratio_96', 'vol_z_96'],
  microstructure: ['spread_bps', 'slippage_bps_est'],
  portfolio: ['open_positions', 'exposure_frac', 'dd_24h_bps', 'halt_flag'],
  derivatives: [
    'funding_rate',
    'funding_rate_24h_avg',
    'open_interest_usd',
    'open_interest_chg_24h_pct',
    'derivs_data_available',
  ],
  llm: ['llm_confidence'],
} as const;

export type FeatureGroup = keyof typeof FEATURE_GROUPS;

export const FEATURE_KEYS = [
  ...FEATURE_GROUPS.price,
  ...FEATURE_GROUPS.volatility,
  ...FEATURE_GROUPS.trend,
  ...FEATURE_GROUPS.momentum,
  ...FEATURE_GROUPS.levels,
  ...FEATURE_GROUPS.bollinger,
  ...FEATURE_GROUPS.volume,
  ...FEATURE_GROUPS.microstructure,
  ...FEATURE_GROUPS.portfolio,
  ...FEATURE_GROUPS.derivatives,
  ...FEATURE_GROUPS.llm,
] as const;

export type FeatureKey = (typeof FEATURE_KEYS)[number];

/**
 * One bar's features. Every key is always present and finite.
 */
export type FeatureVector = Readonly<Record<FeatureKey, number>>;

/**
 * Prices, levels and quantities copied from the bar or an indicator.
 * These are only checked for finiteness; every other key is a derived
 * value and is also clamped to ±FEATURE_CLAMP.
 */
export const RAW_FEATURE_KEYS: ReadonlySet<FeatureKey> = new Set<FeatureKey>([
  'timestamp',
  'open',
  'high',
  'low',
  'close',
  'prev_close',
  'volume',
  'atr',
  'ema20',
  'ema50',
  'ema200',
  'donchian_high_32',
  'donchian_low_32',
  'donchian_mid_32',
  'bb_mid',
  'bb_upper',
  'bb_lower',
  'turnover_usd',
  'adv_usd',
  'vol_sma_96',
  'open_interest_usd',
]);

export const FEATURE_CLAMP = 1e6;

const FEATURE_KEY_SET: ReadonlySet<string> = new Set<string>(FEATURE_KEYS);

export function isFeatureKey(key: string): key is FeatureKey {
  return FEATURE_KEY_SET.has(key);
}
