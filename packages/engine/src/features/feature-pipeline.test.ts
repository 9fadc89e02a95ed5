/**
 * Feature Pipeline Tests
 *
 * Verifies:
 * 1. Warmup boundary
 * 2. Key set, order and finiteness
 * 3. Reset reproduces identical vectors
 * 4. Individual feature definitions on hand-built bars
 */

import { describe, it, expect } from 'vitest';
import { FEATURE_KEYS, type Bar, type FeatureVector } from '@candlelab/shared';
import { FeaturePipeline } from './feature-pipeline.js';
import { sanitizeFeatureValue } from './sanitize.js';

// =============================================================================
// HELPERS
// =============================================================================

const T0 = 1_700_000_000;

function createBar(index: number, open: number, high: number, low: number, close: number, volume = 10): Bar {
  return { timestamp: T0 + index * 900, open, high, low, close, volume };
}

/**
 * Deterministic zig-zag trend so every indicator moves
 */
function generateBars(count: number, start = 30000): Bar[] {
  const bars: Bar[] = [];
  let close = start;
  for (let i = 0; i < count; i++) {
    const open = close;
    const drift = Math.sin(i / 7) * 40 + (i % 5) * 3 - 5;
    close = Math.max(100, open + drift);
    const high = Math.max(open, close) + 15 + (i % 3) * 5;
    const low = Math.min(open, close) - 12 - (i % 4) * 4;
    bars.push(createBar(i, open, high, low, close, 5 + (i % 11)));
  }
  return bars;
}

function feed(pipeline: FeaturePipeline, bars: Bar[]) {
  return bars.map((bar) => pipeline.onBar(bar));
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

describe('FeaturePipeline - construction', () => {
  it('should expose the symbol and start cold', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD' });
    expect(pipeline.getSymbol()).toBe('BTC-USD');
    expect(pipeline.getBarCount()).toBe(0);
    expect(pipeline.isWarmedUp()).toBe(false);
  });

  it('should reject warmupBars < 1', () => {
    expect(() => new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 0 })).toThrow('warmupBars');
  });

  it('should reject a negative spread', () => {
    expect(() => new FeaturePipeline({ symbol: 'BTC-USD', spreadBps: -1 })).toThrow('spreadBps');
  });
});

// =============================================================================
// WARMUP
// =============================================================================

describe('FeaturePipeline - warmup', () => {
  it('should return null for bars 1..w-1 and a full vector at bar w', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 5 });
    const results = feed(pipeline, generateBars(5));

    expect(results.slice(0, 4)).toEqual([null, null, null, null]);
    const vector = results[4];
    expect(vector).not.toBeNull();
    expect(Object.keys(vector ?? {})).toHaveLength(80);
    expect(pipeline.isWarmedUp()).toBe(true);
    expect(pipeline.getBarCount()).toBe(5);
  });

  it('should use the default warmup of 400 bars', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD' });
    const results = feed(pipeline, generateBars(400));

    expect(results[398]).toBeNull();
    expect(results[399]).not.toBeNull();
  });
});

// =============================================================================
// CONTRACT
// =============================================================================

describe('FeaturePipeline - vector contract', () => {
  const pipeline = new FeaturePipeline({ symbol: 'ETH-USD', warmupBars: 400 });
  const vectors = feed(pipeline, generateBars(500)).filter((v): v is FeatureVector => v !== null);

  it('should emit one vector per bar after warmup', () => {
    expect(vectors).toHaveLength(101);
  });

  it('should keep the canonical key order', () => {
    expect(Object.keys(vectors[0] ?? {})).toEqual([...FEATURE_KEYS]);
  });

  it('should only contain finite numbers', () => {
    for (const vector of vectors) {
      for (const key of FEATURE_KEYS) {
        expect(Number.isFinite(vector[key])).toBe(true);
      }
    }
  });

  it('should freeze vectors', () => {
    expect(Object.isFrozen(vectors[0])).toBe(true);
  });

  it('should keep RSI and ADX within [0, 100]', () => {
    for (const vector of vectors) {
      expect(vector.rsi14).toBeGreaterThanOrEqual(0);
      expect(vector.rsi14).toBeLessThanOrEqual(100);
      expect(vector.adx14).toBeGreaterThanOrEqual(0);
      expect(vector.adx14).toBeLessThanOrEqual(100);
    }
  });

  it('should have full-window statistics after 400 bars', () => {
    const last = vectors[vectors.length - 1];
    expect(last?.realized_vol_16).toBeGreaterThan(0);
    expect(last?.realized_vol_96).toBeGreaterThan(0);
    expect(last?.bb_std).toBeGreaterThan(0);
    expect(last?.donchian_high_32).toBeGreaterThan(last?.donchian_low_32 ?? Infinity);
  });
});

describe('FeaturePipeline - reset', () => {
  it('should reproduce identical vectors after reset', () => {
    const bars = generateBars(450);
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD' });

    const first = feed(pipeline, bars);
    pipeline.reset();
    expect(pipeline.getBarCount()).toBe(0);
    expect(pipeline.isWarmedUp()).toBe(false);
    const second = feed(pipeline, bars);

    expect(second).toEqual(first);
  });
});

// =============================================================================
// FEATURE DEFINITIONS
// =============================================================================

describe('FeaturePipeline - first bar values', () => {
  const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1 });
  const vector = pipeline.onBar(createBar(0, 100, 102, 98, 101, 10));

  it('should fall back to the current bar where there is no history', () => {
    expect(vector?.timestamp).toBe(T0);
    expect(vector?.prev_close).toBe(101);
    expect(vector?.ret_1).toBe(0);
    expect(vector?.logret_1).toBe(0);
    expect(vector?.gap_bps).toBe(0);
    expect(vector?.up_bar_frac_16).toBe(0.5);
    expect(vector?.rsi14).toBe(50);
    expect(vector?.rsi14_delta_4).toBe(0);
    expect(vector?.efficiency_ratio_16).toBe(0);
    expect(vector?.trend_dir).toBe(0);
  });

  it('should compute bar-shape features', () => {
    expect(vector?.range_bps).toBeCloseTo((4 / 101) * 10000, 9);
    expect(vector?.body_bps).toBeCloseTo((1 / 101) * 10000, 9);
    expect(vector?.upper_wick_bps).toBeCloseTo((1 / 101) * 10000, 9);
    expect(vector?.lower_wick_bps).toBeCloseTo((2 / 101) * 10000, 9);
    expect(vector?.close_loc).toBe(0.75);
  });

  it('should compute volatility and level features', () => {
    expect(vector?.atr).toBe(4);
    expect(vector?.atr_z_96).toBe(0);
    expect(vector?.donchian_high_32).toBe(102);
    expect(vector?.donchian_low_32).toBe(98);
    expect(vector?.donchian_mid_32).toBe(100);
    expect(vector?.donchian_pos).toBe(0.75);
    expect(vector?.breakout_dist_atr).toBe(-0.25);
    expect(vector?.breakdown_dist_atr).toBe(-0.75);
  });

  it('should collapse bollinger and volume features before their windows fill', () => {
    expect(vector?.bb_mid).toBe(101);
    expect(vector?.bb_pos).toBe(0.5);
    expect(vector?.bb_z).toBe(0);
    expect(vector?.turnover_usd).toBe(1010);
    expect(vector?.adv_usd).toBe(1010);
    expect(vector?.vol_sma_96).toBe(10);
    expect(vector?.volume_ratio_96).toBe(1);
    expect(vector?.vol_z_96).toBe(0);
  });

  it('should zero the placeholder groups', () => {
    expect(vector?.funding_rate).toBe(0);
    expect(vector?.open_interest_usd).toBe(0);
    expect(vector?.derivs_data_available).toBe(0);
    expect(vector?.llm_confidence).toBe(0);
  });
});

describe('FeaturePipeline - returns', () => {
  it('should compute k-bar returns once history exists', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1 });
    const closes = [100, 101, 102, 103, 104];
    const vectors = closes.map((c, i) => pipeline.onBar(createBar(i, c, c + 1, c - 1, c)));
    const last = vectors[4];

    expect(last?.ret_1).toBeCloseTo(104 / 103 - 1, 12);
    expect(last?.ret_4).toBeCloseTo(0.04, 12);
    expect(last?.ret_16).toBe(0);
    expect(last?.logret_1).toBeCloseTo(Math.log(104 / 103), 12);
    expect(last?.up_bar_frac_16).toBe(1);
    expect(last?.prev_close).toBe(103);
  });

  it('should compute the open gap against the previous close', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1 });
    pipeline.onBar(createBar(0, 100, 101, 99, 100));
    const vector = pipeline.onBar(createBar(1, 101, 102, 100, 101));

    expect(vector?.gap_bps).toBeCloseTo(100, 9);
  });
});

describe('FeaturePipeline - donchian exclusion', () => {
  it('should place a breakout bar above the prior channel', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1 });
    for (let i = 0; i < 40; i++) {
      pipeline.onBar(createBar(i, 100, 101, 99, 100));
    }
    const vector = pipeline.onBar(createBar(40, 100, 110, 99, 109));

    expect(vector?.donchian_high_32).toBe(101);
    expect(vector?.donchian_low_32).toBe(99);
    expect(vector?.close).toBeGreaterThan(vector?.donchian_high_32 ?? Infinity);
    expect(vector?.breakout_dist_atr).toBeGreaterThan(0);
    expect(vector?.donchian_pos).toBeGreaterThan(1);
  });
});

describe('FeaturePipeline - microstructure', () => {
  it('should estimate slippage from spread and ATR', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1, spreadBps: 1.5 });
    const vector = pipeline.onBar(createBar(0, 100, 100.5, 99.5, 100));

    // atr_bps = 1 / 100 → 100 bps
    expect(vector?.spread_bps).toBe(1.5);
    expect(vector?.atr_bps).toBeCloseTo(100, 9);
    expect(vector?.slippage_bps_est).toBeCloseTo(2.75, 9);
  });

  it('should cap the slippage estimate at 15 bps', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1, spreadBps: 1.5 });
    const vector = pipeline.onBar(createBar(0, 100, 110, 90, 100));

    expect(vector?.slippage_bps_est).toBe(15);
  });
});

describe('FeaturePipeline - portfolio context', () => {
  it('should pass the context through', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1 });
    const vector = pipeline.onBar(createBar(0, 100, 101, 99, 100), {
      openPositions: 2,
      exposureFrac: 0.5,
      dd24hBps: 120,
      haltFlag: 1,
    });

    expect(vector?.open_positions).toBe(2);
    expect(vector?.exposure_frac).toBe(0.5);
    expect(vector?.dd_24h_bps).toBe(120);
    expect(vector?.halt_flag).toBe(1);
  });

  it('should default missing context fields to 0', () => {
    const pipeline = new FeaturePipeline({ symbol: 'BTC-USD', warmupBars: 1 });
    const vector = pipeline.onBar(createBar(0, 100, 101, 99, 100), { openPositions: 1 });

    expect(vector?.open_positions).toBe(1);
    expect(vector?.exposure_frac).toBe(0);
    expect(vector?.halt_flag).toBe(0);
  });
});

// =============================================================================
// SANITIZATION
// =============================================================================

describe('sanitizeFeatureValue', () => {
  it('should map non-finite values', () => {
    expect(sanitizeFeatureValue('ret_1', NaN)).toBe(0);
    expect(sanitizeFeatureValue('ret_1', Infinity)).toBe(1e6);
    expect(sanitizeFeatureValue('ret_1', -Infinity)).toBe(-1e6);
    expect(sanitizeFeatureValue('close', -Infinity)).toBe(-1e6);
  });

  it('should clamp derived values only', () => {
    expect(sanitizeFeatureValue('atr_z_96', 5e6)).toBe(1e6);
    expect(sanitizeFeatureValue('bb_z', -2e6)).toBe(-1e6);
    expect(sanitizeFeatureValue('turnover_usd', 5e9)).toBe(5e9);
    expect(sanitizeFeatureValue('timestamp', T0)).toBe(T0);
  });
});
