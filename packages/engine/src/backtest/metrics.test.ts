/**
 * Backtest Metrics Tests
 */

import { describe, it, expect } from 'vitest';
import type { ExitReason, PositionRecord } from '@candlelab/shared';
import { calculateMetrics, maxDrawdown, sharpeRatio, sortinoRatio } from './metrics.js';

// =============================================================================
// HELPERS
// =============================================================================

function createRecord(
  index: number,
  pnlUsd: number,
  rMultiple: number,
  exitReason: ExitReason,
  overrides: Partial<PositionRecord> = {}
): PositionRecord {
  return {
    positionId: `pos-${index}`,
    runId: 'run1',
    candidateId: `cand-${index}`,
    symbol: 'BTC-USD',
    direction: 'long',
    entryTimestamp: `2024-01-0${index}T00:00:00.000Z`,
    entryBarIndex: index * 10,
    entryPrice: 100,
    entryFeesUsd: 0,
    sizeUsd: 1000,
    sizeUnits: 10,
    exitTimestamp: `2024-01-0${index}T12:00:00.000Z`,
    exitBarIndex: index * 10 + 5,
    exitPrice: 100 + pnlUsd / 10,
    exitFeesUsd: 0,
    exitReason,
    pnlUsd,
    pnlPct: pnlUsd / 1000,
    rMultiple,
    stopLossPrice: 90,
    takeProfitPrice: 120,
    timeStopBars: 48,
    trailingEnabled: false,
    trailingActivated: false,
    trailingStopPrice: null,
    highestPrice: 100,
    lowestPrice: null,
    isOpen: false,
    ...overrides,
  };
}

function createTrades(): PositionRecord[] {
  return [
    createRecord(1, 150, 1.5, 'take_profit'),
    createRecord(2, -50, -0.5, 'stop_loss'),
    createRecord(3, 100, 1, 'trailing_stop'),
    createRecord(4, -100, -1, 'stop_loss'),
  ];
}

// =============================================================================
// SUMMARY
// =============================================================================

describe('calculateMetrics', () => {
  it('should summarize closed trades', () => {
    const metrics = calculateMetrics(createTrades(), 10000);

    expect(metrics.totalTrades).toBe(4);
    expect(metrics.winningTrades).toBe(2);
    expect(metrics.losingTrades).toBe(2);
    expect(metrics.totalReturn).toBeCloseTo(0.01, 12);
    expect(metrics.finalEquity).toBe(10100);
    expect(metrics.winRate).toBe(0.5);
    expect(metrics.profitFactor).toBeCloseTo(250 / 150, 12);
    expect(metrics.avgWinLossRatio).toBeCloseTo(125 / 75, 12);
    expect(metrics.avgRMultiple).toBeCloseTo(0.25, 12);
  });

  it('should measure drawdown on the realized equity curve', () => {
    const metrics = calculateMetrics(createTrades(), 10000);

    expect(metrics.equityCurve.map((p) => p.equity)).toEqual([10150, 10100, 10200, 10100]);
    expect(metrics.equityCurve.map((p) => p.cumulativePnl)).toEqual([150, 100, 200, 100]);
    expect(metrics.maxDrawdown).toBeCloseTo(0.00980392156862745, 12);
  });

  it('should annualize sharpe and sortino over per-trade returns', () => {
    const metrics = calculateMetrics(createTrades(), 10000);

    expect(metrics.sharpeRatio).toBeCloseTo(3.334313581357268, 9);
    expect(metrics.sortinoRatio).toBeCloseTo(11.224972160321826, 9);
  });

  it('should count exits by reason', () => {
    const metrics = calculateMetrics(createTrades(), 10000);

    expect(metrics.exitReasons).toEqual({
      stop_loss: 2,
      take_profit: 1,
      trailing_stop: 1,
      time_stop: 0,
      end_of_run: 0,
      manual: 0,
    });
  });

  it('should order the equity curve by exit time', () => {
    const [first, second] = createTrades();
    if (!first || !second) throw new Error('fixture');

    const metrics = calculateMetrics([second, first], 10000);

    expect(metrics.equityCurve.map((p) => p.positionId)).toEqual(['pos-1', 'pos-2']);
  });

  it('should ignore open rows', () => {
    const open = createRecord(5, 0, 0, 'manual', {
      isOpen: true,
      exitTimestamp: null,
      exitReason: null,
      pnlUsd: null,
      pnlPct: null,
      rMultiple: null,
    });

    const metrics = calculateMetrics([...createTrades(), open], 10000);

    expect(metrics.totalTrades).toBe(4);
    expect(metrics.finalEquity).toBe(10100);
  });

  it('should return zeros for an empty run', () => {
    const metrics = calculateMetrics([], 10000);

    expect(metrics.totalTrades).toBe(0);
    expect(metrics.totalReturn).toBe(0);
    expect(metrics.finalEquity).toBe(10000);
    expect(metrics.sharpeRatio).toBe(0);
    expect(metrics.sortinoRatio).toBe(0);
    expect(metrics.maxDrawdown).toBe(0);
    expect(metrics.winRate).toBe(0);
    expect(metrics.profitFactor).toBe(0);
    expect(metrics.equityCurve).toEqual([]);
  });
});

// =============================================================================
// INDIVIDUAL METRICS
// =============================================================================

describe('ratio edge cases', () => {
  it('should report 99 sortino without losing trades', () => {
    expect(sortinoRatio([0.01, 0.02, 0.03])).toBe(99);
  });

  it('should report 0 sortino with a single losing trade', () => {
    expect(sortinoRatio([0.02, -0.01, 0.03])).toBe(0);
  });

  it('should report 0 sharpe for constant or too few returns', () => {
    expect(sharpeRatio([0.01])).toBe(0);
    expect(sharpeRatio([0.5, 0.5, 0.5])).toBe(0);
  });

  it('should find the deepest peak-to-trough drop', () => {
    expect(maxDrawdown([100, 120, 90, 110, 60, 130])).toBeCloseTo(0.5, 12);
    expect(maxDrawdown([100, 101, 102])).toBe(0);
  });
});
