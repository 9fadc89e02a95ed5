/**
 * Backtest metrics
 *
 * Computed from closed ledger rows. Per-trade returns are `pnlPct`;
 * ratios use the sample standard deviation and √252 annualization.
 */

import type { ExitReason, PositionRecord } from '@candlelab/shared';

const PERIODS_PER_YEAR = 252;
/** Sortino value reported when no trade lost money */
const SORTINO_NO_DOWNSIDE = 99;

export interface EquityPoint {
  timestamp: string;
  equity: number;
  pnl: number;
  cumulativePnl: number;
  positionId: string;
}

export interface BacktestMetrics {
  totalReturn: number;
  sharpeRatio: number;
  sortinoRatio: number;
  /** Peak-to-trough on the realized equity curve, as a fraction */
  maxDrawdown: number;
  winRate: number;
  profitFactor: number;
  avgWinLossRatio: number;
  avgRMultiple: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  finalEquity: number;
  exitReasons: Record<ExitReason, number>;
  equityCurve: EquityPoint[];
}

interface ClosedTrade {
  positionId: string;
  exitTimestamp: string;
  exitReason: ExitReason;
  pnlUsd: number;
  pnlPct: number;
  rMultiple: number;
}

function toClosedTrade(record: PositionRecord): ClosedTrade | null {
  if (
    record.isOpen ||
    record.exitTimestamp === null ||
    record.exitReason === null ||
    record.pnlUsd === null ||
    record.pnlPct === null ||
    record.rMultiple === null
  ) {
    return null;
  }
  return {
    positionId: record.positionId,
    exitTimestamp: record.exitTimestamp,
    exitReason: record.exitReason,
    pnlUsd: record.pnlUsd,
    pnlPct: record.pnlPct,
    rMultiple: record.rMultiple,
  };
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

// =============================================================================
// INDIVIDUAL METRICS
// =============================================================================

export function sharpeRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const std = sampleStd(returns);
  return std > 0 ? (mean(returns) / std) * Math.sqrt(PERIODS_PER_YEAR) : 0;
}

export function sortinoRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const downside = returns.filter((r) => r < 0);
  if (downside.length === 0) return SORTINO_NO_DOWNSIDE;
  const downsideStd = sampleStd(downside);
  return downsideStd > 0 ? (mean(returns) / downsideStd) * Math.sqrt(PERIODS_PER_YEAR) : 0;
}

export function maxDrawdown(equity: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const value of equity) {
    peak = Math.max(peak, value);
    if (peak > 0) {
      worst = Math.max(worst, (peak - value) / peak);
    }
  }
  return worst;
}

function buildEquityCurve(trades: readonly ClosedTrade[], startingEquity: number): EquityPoint[] {
  const ordered = [...trades].sort((a, b) => a.exitTimestamp.localeCompare(b.exitTimestamp));
  const curve: EquityPoint[] = [];
  let cumulativePnl = 0;

  for (const trade of ordered) {
    cumulativePnl += trade.pnlUsd;
    curve.push({
      timestamp: trade.exitTimestamp,
      equity: startingEquity + cumulativePnl,
      pnl: trade.pnlUsd,
      cumulativePnl,
      positionId: trade.positionId,
    });
  }
  return curve;
}

// =============================================================================
// ALL METRICS
// =============================================================================

/**
 * Summarize a run. Open rows are ignored.
 */
export function calculateMetrics(positions: readonly PositionRecord[], startingEquity: number): BacktestMetrics {
  const trades = positions.map(toClosedTrade).filter((t): t is ClosedTrade => t !== null);

  const exitReasons: Record<ExitReason, number> = {
    stop_loss: 0,
    take_profit: 0,
    trailing_stop: 0,
    time_stop: 0,
    end_of_run: 0,
    manual: 0,
  };
  for (const trade of trades) {
    exitReasons[trade.exitReason] += 1;
  }

  const equityCurve = buildEquityCurve(trades, startingEquity);
  const equityValues = [startingEquity, ...equityCurve.map((p) => p.equity)];
  const finalEquity = equityValues[equityValues.length - 1] ?? startingEquity;

  const wins = trades.filter((t) => t.pnlUsd > 0).map((t) => t.pnlUsd);
  const losses = trades.filter((t) => t.pnlUsd < 0).map((t) => Math.abs(t.pnlUsd));
  const grossProfit = wins.reduce((sum, v) => sum + v, 0);
  const grossLoss = losses.reduce((sum, v) => sum + v, 0);
  const returns = trades.map((t) => t.pnlPct);

  return {
    totalReturn: startingEquity > 0 ? (finalEquity - startingEquity) / startingEquity : 0,
    sharpeRatio: sharpeRatio(returns),
    sortinoRatio: sortinoRatio(returns),
    maxDrawdown: maxDrawdown(equityValues),
    winRate: trades.length > 0 ? wins.length / trades.length : 0,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : 0,
    avgWinLossRatio: wins.length > 0 && losses.length > 0 ? mean(wins) / mean(losses) : 0,
    avgRMultiple: mean(trades.map((t) => t.rMultiple)),
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    finalEquity,
    exitReasons,
    equityCurve,
  };
}
