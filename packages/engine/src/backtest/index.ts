/**
 * Backtesting
 */

export {
  BacktestRunner,
  assertChronological,
  type BacktestResult,
  type BacktestRunnerOptions,
  type CandidateRecord,
  type SkipReason,
} from './backtest-runner.js';
export {
  calculateMetrics,
  sharpeRatio,
  sortinoRatio,
  maxDrawdown,
  type BacktestMetrics,
  type EquityPoint,
} from './metrics.js';
export * from './data/index.js';
