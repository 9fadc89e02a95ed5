/**
 * Market data types
 */

/**
 * Represents a single OHLCV bar
 */
export interface Bar {
  /** Bar open time (Unix timestamp in seconds) */
  timestamp: number;
  /** Opening price */
  open: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
  /** Closing price */
  close: number;
  /** Traded volume (base units) */
  volume: number;
}

/**
 * Portfolio / risk scalars supplied by the caller on every bar.
 * They are passed straight through into the feature vector.
 */
export interface PortfolioContext {
  /** Number of currently open positions */
  openPositions: number;
  /** Open notional as a fraction of equity */
  exposureFrac: number;
  /** Drawdown over the trailing 24h window, in basis points */
  dd24hBps: number;
  /** 1 when new risk is halted, else 0 */
  haltFlag: 0 | 1;
}

export const DEFAULT_PORTFOLIO_CONTEXT: Readonly<PortfolioContext> = Object.freeze({
  openPositions: 0,
  exposureFrac: 0,
  dd24hBps: 0,
  haltFlag: 0,
});

/**
 * Convert a bar timestamp (seconds) to a Date
 */
export function barTime(bar: Pick<Bar, 'timestamp'>): Date {
  return new Date(bar.timestamp * 1000);
}
