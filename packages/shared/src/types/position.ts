/**
 * Position, exit and ledger types
 */

export type Direction = 'long' | 'short';

export type ExitReason =
  | 'stop_loss'
  | 'take_profit'
  | 'trailing_stop'
  | 'time_stop'
  | 'end_of_run'
  | 'manual';

export const EXIT_REASONS: readonly ExitReason[] = [
  'stop_loss',
  'take_profit',
  'trailing_stop',
  'time_stop',
  'end_of_run',
  'manual',
];

/**
 * Trailing stop configuration. Only present when trailing is enabled.
 */
export interface TrailingSpec {
  /** Price at which the trailing stop starts tracking */
  activationPrice: number;
  /** Trail distance in units of ATR at entry */
  distanceAtr: number;
}

/**
 * Exit contract fixed at position open
 */
export interface ExitSpec {
  stopLossPrice: number;
  takeProfitPrice: number;
  /** Maximum bars to hold */
  timeStopBars: number;
  /** `null` means trailing is disabled */
  trailing: TrailingSpec | null;
}

/**
 * Flat exit spec shape as produced by playbooks / external layers
 */
export interface ExitSpecWire {
  stopLossPrice: number;
  takeProfitPrice: number;
  timeStopBars: number;
  trailingEnabled: boolean;
  trailingActivationPrice?: number | null;
  trailingDistanceAtr?: number | null;
}

/**
 * Describes an exit that fired (or was forced) on a bar
 */
export interface ExitResult {
  exitReason: ExitReason;
  /** Trigger price, before exit slippage */
  exitPrice: number;
  barsHeld: number;
  barIndex: number;
  /** ISO-8601 */
  timestamp: string;
  highestHigh: number | null;
  lowestLow: number | null;
  trailingWasActive: boolean;
  trailingStopPrice: number | null;
}

/**
 * Position row as stored by the ledger.
 * The ledger is the single source of truth for realized PnL.
 */
export interface PositionRecord {
  positionId: string;
  runId: string;
  candidateId: string;
  symbol: string;
  direction: Direction;

  entryTimestamp: string;
  entryBarIndex: number;
  /** Fill price including spread */
  entryPrice: number;
  entryFeesUsd: number;
  sizeUsd: number;
  sizeUnits: number;

  exitTimestamp: string | null;
  exitBarIndex: number | null;
  exitPrice: number | null;
  exitFeesUsd: number | null;
  exitReason: ExitReason | null;

  pnlUsd: number | null;
  pnlPct: number | null;
  rMultiple: number | null;

  stopLossPrice: number;
  takeProfitPrice: number;
  timeStopBars: number;
  trailingEnabled: boolean;

  trailingActivated: boolean;
  trailingStopPrice: number | null;
  highestPrice: number | null;
  lowestPrice: number | null;

  isOpen: boolean;
}

export interface PositionClose {
  positionId: string;
  exitTimestamp: string;
  exitBarIndex: number;
  exitPrice: number;
  exitFeesUsd: number;
  exitReason: ExitReason;
  pnlUsd: number;
  pnlPct: number;
  rMultiple: number;
}

export interface TrailingUpdate {
  positionId: string;
  trailingActivated: boolean;
  trailingStopPrice: number | null;
  highestPrice: number | null;
  lowestPrice: number | null;
}

export interface PositionFilter {
  runId?: string;
  symbol?: string;
  isOpen?: boolean;
}

/**
 * Persistence collaborator for positions.
 * The simulator only calls these methods; storage is the ledger's concern.
 */
export interface PositionLedger {
  openPosition(record: PositionRecord): void;
  closePosition(close: PositionClose): void;
  updatePositionTrailing(update: TrailingUpdate): void;
  getPosition(positionId: string): PositionRecord | null;
  listPositions(filter?: PositionFilter): PositionRecord[];
}
