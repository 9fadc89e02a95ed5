/**
 * Position Manager
 *
 * Owns every open Position for a run: simulates fills with spread and
 * fees, advances positions bar by bar, computes realized PnL and writes
 * each lifecycle step to the PositionLedger. The manager is the only
 * writer to the ledger.
 *
 * Fill model:
 * - entry at the next bar's open, spread against us, taker fee on notional
 * - exit at the trigger price, spread against us, maker fee on exit notional
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_SPREAD_BPS_MAP,
  ExitSpecSchema,
  createSilentLogger,
  type Direction,
  type ExitReason,
  type ExitResult,
  type ExitSpec,
  type Logger,
  type PositionClose,
  type PositionLedger,
  type PositionRecord,
  type TrailingUpdate,
} from '@candlelab/shared';
import { EPSILON } from '../indicators/index.js';
import { Position } from './position.js';

/**
 * Position Manager Events
 */
export interface PositionManagerEvents {
  'position:opened': (record: PositionRecord) => void;
  'position:trailing': (update: TrailingUpdate) => void;
  'position:closed': (close: PositionClose, exit: ExitResult) => void;
}

export interface PositionManagerOptions {
  ledger: PositionLedger;
  runId: string;
  /** Maker fee on exit notional, in bps */
  feeMakerBps?: number;
  /** Taker fee on entry notional, in bps */
  feeTakerBps?: number;
  /** Per-symbol spread in bps */
  spreadBpsMap?: Readonly<Record<string, number>>;
  /** Spread for symbols missing from the map */
  defaultSpreadBps?: number;
  logger?: Logger;
}

export interface OpenPositionRequest {
  candidateId: string;
  symbol: string;
  direction: Direction;
  /** Close of the signal bar (informational) */
  signalPrice: number;
  /** Open of the bar the order fills on */
  nextOpen: number;
  barIndex: number;
  timestamp: Date;
  sizeUsd: number;
  atrAtEntry: number;
  exitSpec: ExitSpec;
}

const BPS = 10000;

/**
 * Freeze a validated exit spec so nothing downstream can alter it
 */
function freezeExitSpec(spec: ExitSpec): Readonly<ExitSpec> {
  const parsed = ExitSpecSchema.parse(spec);
  return Object.freeze({
    ...parsed,
    trailing: parsed.trailing === null ? null : Object.freeze({ ...parsed.trailing }),
  });
}

/**
 * Position Manager
 *
 * @example
 * ```typescript
 * const manager = new PositionManager({ ledger, runId: 'run-1' });
 *
 * manager.on('position:closed', (close) => {
 *   logger.info('Closed', { id: close.positionId, pnl: close.pnlUsd });
 * });
 *
 * const id = manager.openPosition({ ...candidate, nextOpen, barIndex, timestamp, sizeUsd });
 * manager.updatePositions(bar.high, bar.low, bar.close, barIndex, barTime(bar));
 * ```
 */
export class PositionManager extends EventEmitter {
  private readonly ledger: PositionLedger;
  private readonly runId: string;
  private readonly feeMakerBps: number;
  private readonly feeTakerBps: number;
  private readonly spreadBpsMap: Readonly<Record<string, number>>;
  private readonly defaultSpreadBps: number;
  private readonly logger: Logger;

  private readonly positions = new Map<string, Position>();

  constructor(options: PositionManagerOptions) {
    super();
    this.ledger = options.ledger;
    this.runId = options.runId;
    this.feeMakerBps = options.feeMakerBps ?? 6;
    this.feeTakerBps = options.feeTakerBps ?? 12.5;
    this.spreadBpsMap = options.spreadBpsMap ?? DEFAULT_SPREAD_BPS_MAP;
    this.defaultSpreadBps = options.defaultSpreadBps ?? 2;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'position-manager', runId: this.runId });

    if (this.feeMakerBps < 0 || this.feeTakerBps < 0 || this.defaultSpreadBps < 0) {
      throw new Error('Fees and spreads must be non-negative');
    }
  }

  // ===========================================================================
  // OPEN
  // ===========================================================================

  /**
   * Fill a new position at the next bar's open and record it.
   * Returns the position id.
   */
  openPosition(request: OpenPositionRequest): string {
    const exitSpec = freezeExitSpec(request.exitSpec);
    const spread = this.getSpreadBps(request.symbol) / BPS;

    const entryPrice =
      request.direction === 'long' ? request.nextOpen * (1 + spread) : request.nextOpen * (1 - spread);
    const entryFeesUsd = (this.feeTakerBps / BPS) * request.sizeUsd;
    const sizeUnits = request.sizeUsd / entryPrice;

    const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
    const positionId = `${this.runId}_${request.symbol}_${request.barIndex}_${suffix}`;

    const position = new Position({
      positionId,
      symbol: request.symbol,
      direction: request.direction,
      entryPrice,
      entryBarIndex: request.barIndex,
      entryTimestamp: request.timestamp,
      sizeUsd: request.sizeUsd,
      sizeUnits,
      atrAtEntry: request.atrAtEntry,
      exitSpec,
      entryFeesUsd,
    });

    const record: PositionRecord = {
      positionId,
      runId: this.runId,
      candidateId: request.candidateId,
      symbol: request.symbol,
      direction: request.direction,
      entryTimestamp: request.timestamp.toISOString(),
      entryBarIndex: request.barIndex,
      entryPrice,
      entryFeesUsd,
      sizeUsd: request.sizeUsd,
      sizeUnits,
      exitTimestamp: null,
      exitBarIndex: null,
      exitPrice: null,
      exitFeesUsd: null,
      exitReason: null,
      pnlUsd: null,
      pnlPct: null,
      rMultiple: null,
      stopLossPrice: exitSpec.stopLossPrice,
      takeProfitPrice: exitSpec.takeProfitPrice,
      timeStopBars: exitSpec.timeStopBars,
      trailingEnabled: exitSpec.trailing !== null,
      trailingActivated: false,
      trailingStopPrice: null,
      highestPrice: position.highestHigh,
      lowestPrice: position.lowestLow,
      isOpen: true,
    };
    this.ledger.openPosition(record);
    this.positions.set(positionId, position);

    this.logger.debug('Position opened', {
      positionId,
      direction: request.direction,
      signalPrice: request.signalPrice,
      entryPrice,
      sizeUsd: request.sizeUsd,
    });
    this.emit('position:opened', record);

    return positionId;
  }

  // ===========================================================================
  // UPDATE
  // ===========================================================================

  /**
   * Advance every open position by one bar, in the order they were opened.
   * Returns the ids of positions that closed on this bar.
   */
  updatePositions(high: number, low: number, close: number, barIndex: number, timestamp: Date): string[] {
    const closed: string[] = [];

    for (const position of [...this.positions.values()]) {
      const wasActivated = position.isTrailingActivated();
      const previousStop = position.getTrailingStopPrice();
      const previousExtreme = position.highestHigh ?? position.lowestLow;

      const exit = position.updateBar(high, low, close, barIndex, timestamp);

      if (exit) {
        this.finalizeClose(position, exit);
        closed.push(position.positionId);
        continue;
      }

      const activatedNow = !wasActivated && position.isTrailingActivated();
      const stopMoved = position.getTrailingStopPrice() !== previousStop;
      const extremeMoved =
        position.isTrailingActivated() && (position.highestHigh ?? position.lowestLow) !== previousExtreme;
      if (activatedNow || stopMoved || extremeMoved) {
        const update: TrailingUpdate = {
          positionId: position.positionId,
          trailingActivated: position.isTrailingActivated(),
          trailingStopPrice: position.getTrailingStopPrice(),
          highestPrice: position.highestHigh,
          lowestPrice: position.lowestLow,
        };
        this.ledger.updatePositionTrailing(update);
        this.emit('position:trailing', update);
      }
    }

    return closed;
  }

  /**
   * Force-close every open position (end of run). Returns the closed ids.
   */
  closeAllPositions(close: number, barIndex: number, timestamp: Date): string[] {
    const closed: string[] = [];
    for (const position of [...this.positions.values()]) {
      const exit = position.forceClose(close, barIndex, timestamp, 'end_of_run');
      this.finalizeClose(position, exit);
      closed.push(position.positionId);
    }
    return closed;
  }

  /**
   * Force-close one position. Returns false when the id is not open.
   */
  closePosition(
    positionId: string,
    close: number,
    barIndex: number,
    timestamp: Date,
    reason: ExitReason = 'manual'
  ): boolean {
    const position = this.positions.get(positionId);
    if (!position) {
      this.logger.warn('closePosition: unknown position', { positionId });
      return false;
    }
    const exit = position.forceClose(close, barIndex, timestamp, reason);
    this.finalizeClose(position, exit);
    return true;
  }

  // ===========================================================================
  // CLOSE
  // ===========================================================================

  private finalizeClose(position: Position, exit: ExitResult): void {
    const spread = this.getSpreadBps(position.symbol) / BPS;
    const isLong = position.direction === 'long';

    const exitPrice = isLong ? exit.exitPrice * (1 - spread) : exit.exitPrice * (1 + spread);
    const exitNotional = exitPrice * position.sizeUnits;
    const exitFeesUsd = (this.feeMakerBps / BPS) * exitNotional;

    const grossPnl = isLong ? exitNotional - position.sizeUsd : position.sizeUsd - exitNotional;
    const pnlUsd = grossPnl - position.entryFeesUsd - exitFeesUsd;
    const pnlPct = pnlUsd / position.sizeUsd;

    const riskUsd = Math.abs(position.entryPrice - position.exitSpec.stopLossPrice) * position.sizeUnits;
    const rMultiple = riskUsd > EPSILON ? pnlUsd / riskUsd : 0;

    const close: PositionClose = {
      positionId: position.positionId,
      exitTimestamp: exit.timestamp,
      exitBarIndex: exit.barIndex,
      exitPrice,
      exitFeesUsd,
      exitReason: exit.exitReason,
      pnlUsd,
      pnlPct,
      rMultiple,
    };

    this.ledger.closePosition(close);
    this.positions.delete(position.positionId);

    this.logger.debug('Position closed', {
      positionId: position.positionId,
      reason: exit.exitReason,
      barsHeld: exit.barsHeld,
      pnlUsd,
      rMultiple,
    });
    this.emit('position:closed', close, exit);
  }

  // ===========================================================================
  // ACCESSORS
  // ===========================================================================

  getSpreadBps(symbol: string): number {
    return this.spreadBpsMap[symbol] ?? this.defaultSpreadBps;
  }

  getOpenPositionCount(): number {
    return this.positions.size;
  }

  getOpenPositions(): Position[] {
    return [...this.positions.values()];
  }

  getPosition(positionId: string): Position | undefined {
    return this.positions.get(positionId);
  }

  /**
   * Sum of entry notional over open positions
   */
  getOpenExposureUsd(): number {
    let total = 0;
    for (const position of this.positions.values()) {
      total += position.sizeUsd;
    }
    return total;
  }

  /**
   * Fixed-fractional sizing: risk `riskPct` of equity between entry and stop.
   * Returns 0 when entry and stop coincide.
   */
  calculatePositionSize(equity: number, riskPct: number, entryPrice: number, stopLossPrice: number): number {
    if (entryPrice <= 0) {
      return 0;
    }
    const stopDistancePct = Math.abs(entryPrice - stopLossPrice) / entryPrice;
    if (stopDistancePct <= EPSILON) {
      return 0;
    }
    return (equity * riskPct) / stopDistancePct;
  }

  /**
   * Type-safe event listener
   */
  override on<K extends keyof PositionManagerEvents>(event: K, listener: PositionManagerEvents[K]): this {
    return super.on(event, listener);
  }

  /**
   * Type-safe event emitter
   */
  override emit<K extends keyof PositionManagerEvents>(
    event: K,
    ...args: Parameters<PositionManagerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
