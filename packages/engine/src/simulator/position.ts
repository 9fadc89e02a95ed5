/**
 * Position
 *
 * Exit state machine for a single open position. One `updateBar` per bar:
 * track the favorable extreme, activate and ratchet the trailing stop, then
 * evaluate exits in priority order
 *
 *   stop loss → trailing stop → take profit → time stop
 *
 * The first exit that matches closes the position. A closed position
 * ignores further bars.
 */

import type { Direction, ExitReason, ExitResult, ExitSpec } from '@candlelab/shared';
import {
  calculateTrailingStopLong,
  calculateTrailingStopShort,
  checkStopLoss,
  checkTakeProfit,
  checkTimeStop,
  checkTrailingActivationLong,
  checkTrailingActivationShort,
  updateHighestHigh,
  updateLowestLow,
} from './exit-checker.js';

export type PositionStatus = 'open' | 'closed';

export interface PositionInit {
  positionId: string;
  symbol: string;
  direction: Direction;
  /** Fill price including spread */
  entryPrice: number;
  entryBarIndex: number;
  entryTimestamp: Date;
  sizeUsd: number;
  sizeUnits: number;
  /** ATR at entry; scales the trailing distance */
  atrAtEntry: number;
  exitSpec: ExitSpec;
  entryFeesUsd?: number;
}

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be positive, got ${value}`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a finite non-negative number, got ${value}`);
  }
}

export class Position {
  readonly positionId: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly entryBarIndex: number;
  readonly entryTimestamp: Date;
  readonly sizeUsd: number;
  readonly sizeUnits: number;
  readonly atrAtEntry: number;
  readonly entryFeesUsd: number;
  readonly exitSpec: ExitSpec;

  private status: PositionStatus = 'open';
  private barsHeld = 0;
  /** Highest high for longs, lowest low for shorts */
  private favorableExtreme: number;
  private trailingActivated = false;
  private trailingStopPrice: number | null = null;

  constructor(init: PositionInit) {
    requirePositive('entryPrice', init.entryPrice);
    requirePositive('sizeUsd', init.sizeUsd);
    requirePositive('sizeUnits', init.sizeUnits);
    requireNonNegative('atrAtEntry', init.atrAtEntry);
    requireNonNegative('entryFeesUsd', init.entryFeesUsd ?? 0);
    if (!Number.isInteger(init.exitSpec.timeStopBars) || init.exitSpec.timeStopBars <= 0) {
      throw new Error(`timeStopBars must be a positive integer, got ${init.exitSpec.timeStopBars}`);
    }
    if (init.exitSpec.trailing !== null) {
      requirePositive('trailing.distanceAtr', init.exitSpec.trailing.distanceAtr);
    }

    this.positionId = init.positionId;
    this.symbol = init.symbol;
    this.direction = init.direction;
    this.entryPrice = init.entryPrice;
    this.entryBarIndex = init.entryBarIndex;
    this.entryTimestamp = init.entryTimestamp;
    this.sizeUsd = init.sizeUsd;
    this.sizeUnits = init.sizeUnits;
    this.atrAtEntry = init.atrAtEntry;
    this.entryFeesUsd = init.entryFeesUsd ?? 0;
    this.exitSpec = init.exitSpec;
    this.favorableExtreme = init.entryPrice;
  }

  /**
   * Advance one bar. Returns the exit when one fires, else null.
   */
  updateBar(high: number, low: number, close: number, barIndex: number, timestamp: Date): ExitResult | null {
    if (this.status === 'closed') {
      return null;
    }

    this.barsHeld += 1;
    const isLong = this.direction === 'long';

    this.favorableExtreme = isLong
      ? updateHighestHigh(this.favorableExtreme, high)
      : updateLowestLow(this.favorableExtreme, low);

    const trailing = this.exitSpec.trailing;
    if (trailing !== null) {
      if (!this.trailingActivated) {
        this.trailingActivated = isLong
          ? checkTrailingActivationLong(this.favorableExtreme, trailing.activationPrice)
          : checkTrailingActivationShort(this.favorableExtreme, trailing.activationPrice);
      }

      if (this.trailingActivated) {
        this.ratchetTrailingStop(trailing.distanceAtr);
      }
    }

    const { stopLossPrice, takeProfitPrice, timeStopBars } = this.exitSpec;

    if (checkStopLoss(close, stopLossPrice, this.direction)) {
      return this.close('stop_loss', stopLossPrice, barIndex, timestamp);
    }

    if (this.trailingActivated && this.trailingStopPrice !== null) {
      if (checkStopLoss(close, this.trailingStopPrice, this.direction)) {
        return this.close('trailing_stop', this.trailingStopPrice, barIndex, timestamp);
      }
    }

    if (checkTakeProfit(close, takeProfitPrice, this.direction)) {
      return this.close('take_profit', takeProfitPrice, barIndex, timestamp);
    }

    if (checkTimeStop(this.barsHeld, timeStopBars)) {
      return this.close('time_stop', close, barIndex, timestamp);
    }

    return null;
  }

  /**
   * Close at `close` regardless of exit rules (end of run, manual)
   */
  forceClose(close: number, barIndex: number, timestamp: Date, reason: ExitReason): ExitResult {
    if (this.status === 'closed') {
      throw new Error(`Position ${this.positionId} is already closed`);
    }
    return this.close(reason, close, barIndex, timestamp);
  }

  private ratchetTrailingStop(distanceAtr: number): void {
    if (this.direction === 'long') {
      const candidate = calculateTrailingStopLong(this.favorableExtreme, this.atrAtEntry, distanceAtr, this.entryPrice);
      this.trailingStopPrice =
        this.trailingStopPrice === null ? candidate : Math.max(this.trailingStopPrice, candidate);
    } else {
      const candidate = calculateTrailingStopShort(this.favorableExtreme, this.atrAtEntry, distanceAtr, this.entryPrice);
      this.trailingStopPrice =
        this.trailingStopPrice === null ? candidate : Math.min(this.trailingStopPrice, candidate);
    }
  }

  private close(reason: ExitReason, exitPrice: number, barIndex: number, timestamp: Date): ExitResult {
    this.status = 'closed';
    return {
      exitReason: reason,
      exitPrice,
      barsHeld: this.barsHeld,
      barIndex,
      timestamp: timestamp.toISOString(),
      highestHigh: this.highestHigh,
      lowestLow: this.lowestLow,
      trailingWasActive: this.trailingActivated,
      trailingStopPrice: this.trailingStopPrice,
    };
  }

  // ===========================================================================
  // ACCESSORS
  // ===========================================================================

  isOpen(): boolean {
    return this.status === 'open';
  }

  getStatus(): PositionStatus {
    return this.status;
  }

  getBarsHeld(): number {
    return this.barsHeld;
  }

  /** Highest high since entry (longs only) */
  get highestHigh(): number | null {
    return this.direction === 'long' ? this.favorableExtreme : null;
  }

  /** Lowest low since entry (shorts only) */
  get lowestLow(): number | null {
    return this.direction === 'short' ? this.favorableExtreme : null;
  }

  isTrailingActivated(): boolean {
    return this.trailingActivated;
  }

  getTrailingStopPrice(): number | null {
    return this.trailingStopPrice;
  }

  getUnrealizedPnl(price: number): number {
    const move = this.direction === 'long' ? price - this.entryPrice : this.entryPrice - price;
    return move * this.sizeUnits;
  }

  getUnrealizedPnlPct(price: number): number {
    return this.sizeUsd > 0 ? this.getUnrealizedPnl(price) / this.sizeUsd : 0;
  }
}
