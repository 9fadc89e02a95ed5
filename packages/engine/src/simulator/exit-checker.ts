/**
 * Exit Checker
 *
 * Stateless exit predicates and trailing-stop arithmetic. `Position` owns
 * the state and decides the order in which these are consulted.
 */

import type { Direction } from '@candlelab/shared';

// =============================================================================
// STOP LOSS / TAKE PROFIT / TIME STOP
// =============================================================================

export function checkStopLoss(close: number, stopLossPrice: number, direction: Direction): boolean {
  return direction === 'long' ? close <= stopLossPrice : close >= stopLossPrice;
}

export function checkTakeProfit(close: number, takeProfitPrice: number, direction: Direction): boolean {
  return direction === 'long' ? close >= takeProfitPrice : close <= takeProfitPrice;
}

export function checkTimeStop(barsHeld: number, timeStopBars: number): boolean {
  return barsHeld >= timeStopBars;
}

// =============================================================================
// TRAILING STOP
// =============================================================================

export function updateHighestHigh(currentHighest: number, high: number): number {
  return Math.max(currentHighest, high);
}

export function updateLowestLow(currentLowest: number, low: number): number {
  return Math.min(currentLowest, low);
}

export function checkTrailingActivationLong(highestHigh: number, activationPrice: number): boolean {
  return highestHigh >= activationPrice;
}

export function checkTrailingActivationShort(lowestLow: number, activationPrice: number): boolean {
  return lowestLow <= activationPrice;
}

/**
 * Long trailing stop: `distanceAtr` ATRs below the highest high, never
 * below entry once active.
 */
export function calculateTrailingStopLong(
  highestHigh: number,
  atr: number,
  distanceAtr: number,
  entryPrice: number
): number {
  return Math.max(highestHigh - distanceAtr * atr, entryPrice);
}

/**
 * Short trailing stop: `distanceAtr` ATRs above the lowest low, never
 * above entry once active.
 */
export function calculateTrailingStopShort(
  lowestLow: number,
  atr: number,
  distanceAtr: number,
  entryPrice: number
): number {
  return Math.min(lowestLow + distanceAtr * atr, entryPrice);
}
