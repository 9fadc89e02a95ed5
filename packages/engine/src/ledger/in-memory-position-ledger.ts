/**
 * In-memory PositionLedger
 *
 * Keeps position rows in insertion order. Reads return copies so callers
 * cannot edit stored rows.
 */

import type {
  PositionClose,
  PositionFilter,
  PositionLedger,
  PositionRecord,
  TrailingUpdate,
} from '@candlelab/shared';

export class InMemoryPositionLedger implements PositionLedger {
  private readonly records = new Map<string, PositionRecord>();

  openPosition(record: PositionRecord): void {
    if (this.records.has(record.positionId)) {
      throw new Error(`Position ${record.positionId} already exists in ledger`);
    }
    this.records.set(record.positionId, { ...record });
  }

  closePosition(close: PositionClose): void {
    const record = this.require(close.positionId);
    if (!record.isOpen) {
      throw new Error(`Position ${close.positionId} is already closed`);
    }

    this.records.set(close.positionId, {
      ...record,
      exitTimestamp: close.exitTimestamp,
      exitBarIndex: close.exitBarIndex,
      exitPrice: close.exitPrice,
      exitFeesUsd: close.exitFeesUsd,
      exitReason: close.exitReason,
      pnlUsd: close.pnlUsd,
      pnlPct: close.pnlPct,
      rMultiple: close.rMultiple,
      isOpen: false,
    });
  }

  updatePositionTrailing(update: TrailingUpdate): void {
    const record = this.require(update.positionId);
    this.records.set(update.positionId, {
      ...record,
      trailingActivated: update.trailingActivated,
      trailingStopPrice: update.trailingStopPrice,
      highestPrice: update.highestPrice,
      lowestPrice: update.lowestPrice,
    });
  }

  getPosition(positionId: string): PositionRecord | null {
    const record = this.records.get(positionId);
    return record ? { ...record } : null;
  }

  listPositions(filter: PositionFilter = {}): PositionRecord[] {
    const rows: PositionRecord[] = [];
    for (const record of this.records.values()) {
      if (filter.runId !== undefined && record.runId !== filter.runId) continue;
      if (filter.symbol !== undefined && record.symbol !== filter.symbol) continue;
      if (filter.isOpen !== undefined && record.isOpen !== filter.isOpen) continue;
      rows.push({ ...record });
    }
    return rows;
  }

  /** Number of stored rows */
  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }

  private require(positionId: string): PositionRecord {
    const record = this.records.get(positionId);
    if (!record) {
      throw new Error(`Unknown position ${positionId}`);
    }
    return record;
  }
}
