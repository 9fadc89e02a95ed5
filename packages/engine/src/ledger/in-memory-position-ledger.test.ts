import { describe, it, expect, beforeEach } from 'vitest';
import type { PositionRecord } from '@candlelab/shared';
import { InMemoryPositionLedger } from './in-memory-position-ledger.js';

function createRecord(overrides: Partial<PositionRecord> = {}): PositionRecord {
  return {
    positionId: 'run1_BTC-USD_1_abcdef01',
    runId: 'run1',
    candidateId: 'cand-1',
    symbol: 'BTC-USD',
    direction: 'long',
    entryTimestamp: '2024-01-01T00:00:00.000Z',
    entryBarIndex: 1,
    entryPrice: 100,
    entryFeesUsd: 1.25,
    sizeUsd: 1000,
    sizeUnits: 10,
    exitTimestamp: null,
    exitBarIndex: null,
    exitPrice: null,
    exitFeesUsd: null,
    exitReason: null,
    pnlUsd: null,
    pnlPct: null,
    rMultiple: null,
    stopLossPrice: 95,
    takeProfitPrice: 110,
    timeStopBars: 32,
    trailingEnabled: true,
    trailingActivated: false,
    trailingStopPrice: null,
    highestPrice: 100,
    lowestPrice: null,
    isOpen: true,
    ...overrides,
  };
}

describe('InMemoryPositionLedger', () => {
  let ledger: InMemoryPositionLedger;

  beforeEach(() => {
    ledger = new InMemoryPositionLedger();
  });

  it('should store and return open positions', () => {
    ledger.openPosition(createRecord());

    expect(ledger.size).toBe(1);
    expect(ledger.getPosition('run1_BTC-USD_1_abcdef01')?.isOpen).toBe(true);
    expect(ledger.getPosition('missing')).toBeNull();
  });

  it('should reject duplicate ids', () => {
    ledger.openPosition(createRecord());
    expect(() => ledger.openPosition(createRecord())).toThrow('already exists');
  });

  it('should apply trailing updates', () => {
    ledger.openPosition(createRecord());
    ledger.updatePositionTrailing({
      positionId: 'run1_BTC-USD_1_abcdef01',
      trailingActivated: true,
      trailingStopPrice: 103,
      highestPrice: 106,
      lowestPrice: null,
    });

    expect(ledger.getPosition('run1_BTC-USD_1_abcdef01')).toMatchObject({
      trailingActivated: true,
      trailingStopPrice: 103,
      highestPrice: 106,
      isOpen: true,
    });
  });

  it('should close positions once', () => {
    ledger.openPosition(createRecord());
    const close = {
      positionId: 'run1_BTC-USD_1_abcdef01',
      exitTimestamp: '2024-01-01T01:00:00.000Z',
      exitBarIndex: 5,
      exitPrice: 110,
      exitFeesUsd: 0.66,
      exitReason: 'take_profit' as const,
      pnlUsd: 98.09,
      pnlPct: 0.09809,
      rMultiple: 1.9618,
    };
    ledger.closePosition(close);

    expect(ledger.getPosition(close.positionId)).toMatchObject({
      exitReason: 'take_profit',
      exitPrice: 110,
      exitBarIndex: 5,
      pnlUsd: 98.09,
      isOpen: false,
    });
    expect(() => ledger.closePosition(close)).toThrow('already closed');
  });

  it('should throw for unknown positions', () => {
    expect(() =>
      ledger.updatePositionTrailing({
        positionId: 'missing',
        trailingActivated: true,
        trailingStopPrice: 1,
        highestPrice: 1,
        lowestPrice: null,
      })
    ).toThrow('Unknown position missing');
  });

  it('should filter by run, symbol and state', () => {
    ledger.openPosition(createRecord({ positionId: 'a' }));
    ledger.openPosition(createRecord({ positionId: 'b', symbol: 'ETH-USD' }));
    ledger.openPosition(createRecord({ positionId: 'c', runId: 'run2', isOpen: false }));

    expect(ledger.listPositions().map((r) => r.positionId)).toEqual(['a', 'b', 'c']);
    expect(ledger.listPositions({ runId: 'run1' }).map((r) => r.positionId)).toEqual(['a', 'b']);
    expect(ledger.listPositions({ symbol: 'ETH-USD' }).map((r) => r.positionId)).toEqual(['b']);
    expect(ledger.listPositions({ isOpen: false }).map((r) => r.positionId)).toEqual(['c']);
  });

  it('should hand out copies', () => {
    ledger.openPosition(createRecord());
    const copy = ledger.getPosition('run1_BTC-USD_1_abcdef01');
    if (copy) copy.entryPrice = 1;

    expect(ledger.getPosition('run1_BTC-USD_1_abcdef01')?.entryPrice).toBe(100);
  });

  it('should clear all rows', () => {
    ledger.openPosition(createRecord());
    ledger.clear();
    expect(ledger.size).toBe(0);
  });
});
