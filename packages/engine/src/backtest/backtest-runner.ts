/**
 * Backtest Runner
 *
 * Drives one symbol through the feature pipeline, the playbooks and the
 * position manager, bar by bar:
 *
 * 1. advance open positions on bar i
 * 2. derive the portfolio context (exposure, rolling drawdown, halt)
 * 3. compute features for bar i
 * 4. let each playbook propose a candidate; fill accepted ones at bar i+1's open
 *
 * After the last bar every open position is closed at its close.
 */

import {
  SimulatorConfigSchema,
  barTime,
  createSilentLogger,
  type Bar,
  type Direction,
  type Logger,
  type PlaybookName,
  type PortfolioContext,
  type PositionLedger,
  type PositionRecord,
  type SimulatorConfig,
  type SimulatorConfigInput,
} from '@candlelab/shared';
import { FeaturePipeline } from '../features/index.js';
import { RollingWindow } from '../indicators/index.js';
import { InMemoryPositionLedger } from '../ledger/index.js';
import { createPlaybook, type Playbook } from '../playbooks/index.js';
import { PositionManager } from '../simulator/index.js';
import { calculateMetrics, type BacktestMetrics } from './metrics.js';

export type SkipReason = 'max_positions' | 'max_exposure' | 'zero_size';

export interface CandidateRecord {
  candidateId: string;
  /** Signal bar */
  barIndex: number;
  timestamp: number;
  playbook: PlaybookName;
  direction: Direction;
  entryPrice: number;
  atrAtEntry: number;
  qualityFlags: Record<string, boolean>;
  notes: string;
  sizeUsd: number;
  taken: boolean;
  positionId: string | null;
  skipReason: SkipReason | null;
}

export interface BacktestResult {
  runId: string;
  symbol: string;
  barsProcessed: number;
  /** Number of bars that produced a feature vector */
  featureVectors: number;
  candidates: CandidateRecord[];
  positions: PositionRecord[];
  metrics: BacktestMetrics;
}

export interface BacktestRunnerOptions {
  config: SimulatorConfigInput;
  /** Defaults to the playbooks named in the config */
  playbooks?: Playbook[];
  /** Shared across runs when given; otherwise each run gets its own */
  ledger?: PositionLedger;
  logger?: Logger;
}

/**
 * Throw unless timestamps strictly increase
 */
export function assertChronological(bars: readonly Bar[]): void {
  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1];
    const curr = bars[i];
    if (prev && curr && curr.timestamp <= prev.timestamp) {
      throw new Error(
        `Bar timestamps must strictly increase: bar ${i} (${curr.timestamp}) <= bar ${i - 1} (${prev.timestamp})`
      );
    }
  }
}

export class BacktestRunner {
  readonly config: SimulatorConfig;
  private readonly playbooks: Playbook[];
  private readonly ledger: PositionLedger | undefined;
  private readonly logger: Logger;

  constructor(options: BacktestRunnerOptions) {
    this.config = SimulatorConfigSchema.parse(options.config);
    this.playbooks = options.playbooks ?? this.config.playbooks.map((name) => createPlaybook(name));
    this.ledger = options.ledger;
    this.logger = (options.logger ?? createSilentLogger('backtest')).child({
      runId: this.config.runId,
      symbol: this.config.symbol,
    });
  }

  run(bars: readonly Bar[]): BacktestResult {
    assertChronological(bars);

    const { config } = this;
    const ledger = this.ledger ?? new InMemoryPositionLedger();
    const pipeline = new FeaturePipeline({
      symbol: config.symbol,
      warmupBars: config.warmupBars,
      spreadBps: config.spreadBps,
    });
    const manager = new PositionManager({
      ledger,
      runId: config.runId,
      feeMakerBps: config.fees.makerBps,
      feeTakerBps: config.fees.takerBps,
      spreadBpsMap: config.spreadBpsMap,
      defaultSpreadBps: config.defaultSpreadBps,
      logger: this.logger,
    });

    const openedIds: string[] = [];
    manager.on('position:opened', (record) => {
      openedIds.push(record.positionId);
    });

    let equity = config.startingEquityUsd;
    manager.on('position:closed', (close) => {
      equity += close.pnlUsd;
    });

    const equityWindow = new RollingWindow(config.ddWindowBars);
    const candidates: CandidateRecord[] = [];
    let featureVectors = 0;
    let halted = false;

    this.logger.info('Backtest started', {
      bars: bars.length,
      warmupBars: config.warmupBars,
      playbooks: this.playbooks.map((p) => p.name),
    });

    bars.forEach((bar, i) => {
      manager.updatePositions(bar.high, bar.low, bar.close, i, barTime(bar));

      equityWindow.update(equity);
      const peak = equityWindow.max();
      const dd24hBps = peak > 0 ? ((peak - equity) / peak) * 10000 : 0;
      if (!halted && dd24hBps > config.haltDrawdownBps) {
        this.logger.warn('Drawdown halt engaged', { barIndex: i, dd24hBps, equity });
      }
      halted = dd24hBps > config.haltDrawdownBps;

      const context: PortfolioContext = {
        openPositions: manager.getOpenPositionCount(),
        exposureFrac: equity > 0 ? manager.getOpenExposureUsd() / equity : 0,
        dd24hBps,
        haltFlag: halted ? 1 : 0,
      };

      const features = pipeline.onBar(bar, context);
      if (!features) return;
      featureVectors += 1;

      const nextBar = bars[i + 1];
      if (!nextBar || halted) return;

      for (const playbook of this.playbooks) {
        const candidate = playbook.evaluate(features);
        if (!candidate) continue;

        const sizeUsd = manager.calculatePositionSize(
          equity,
          config.riskPerTradePct,
          candidate.entryPrice,
          candidate.exitSpec.stopLossPrice
        );
        const record: CandidateRecord = {
          candidateId: `${config.runId}_${candidate.playbook}_${i}`,
          barIndex: i,
          timestamp: bar.timestamp,
          playbook: candidate.playbook,
          direction: candidate.direction,
          entryPrice: candidate.entryPrice,
          atrAtEntry: candidate.atrAtEntry,
          qualityFlags: candidate.qualityFlags,
          notes: candidate.notes,
          sizeUsd,
          taken: false,
          positionId: null,
          skipReason: null,
        };
        candidates.push(record);

        if (manager.getOpenPositionCount() >= config.maxPositions) {
          record.skipReason = 'max_positions';
          continue;
        }
        if (sizeUsd <= 0) {
          record.skipReason = 'zero_size';
          continue;
        }
        if ((manager.getOpenExposureUsd() + sizeUsd) / equity > config.maxExposureFrac) {
          record.skipReason = 'max_exposure';
          continue;
        }

        record.positionId = manager.openPosition({
          candidateId: record.candidateId,
          symbol: config.symbol,
          direction: candidate.direction,
          signalPrice: candidate.entryPrice,
          nextOpen: nextBar.open,
          barIndex: i + 1,
          timestamp: barTime(nextBar),
          sizeUsd,
          atrAtEntry: candidate.atrAtEntry,
          exitSpec: candidate.exitSpec,
        });
        record.taken = true;
      }
    });

    const lastIndex = bars.length - 1;
    const lastBar = bars[lastIndex];
    if (lastBar) {
      manager.closeAllPositions(lastBar.close, lastIndex, barTime(lastBar));
    }

    const positions: PositionRecord[] = [];
    for (const positionId of openedIds) {
      const position = ledger.getPosition(positionId);
      if (position) positions.push(position);
    }
    const metrics = calculateMetrics(positions, config.startingEquityUsd);

    this.logger.info('Backtest finished', {
      barsProcessed: bars.length,
      candidates: candidates.length,
      trades: metrics.totalTrades,
      totalReturn: metrics.totalReturn,
      finalEquity: metrics.finalEquity,
    });

    return {
      runId: config.runId,
      symbol: config.symbol,
      barsProcessed: bars.length,
      featureVectors,
      candidates,
      positions,
      metrics,
    };
  }
}
