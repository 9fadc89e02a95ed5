#!/usr/bin/env npx tsx
/**
 * Run a backtest over one CSV file
 *
 * Usage:
 *   npm run backtest -- data/BTC-USD_15m.csv
 *
 * Columns and timestamp format are auto-detected. Run settings come from
 * the CANDLELAB_* variables in .env (see .env.example).
 */

import * as path from 'path';
import { createLogger, loadEnvFromRoot } from '@candlelab/shared';
import { BacktestRunner, quickLoadCSV } from '../backtest/index.js';
import { loadSimulatorConfig } from '../config/index.js';

// Load environment variables from project root
loadEnvFromRoot();

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

async function main(): Promise<void> {
  const csvPath = process.argv[2];
  if (!csvPath) {
    throw new Error('Usage: run-backtest <csv-file>');
  }

  const config = loadSimulatorConfig(process.env, {
    runId: process.env.CANDLELAB_RUN_ID || `backtest-${Date.now()}`,
    symbol: process.env.CANDLELAB_SYMBOL || path.basename(csvPath).split(/[_.]/)[0] || 'UNKNOWN',
  });

  const logger = createLogger({ service: 'backtest', level: config.logLevel });

  try {
    const bars = quickLoadCSV(csvPath, logger);
    logger.info('Loaded bars', { file: csvPath, bars: bars.length, symbol: config.symbol });

    const runner = new BacktestRunner({ config, logger });
    const result = runner.run(bars);
    const { metrics } = result;

    logger.info('Backtest summary', {
      runId: result.runId,
      symbol: result.symbol,
      barsProcessed: result.barsProcessed,
      featureVectors: result.featureVectors,
      candidates: result.candidates.length,
      taken: result.candidates.filter((c) => c.taken).length,
      trades: metrics.totalTrades,
      totalReturn: metrics.totalReturn,
      winRate: metrics.winRate,
      profitFactor: metrics.profitFactor,
      sharpeRatio: metrics.sharpeRatio,
      sortinoRatio: metrics.sortinoRatio,
      maxDrawdown: metrics.maxDrawdown,
      avgRMultiple: metrics.avgRMultiple,
      exitReasons: metrics.exitReasons,
    });

    console.log('═'.repeat(60));
    console.log(`  BACKTEST ${result.symbol} (${result.runId})`);
    console.log('═'.repeat(60));
    console.log(`  Bars:          ${result.barsProcessed}`);
    console.log(`  Trades:        ${metrics.totalTrades} (${metrics.winningTrades}W / ${metrics.losingTrades}L)`);
    console.log(`  Total return:  ${pct(metrics.totalReturn)}`);
    console.log(`  Final equity:  $${metrics.finalEquity.toFixed(2)}`);
    console.log(`  Win rate:      ${pct(metrics.winRate)}`);
    console.log(`  Profit factor: ${metrics.profitFactor.toFixed(2)}`);
    console.log(`  Sharpe:        ${metrics.sharpeRatio.toFixed(2)}`);
    console.log(`  Sortino:       ${metrics.sortinoRatio.toFixed(2)}`);
    console.log(`  Max drawdown:  ${pct(metrics.maxDrawdown)}`);
    console.log(`  Avg R:         ${metrics.avgRMultiple.toFixed(2)}`);
  } finally {
    await logger.close();
  }
}

main().catch((error: unknown) => {
  console.error('Backtest failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
