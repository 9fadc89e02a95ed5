/**
 * @candlelab/engine
 *
 * Streaming indicators, the 80-feature pipeline, the position simulator
 * and a bar-by-bar backtest runner built on them.
 */

export * from './indicators/index.js';
export * from './features/index.js';
export * from './simulator/index.js';
export * from './ledger/index.js';
export * from './playbooks/index.js';
export * from './backtest/index.js';
export * from './config/index.js';
