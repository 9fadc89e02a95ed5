import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const PlaybookNameSchema = z.enum(['breakout', 'pullback']);

export const DEFAULT_SPREAD_BPS_MAP: Readonly<Record<string, number>> = Object.freeze({
  'BTC-USD': 1.5,
  'ETH-USD': 2.0,
  'SOL-USD': 3.0,
});

export const FeeConfigSchema = z.object({
  /** Exit (limit) fee in basis points of notional */
  makerBps: z.number().nonnegative().default(6.0),
  /** Entry (market) fee in basis points of notional */
  takerBps: z.number().nonnegative().default(12.5),
});

/**
 * Zod schema for one backtest run on one symbol
 */
export const SimulatorConfigSchema = z.object({
  runId: z.string().min(1),
  symbol: z.string().min(1),

  // Feature pipeline
  warmupBars: z.number().int().positive().default(400),
  spreadBps: z.number().nonnegative().default(1.5),

  // Fill simulation
  fees: FeeConfigSchema.default({}),
  spreadBpsMap: z.record(z.string(), z.number().nonnegative()).default({ ...DEFAULT_SPREAD_BPS_MAP }),
  defaultSpreadBps: z.number().nonnegative().default(2.0),

  // Portfolio / risk
  startingEquityUsd: z.number().positive().default(10_000),
  riskPerTradePct: z.number().positive().max(1).default(0.01),
  maxPositions: z.number().int().positive().default(3),
  maxExposureFrac: z.number().positive().default(1.0),
  ddWindowBars: z.number().int().positive().default(96),
  haltDrawdownBps: z.number().positive().default(500),

  playbooks: z.array(PlaybookNameSchema).default(['breakout', 'pullback']),
  logLevel: LogLevelSchema.default('info'),
});

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;
export type SimulatorConfigInput = z.input<typeof SimulatorConfigSchema>;
export type PlaybookName = z.infer<typeof PlaybookNameSchema>;
