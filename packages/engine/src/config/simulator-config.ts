/**
 * Simulator configuration from environment variables
 *
 * Every CANDLELAB_* variable is optional; unset values fall back to the
 * SimulatorConfigSchema defaults. Explicit overrides win over the env.
 */

import { SimulatorConfigSchema, type SimulatorConfig, type SimulatorConfigInput } from '@candlelab/shared';

type Env = Readonly<Record<string, string | undefined>>;

/** Numeric settings and the variable each is read from */
const NUMERIC_ENV_VARS = {
  warmupBars: 'CANDLELAB_WARMUP_BARS',
  spreadBps: 'CANDLELAB_SPREAD_BPS',
  defaultSpreadBps: 'CANDLELAB_DEFAULT_SPREAD_BPS',
  startingEquityUsd: 'CANDLELAB_STARTING_EQUITY_USD',
  riskPerTradePct: 'CANDLELAB_RISK_PER_TRADE_PCT',
  maxPositions: 'CANDLELAB_MAX_POSITIONS',
  maxExposureFrac: 'CANDLELAB_MAX_EXPOSURE_FRAC',
  ddWindowBars: 'CANDLELAB_DD_WINDOW_BARS',
  haltDrawdownBps: 'CANDLELAB_HALT_DRAWDOWN_BPS',
} as const;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Blank means unset; anything else must parse as a number (NaN fails validation)
 */
function readNumber(env: Env, name: string): number | undefined {
  const value = readString(env, name);
  return value === undefined ? undefined : Number(value);
}

function readList(env: Env, name: string): string[] | undefined {
  const value = readString(env, name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build and validate a run configuration. Throws a ZodError on invalid values.
 */
export function loadSimulatorConfig(
  env: Env = process.env,
  overrides: Partial<SimulatorConfigInput> = {}
): SimulatorConfig {
  const input: Record<string, unknown> = {};

  const runId = readString(env, 'CANDLELAB_RUN_ID');
  if (runId !== undefined) input.runId = runId;
  const symbol = readString(env, 'CANDLELAB_SYMBOL');
  if (symbol !== undefined) input.symbol = symbol;

  for (const [key, name] of Object.entries(NUMERIC_ENV_VARS)) {
    const value = readNumber(env, name);
    if (value !== undefined) input[key] = value;
  }

  const makerBps = readNumber(env, 'CANDLELAB_FEE_MAKER_BPS');
  const takerBps = readNumber(env, 'CANDLELAB_FEE_TAKER_BPS');
  if (makerBps !== undefined || takerBps !== undefined) {
    input.fees = {
      ...(makerBps !== undefined ? { makerBps } : {}),
      ...(takerBps !== undefined ? { takerBps } : {}),
    };
  }

  const playbooks = readList(env, 'CANDLELAB_PLAYBOOKS');
  if (playbooks !== undefined) input.playbooks = playbooks;

  const logLevel = readString(env, 'LOG_LEVEL');
  if (logLevel !== undefined) input.logLevel = logLevel;

  return SimulatorConfigSchema.parse({ ...input, ...overrides });
}
