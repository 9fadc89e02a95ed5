/**
 * Streaming indicator contract
 *
 * An indicator owns only the state needed to continue its recurrence.
 * `update` consumes one bar's inputs and returns the current value(s);
 * `get` returns the same value(s) without consuming anything.
 */
export interface Indicator<TInput extends unknown[], TOutput> {
  update(...input: TInput): TOutput;
  get(): TOutput;
}

export interface AdxValue {
  adx: number;
  diPlus: number;
  diMinus: number;
}

export interface MacdValue {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerValue {
  upper: number;
  mid: number;
  lower: number;
}

export interface DonchianValue {
  upper: number;
  lower: number;
}
