/**
 * Base Playbook
 *
 * A playbook reads one feature vector and either proposes a candidate
 * trade or returns null. Playbooks are stateless: the same vector always
 * yields the same answer.
 */

import type { Direction, ExitSpec, FeatureVector, PlaybookName } from '@candlelab/shared';

/**
 * Proposed trade, before sizing and fill
 */
export interface Candidate {
  playbook: PlaybookName;
  direction: Direction;
  /** Close of the signal bar */
  entryPrice: number;
  atrAtEntry: number;
  exitSpec: ExitSpec;
  /** Playbook-specific setup quality indicators */
  qualityFlags: Record<string, boolean>;
  notes: string;
}

export interface Playbook {
  readonly name: PlaybookName;
  evaluate(features: FeatureVector): Candidate | null;
  getExitSpec(entryPrice: number, atr: number, direction: Direction): ExitSpec;
}

/**
 * ATR-scaled exit parameters shared by every playbook
 */
export interface AtrExitParams {
  /** Stop distance in ATR */
  stopLossAtr: number;
  /** Target distance in ATR */
  takeProfitAtr: number;
  timeStopBars: number;
  /** Trailing activates this many R (stop distances) in profit */
  trailingActivationR: number;
  /** Trailing distance in ATR */
  trailingDistanceAtr: number;
}

/**
 * Base Playbook Class
 *
 * Holds merged parameters and derives the exit spec from them.
 *
 * @example
 * ```typescript
 * class MyPlaybook extends BasePlaybook<MyParams> {
 *   readonly name = 'breakout';
 *
 *   evaluate(features: FeatureVector): Candidate | null {
 *     if (features.close <= features.ema200) return null;
 *     return this.createCandidate(features, {}, 'above ema200');
 *   }
 * }
 * ```
 */
export abstract class BasePlaybook<TParams extends AtrExitParams> implements Playbook {
  abstract readonly name: PlaybookName;
  protected readonly params: Readonly<TParams>;

  constructor(defaults: TParams, overrides: Partial<TParams> = {}) {
    this.params = Object.freeze({ ...defaults, ...overrides });
  }

  abstract evaluate(features: FeatureVector): Candidate | null;

  getParams(): Readonly<TParams> {
    return this.params;
  }

  getExitSpec(entryPrice: number, atr: number, direction: Direction): ExitSpec {
    const { stopLossAtr, takeProfitAtr, timeStopBars, trailingActivationR, trailingDistanceAtr } = this.params;
    const stopDistance = stopLossAtr * atr;
    const sign = direction === 'long' ? 1 : -1;

    return {
      stopLossPrice: entryPrice - sign * stopDistance,
      takeProfitPrice: entryPrice + sign * takeProfitAtr * atr,
      timeStopBars,
      trailing: {
        activationPrice: entryPrice + sign * trailingActivationR * stopDistance,
        distanceAtr: trailingDistanceAtr,
      },
    };
  }

  /**
   * Long candidate at the signal close
   */
  protected createCandidate(
    features: FeatureVector,
    qualityFlags: Record<string, boolean>,
    notes: string
  ): Candidate {
    return {
      playbook: this.name,
      direction: 'long',
      entryPrice: features.close,
      atrAtEntry: features.atr,
      exitSpec: this.getExitSpec(features.close, features.atr, 'long'),
      qualityFlags,
      notes,
    };
  }
}
