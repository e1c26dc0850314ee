// RuleBasedScorer — weighted composite over the signal table
//
// Embedding example:
//   import { RuleBasedScorer } from '@cadence-auth/core';
//   const scorer = new RuleBasedScorer();
//   const result = scorer.score(sample, baseline);
//   // result.total ∈ [0,100], result.sub_scores.typing_speed ≤ 15, ...
//
// Stateless: nothing is cached between calls, so one instance can serve any
// number of concurrent requests.

import { SCORING } from '../constants.js';
import type {
  BaselineProfile,
  BehaviorSample,
  HashSignal,
  MissingHashPolicy,
  ScoreResult,
  ScoringConfig,
  SignalName,
  SignalSpec,
  TrustScorer,
} from '../types/index.js';
import {
  aggregate,
  isHashPresent,
  scoreBinaryMatch,
  scoreCircularProximity,
  scoreDeviation,
  scoreHardCap,
} from './scoring.js';
import { DEFAULT_SIGNALS, totalWeight } from './signals.js';
import { validateBaseline, validateSample, validateSignals } from './validate.js';

export class RuleBasedScorer implements TrustScorer {
  readonly name = 'rule-based';
  private readonly signals: readonly SignalSpec[];
  private readonly missingHash: MissingHashPolicy;
  private readonly epsilon: number;

  constructor(config: ScoringConfig = {}) {
    this.signals = config.signals ?? DEFAULT_SIGNALS;
    this.missingHash = config.missingHash ?? 'zero';
    this.epsilon = config.epsilon ?? SCORING.EPSILON;
    validateSignals(this.signals);
  }

  /** The signal table this scorer applies, in reporting order. */
  table(): readonly SignalSpec[] {
    return this.signals;
  }

  score(sample: BehaviorSample, baseline: BaselineProfile): ScoreResult {
    validateSample(sample, this.signals);
    validateBaseline(baseline, this.signals);

    const subScores: Partial<Record<SignalName, number>> = {};
    const matchedFlags: Partial<Record<HashSignal, boolean>> = {};
    const excluded: SignalName[] = [];
    const points: number[] = [];
    let excludedWeight = 0;

    const award = (signal: SignalName, value: number): void => {
      subScores[signal] = value;
      points.push(value);
    };

    for (const spec of this.signals) {
      switch (spec.kind) {
        case 'deviation': {
          // validateBaseline guarantees presence for deviation signals
          const reference = baseline[spec.signal] ?? 0;
          award(spec.signal, scoreDeviation(
            sample[spec.signal],
            reference,
            spec.weight,
            spec.maxDeviation,
            this.epsilon,
          ));
          break;
        }
        case 'hard_cap':
          award(spec.signal, scoreHardCap(sample[spec.signal], spec.weight, spec.cap));
          break;
        case 'binary_match': {
          const stored = baseline[spec.signal];
          if (!isHashPresent(stored) && this.missingHash === 'exclude') {
            excluded.push(spec.signal);
            excludedWeight += spec.weight;
            award(spec.signal, 0);
            matchedFlags[spec.signal] = false;
            break;
          }
          const { points: awarded, matched } = scoreBinaryMatch(sample[spec.signal], stored, spec.weight);
          award(spec.signal, awarded);
          matchedFlags[spec.signal] = matched;
          break;
        }
        case 'circular_proximity':
          award(spec.signal, scoreCircularProximity(
            sample[spec.signal],
            baseline[spec.signal],
            spec.weight,
            spec.period,
          ));
          break;
      }
    }

    const budget = totalWeight(this.signals);
    const included = budget - excludedWeight;
    // Everything excluded leaves nothing to trust.
    const scale = excludedWeight === 0 ? 1 : included > 0 ? budget / included : 0;

    return Object.freeze({
      total: aggregate(points, scale),
      sub_scores: Object.freeze(subScores),
      matched_flags: Object.freeze(matchedFlags),
      excluded: Object.freeze(excluded),
    });
  }
}

/**
 * Functional form of the engine: score one sample against one baseline.
 * Throws InvalidInputError on structurally invalid input.
 */
export function score(
  sample: BehaviorSample,
  baseline: BaselineProfile,
  signals: readonly SignalSpec[] = DEFAULT_SIGNALS,
  options: Omit<ScoringConfig, 'signals'> = {},
): ScoreResult {
  return new RuleBasedScorer({ ...options, signals }).score(sample, baseline);
}
