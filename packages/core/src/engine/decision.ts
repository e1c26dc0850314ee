import { DECISION, RISK, SCORING } from '../constants.js';
import { InvalidInputError } from '../errors.js';
import type {
  LoginDecision,
  RejectionReason,
  RiskLevel,
  ScoreResult,
  SignalSpec,
} from '../types/index.js';
import { DEFAULT_SIGNALS } from './signals.js';

// Accept/deny layer on top of a ScoreResult. Kept apart from the scorer so the
// threshold can vary per deployment without touching scoring.

/**
 * Map a total to a risk level. Accepted logins are low risk; denials close
 * to the threshold are medium, the rest high.
 */
export function mapRiskLevel(total: number, threshold: number): RiskLevel {
  if (total >= threshold)                    return 'low';
  if (total >= threshold - RISK.MEDIUM_BAND) return 'medium';
  return 'high';
}

/** Signals that lost more than REASON_LOSS_RATIO of their weight, in table order. */
export function rejectionReasons(
  result: ScoreResult,
  signals: readonly SignalSpec[] = DEFAULT_SIGNALS,
): RejectionReason[] {
  const reasons: RejectionReason[] = [];
  for (const spec of signals) {
    const awarded = result.sub_scores[spec.signal];
    if (awarded === undefined || result.excluded.includes(spec.signal)) continue;
    if (spec.weight - awarded > spec.weight * DECISION.REASON_LOSS_RATIO) {
      reasons.push({ signal: spec.signal, awarded, weight: spec.weight });
    }
  }
  return reasons;
}

/**
 * Compare a score against the threshold. The boundary is inclusive:
 * total === threshold is accepted.
 */
export function decide(
  result: ScoreResult,
  threshold: number = DECISION.THRESHOLD,
  signals: readonly SignalSpec[] = DEFAULT_SIGNALS,
): LoginDecision {
  if (!Number.isFinite(threshold) || threshold < SCORING.MIN_TOTAL || threshold > SCORING.MAX_TOTAL) {
    throw new InvalidInputError(
      `Invalid threshold: must be within [${SCORING.MIN_TOTAL}, ${SCORING.MAX_TOTAL}]`,
    );
  }

  const accepted = result.total >= threshold;
  return {
    decision: accepted ? 'accept' : 'deny',
    accepted,
    trust_score: result.total,
    threshold,
    risk_level: mapRiskLevel(result.total, threshold),
    rejection_reasons: rejectionReasons(result, signals),
  };
}
