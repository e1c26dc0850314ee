import { DEVIATION, HOURS, LATENCY, SCORING } from '../constants.js';
// Per-signal scoring primitives — pure numeric functions, no validation.
// Callers (RuleBasedScorer) are responsible for rejecting malformed input first.

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Clamp awarded points to [0, weight]. A negative weight awards nothing. */
function clampPoints(points: number, weight: number): number {
  return clamp(points, 0, Math.max(weight, 0));
}

// ─── Deviation ────────────────────────────────────────────────────────────────

/**
 * Relative deviation |current − baseline| / max(baseline, ε).
 * The ε floor keeps a zero baseline from producing NaN or Infinity.
 */
export function relativeDeviation(
  current: number,
  baseline: number,
  epsilon: number = SCORING.EPSILON,
): number {
  return Math.abs(current - baseline) / Math.max(baseline, epsilon);
}

/**
 * Partial credit for a continuous signal: weight · max(0, 1 − d / dMax).
 * A non-positive dMax tolerates no deviation at all.
 */
export function scoreDeviation(
  current: number,
  baseline: number,
  weight: number,
  maxDeviation: number = DEVIATION.MAX_DEVIATION,
  epsilon: number = SCORING.EPSILON,
): number {
  const d = relativeDeviation(current, baseline, epsilon);
  if (maxDeviation <= 0) return d === 0 ? clampPoints(weight, weight) : 0;
  return clampPoints(weight * Math.max(0, 1 - d / maxDeviation), weight);
}

// ─── Hard cap ─────────────────────────────────────────────────────────────────

/**
 * Full credit at or below the cap, then linear decay reaching zero at 2× cap.
 *   300 → 10, 450 → 5, 600 → 0 (weight 10, cap 300)
 */
export function scoreHardCap(
  current: number,
  weight: number,
  cap: number = LATENCY.CAP_MS,
): number {
  if (current <= cap) return clampPoints(weight, weight);
  return clampPoints(weight * Math.max(0, 1 - (current - cap) / cap), weight);
}

// ─── Binary match ─────────────────────────────────────────────────────────────

/** A baseline hash that is null, undefined or empty has never been recorded. */
export function isHashPresent(hash: string | null | undefined): hash is string {
  return typeof hash === 'string' && hash.length > 0;
}

/** Exact digest equality. An unrecorded baseline hash never matches. */
export function scoreBinaryMatch(
  current: string,
  baseline: string | null | undefined,
  weight: number,
): { points: number; matched: boolean } {
  const matched = isHashPresent(baseline) && current === baseline;
  return { points: matched ? clampPoints(weight, weight) : 0, matched };
}

// ─── Circular proximity ───────────────────────────────────────────────────────

/**
 * Shorter way round a cycle: 23 → 1 is 2 hours, not 22. Range [0, period/2].
 */
export function circularDistance(a: number, b: number, period: number = HOURS.PERIOD): number {
  const diff = Math.abs(a - b) % period;
  return Math.min(diff, period - diff);
}

/** weight · (1 − dist / (period/2)) — full credit on the hour, zero at the antipode. */
export function scoreCircularProximity(
  current: number,
  baseline: number,
  weight: number,
  period: number = HOURS.PERIOD,
): number {
  const dist = circularDistance(current, baseline, period);
  return clampPoints(weight * (1 - dist / (period / 2)), weight);
}

// ─── Aggregation ──────────────────────────────────────────────────────────────

/**
 * Round and clamp a point sum into the [0,100] trust score.
 * `scale` rescales the sum first (used when signals are excluded from the budget).
 */
export function aggregate(points: readonly number[], scale = 1): number {
  const sum = points.reduce((acc, p) => acc + p, 0);
  return clamp(Math.round(sum * scale), SCORING.MIN_TOTAL, SCORING.MAX_TOTAL);
}
