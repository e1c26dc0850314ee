/**
 * Scoring engine constants. Defaults for the signal table, the decision layer
 * and the wire format are all read from here.
 */

// ── Composite score ───────────────────────────────────────────────────────────
export const SCORING = {
  /** Sum of the default signal weights */
  WEIGHT_BUDGET:  100,
  MIN_TOTAL:      0,
  MAX_TOTAL:      100,
  /** Floor for the deviation denominator when a baseline value is 0 */
  EPSILON:        1e-6,
} as const;

// ── Deviation signals ─────────────────────────────────────────────────────────
export const DEVIATION = {
  /** Relative deviation at which a signal contributes nothing (1.0 = 100%) */
  MAX_DEVIATION:  1.0,
} as const;

// ── Network latency ───────────────────────────────────────────────────────────
export const LATENCY = {
  /** Full credit at or below this; linear decay to zero at 2× cap */
  CAP_MS:         300,
} as const;

// ── Time of day ───────────────────────────────────────────────────────────────
export const HOURS = {
  PERIOD:         24,
  MAX_HOUR:       23,
} as const;

// ── Accept / deny ─────────────────────────────────────────────────────────────
export const DECISION = {
  /** total ≥ THRESHOLD → accept */
  THRESHOLD:          60,
  /** A signal is reported as a rejection reason when it lost more than this share of its weight */
  REASON_LOSS_RATIO:  0.5,
} as const;

// ── Risk bands (relative to the threshold) ────────────────────────────────────
export const RISK = {
  /** Denials within this many points of the threshold are "medium" rather than "high" */
  MEDIUM_BAND:    15,
} as const;

// ── Wire format ───────────────────────────────────────────────────────────────
export const HASH = {
  /** SHA-256 hex digest length produced by the collector */
  HEX_LENGTH:     64,
} as const;
