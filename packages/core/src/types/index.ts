// Core types — behavior samples, baselines, the signal table and score results

// ─── Signals ──────────────────────────────────────────────────────────────────

export type ContinuousSignal =
  | 'typing_speed'    // chars/sec
  | 'key_hold_time'   // ms
  | 'mouse_velocity'  // px/sec
  | 'click_interval'  // ms
  | 'scroll_depth'    // fraction [0,1]
  | 'network_latency'; // ms

export type HashSignal = 'device_hash' | 'location_hash';
export type HourSignal = 'time_of_day';
export type SignalName = ContinuousSignal | HashSignal | HourSignal;

export type SignalKind = 'deviation' | 'hard_cap' | 'binary_match' | 'circular_proximity';

// ─── Behavior sample (one login attempt) ──────────────────────────────────────

export interface BehaviorSample {
  typing_speed: number;
  key_hold_time: number;
  mouse_velocity: number;
  click_interval: number;
  scroll_depth: number;
  network_latency: number;
  device_hash: string;   // opaque hex digest, equality only
  location_hash: string; // opaque hex digest, equality only
  time_of_day: number;   // integer hour [0,23]
}

// ─── Baseline profile (stored central tendencies) ─────────────────────────────

export interface BaselineProfile {
  typing_speed: number;
  key_hold_time: number;
  mouse_velocity: number;
  click_interval: number;
  scroll_depth: number;
  network_latency?: number; // unused by the default hard-cap rule
  device_hash?: string | null;
  location_hash?: string | null;
  time_of_day: number;      // may be fractional (mean hour)
}

// ─── Signal table ─────────────────────────────────────────────────────────────

export interface DeviationSpec {
  signal: ContinuousSignal;
  kind: 'deviation';
  weight: number;
  /** Relative deviation beyond which the signal scores zero */
  maxDeviation: number;
}

export interface HardCapSpec {
  signal: ContinuousSignal;
  kind: 'hard_cap';
  weight: number;
  cap: number;
}

export interface BinaryMatchSpec {
  signal: HashSignal;
  kind: 'binary_match';
  weight: number;
}

export interface CircularProximitySpec {
  signal: HourSignal;
  kind: 'circular_proximity';
  weight: number;
  period: number;
}

export type SignalSpec = DeviationSpec | HardCapSpec | BinaryMatchSpec | CircularProximitySpec;

/**
 * What to do when the baseline has no stored hash for a binary-match signal.
 *  - zero:    award 0 points (a new device costs its full weight)
 *  - exclude: drop the signal and rescale the remaining weights to the full budget
 */
export type MissingHashPolicy = 'zero' | 'exclude';

export interface ScoringConfig {
  signals?: readonly SignalSpec[];
  missingHash?: MissingHashPolicy;
  epsilon?: number;
}

// ─── Results ──────────────────────────────────────────────────────────────────

export interface ScoreResult {
  readonly total: number; // integer [0,100]
  readonly sub_scores: Readonly<Partial<Record<SignalName, number>>>;
  readonly matched_flags: Readonly<Partial<Record<HashSignal, boolean>>>;
  readonly excluded: readonly SignalName[];
}

/** Strategy seam: rule-based today, any model honoring the same contract tomorrow. */
export interface TrustScorer {
  readonly name: string;
  score(sample: BehaviorSample, baseline: BaselineProfile): ScoreResult;
}

export type Decision = 'accept' | 'deny';
export type RiskLevel = 'low' | 'medium' | 'high';

export interface RejectionReason {
  signal: SignalName;
  awarded: number;
  weight: number;
}

export interface LoginDecision {
  decision: Decision;
  accepted: boolean;
  trust_score: number;
  threshold: number;
  risk_level: RiskLevel;
  rejection_reasons: RejectionReason[];
}
