// @cadence-auth/core — public API

// ── Engine ───────────────────────────────────────────────────────────────────
export { RuleBasedScorer, score, DEFAULT_SIGNALS, totalWeight } from './engine/index.js';
export { decide, mapRiskLevel, rejectionReasons } from './engine/index.js';
export { validateBaseline, validateSample, validateSignals } from './engine/index.js';
export {
  aggregate,
  circularDistance,
  clamp,
  isHashPresent,
  relativeDeviation,
  scoreBinaryMatch,
  scoreCircularProximity,
  scoreDeviation,
  scoreHardCap,
} from './engine/index.js';

// ── Wire schemas ─────────────────────────────────────────────────────────────
export {
  baselineProfileSchema,
  behaviorSampleSchema,
  parseBaselineProfile,
  parseBehaviorSample,
  parseSignalSpecs,
  signalSpecSchema,
  signalSpecsSchema,
} from './schemas.js';

// ── Errors + constants ───────────────────────────────────────────────────────
export { InvalidInputError } from './errors.js';
export { DECISION, DEVIATION, HASH, HOURS, LATENCY, RISK, SCORING } from './constants.js';

// ── Types ────────────────────────────────────────────────────────────────────
export type {
  BaselineProfile,
  BehaviorSample,
  BinaryMatchSpec,
  CircularProximitySpec,
  ContinuousSignal,
  Decision,
  DeviationSpec,
  HardCapSpec,
  HashSignal,
  HourSignal,
  LoginDecision,
  MissingHashPolicy,
  RejectionReason,
  RiskLevel,
  ScoreResult,
  ScoringConfig,
  SignalKind,
  SignalName,
  SignalSpec,
  TrustScorer,
} from './types/index.js';
