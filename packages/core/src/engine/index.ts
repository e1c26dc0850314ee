export { RuleBasedScorer, score } from './trust-engine.js';
export { DEFAULT_SIGNALS, totalWeight } from './signals.js';
export { decide, mapRiskLevel, rejectionReasons } from './decision.js';
export { validateBaseline, validateSample, validateSignals } from './validate.js';
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
} from './scoring.js';
