import { HOURS } from '../constants.js';
import { InvalidInputError } from '../errors.js';
import type {
  BaselineProfile,
  BehaviorSample,
  ContinuousSignal,
  HashSignal,
  SignalName,
  SignalSpec,
} from '../types/index.js';

// Structural checks run before any scoring. Behavior that is merely extreme
// (huge deviation, zero baseline, 10 s latency) is scored, never rejected here.

function isNonNegativeFinite(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function fail(issues: string[], what: string): void {
  if (issues.length === 0) return;
  throw new InvalidInputError(`Invalid ${what}: ${issues.join('; ')}`, issues);
}

// ─── Signal table ─────────────────────────────────────────────────────────────

export function validateSignals(signals: readonly SignalSpec[]): void {
  const issues: string[] = [];
  const seen = new Set<SignalName>();

  for (const spec of signals) {
    if (seen.has(spec.signal)) issues.push(`${spec.signal}: listed more than once`);
    seen.add(spec.signal);

    if (!isNonNegativeFinite(spec.weight)) {
      issues.push(`${spec.signal}: weight must be a finite number ≥ 0`);
    }
    switch (spec.kind) {
      case 'deviation':
        if (!Number.isFinite(spec.maxDeviation)) {
          issues.push(`${spec.signal}: maxDeviation must be finite`);
        }
        break;
      case 'hard_cap':
        if (!isNonNegativeFinite(spec.cap)) {
          issues.push(`${spec.signal}: cap must be a finite number ≥ 0`);
        }
        break;
      case 'circular_proximity':
        if (!Number.isFinite(spec.period) || spec.period <= 0) {
          issues.push(`${spec.signal}: period must be a finite number > 0`);
        }
        break;
      case 'binary_match':
        break;
    }
  }

  fail(issues, 'signal table');
}

// ─── Sample ───────────────────────────────────────────────────────────────────

function checkSampleNumber(sample: BehaviorSample, signal: ContinuousSignal, issues: string[]): void {
  const value: unknown = sample[signal];
  if (!isNonNegativeFinite(value)) {
    issues.push(`sample.${signal} must be a finite number ≥ 0`);
  } else if (signal === 'scroll_depth' && value > 1) {
    issues.push('sample.scroll_depth must be within [0, 1]');
  }
}

function checkSampleHash(sample: BehaviorSample, signal: HashSignal, issues: string[]): void {
  const value: unknown = sample[signal];
  if (typeof value !== 'string') issues.push(`sample.${signal} must be a string`);
}

export function validateSample(sample: BehaviorSample, signals: readonly SignalSpec[]): void {
  const issues: string[] = [];

  for (const spec of signals) {
    switch (spec.kind) {
      case 'deviation':
      case 'hard_cap':
        checkSampleNumber(sample, spec.signal, issues);
        break;
      case 'binary_match':
        checkSampleHash(sample, spec.signal, issues);
        break;
      case 'circular_proximity': {
        const hour: unknown = sample[spec.signal];
        if (typeof hour !== 'number' || !Number.isInteger(hour) || hour < 0 || hour > HOURS.MAX_HOUR) {
          issues.push(`sample.${spec.signal} must be an integer hour within [0, ${HOURS.MAX_HOUR}]`);
        }
        break;
      }
    }
  }

  fail(issues, 'behavior sample');
}

// ─── Baseline ─────────────────────────────────────────────────────────────────

export function validateBaseline(baseline: BaselineProfile, signals: readonly SignalSpec[]): void {
  const issues: string[] = [];

  for (const spec of signals) {
    switch (spec.kind) {
      case 'deviation': {
        const value: unknown = baseline[spec.signal];
        if (value === undefined || value === null) {
          issues.push(`baseline.${spec.signal} is required`);
        } else if (!isNonNegativeFinite(value)) {
          issues.push(`baseline.${spec.signal} must be a finite number ≥ 0`);
        }
        break;
      }
      case 'hard_cap':
        // Compared against the cap only; the baseline value is not consulted.
        break;
      case 'binary_match': {
        const value: unknown = baseline[spec.signal];
        if (value !== undefined && value !== null && typeof value !== 'string') {
          issues.push(`baseline.${spec.signal} must be a string when present`);
        }
        break;
      }
      case 'circular_proximity': {
        const value: unknown = baseline[spec.signal];
        if (value === undefined || value === null) {
          issues.push(`baseline.${spec.signal} is required`);
        } else if (!isNonNegativeFinite(value) || value >= spec.period) {
          issues.push(`baseline.${spec.signal} must be within [0, ${spec.period})`);
        }
        break;
      }
    }
  }

  fail(issues, 'baseline profile');
}
