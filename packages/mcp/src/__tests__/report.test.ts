import { describe, it, expect } from 'vitest';
import { DEFAULT_SIGNALS, RuleBasedScorer, decide } from '@cadence-auth/core';
import type { BaselineProfile, BehaviorSample } from '@cadence-auth/core';
import { formatScoreReport, formatVerdict, scoreBar } from '../report.js';

const DEVICE   = 'a'.repeat(64);
const LOCATION = 'c'.repeat(64);
const OTHER    = 'f'.repeat(64);

const BASELINE: BaselineProfile = {
  typing_speed:    4.0,
  key_hold_time:   110,
  mouse_velocity:  400,
  click_interval:  600,
  scroll_depth:    0.6,
  network_latency: 40,
  device_hash:     DEVICE,
  location_hash:   LOCATION,
  time_of_day:     14,
};

const IDENTICAL: BehaviorSample = {
  typing_speed:    4.0,
  key_hold_time:   110,
  mouse_velocity:  400,
  click_interval:  600,
  scroll_depth:    0.6,
  network_latency: 40,
  device_hash:     DEVICE,
  location_hash:   LOCATION,
  time_of_day:     14,
};

const STRANGER: BehaviorSample = {
  ...IDENTICAL,
  typing_speed:    4.3,
  network_latency: 600,
  device_hash:     OTHER,
  location_hash:   OTHER,
  time_of_day:     2,
};

const scorer = new RuleBasedScorer();

describe('scoreBar', () => {
  it('fills proportionally to the score', () => {
    expect(scoreBar(0)).toBe('░'.repeat(20));
    expect(scoreBar(50)).toBe('█'.repeat(10) + '░'.repeat(10));
    expect(scoreBar(100)).toBe('█'.repeat(20));
  });
});

describe('formatScoreReport', () => {
  it('renders a full-trust login', () => {
    const result = scorer.score(IDENTICAL, BASELINE);
    const lines = formatScoreReport(result, decide(result), DEFAULT_SIGNALS).split('\n');

    expect(lines[0]).toBe('## Behavioral Trust Report');
    expect(lines).toContain(`**Score:** [${'█'.repeat(20)}] 100/100`);
    expect(lines).toContain('**Decision:** ✅ ACCEPT (threshold 60)');
    expect(lines).toContain('**Risk Level:** 🟢 LOW');
    expect(lines).toContain('| typing_speed | deviation | 15 | 15 |');
    expect(lines).toContain('| time_of_day | circular_proximity | 5 | 5 |');
    expect(lines).toContain('- **device:** known');
    expect(lines).not.toContain('### ⚠️ Weak Signals');
  });

  it('lists the weak signals of a denied login', () => {
    const result = scorer.score(STRANGER, BASELINE);
    const text = formatScoreReport(result, decide(result), DEFAULT_SIGNALS);

    expect(text).toContain('**Decision:** 🚫 DENY (threshold 60)');
    expect(text).toContain('- **location:** unrecognized');
    expect(text.endsWith('- **time_of_day**: 0 of 5')).toBe(true);
  });

  it('marks excluded signals', () => {
    const excluding = new RuleBasedScorer({ missingHash: 'exclude' });
    const result = excluding.score(IDENTICAL, { ...BASELINE, device_hash: null });
    const lines = formatScoreReport(result, decide(result), excluding.table()).split('\n');
    expect(lines).toContain('| device_hash | binary_match | excluded | 15 |');
  });
});

describe('formatVerdict', () => {
  it('says NO and names the signals below half weight', () => {
    const outcome = decide(scorer.score(STRANGER, BASELINE));
    expect(formatVerdict(outcome)).toBe([
      '**ACCEPT: NO** ❌',
      '',
      '**Score:** 59/100 (minimum required: 60)',
      '**Risk:** 🟠 medium',
      '',
      'Signals below half weight: network_latency, device_hash, location_hash, time_of_day.',
    ].join('\n'));
  });

  it('says YES without a reasons line', () => {
    const outcome = decide(scorer.score(IDENTICAL, BASELINE), 75);
    expect(formatVerdict(outcome)).toBe([
      '**ACCEPT: YES** ✅',
      '',
      '**Score:** 100/100 (minimum required: 75)',
      '**Risk:** 🟢 low',
    ].join('\n'));
  });
});
