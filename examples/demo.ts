#!/usr/bin/env node
/**
 * Behavioral login — end-to-end scoring demo
 *
 * Run: npx tsx examples/demo.ts
 */

import { RuleBasedScorer, decide } from '@cadence-auth/core';
import type { BaselineProfile, BehaviorSample, RiskLevel } from '@cadence-auth/core';

const LAPTOP = '3f'.repeat(32);
const HOME   = '7a'.repeat(32);

const baseline: BaselineProfile = {
  typing_speed:    4.0,
  key_hold_time:   110,
  mouse_velocity:  400,
  click_interval:  600,
  scroll_depth:    0.6,
  network_latency: 40,
  device_hash:     LAPTOP,
  location_hash:   HOME,
  time_of_day:     9,
};

const usual: BehaviorSample = {
  typing_speed:    4.2,
  key_hold_time:   105,
  mouse_velocity:  400,
  click_interval:  600,
  scroll_depth:    0.6,
  network_latency: 40,
  device_hash:     LAPTOP,
  location_hash:   HOME,
  time_of_day:     9,
};

const attempts: Array<{ label: string; sample: BehaviorSample }> = [
  {
    label: 'usual morning login',
    sample: usual,
  },
  {
    label: 'same user, hotel wifi',
    sample: { ...usual, typing_speed: 3.8, network_latency: 280, location_hash: 'e1'.repeat(32), time_of_day: 22 },
  },
  {
    label: 'new phone, late night',
    sample: { ...usual, mouse_velocity: 150, click_interval: 900, device_hash: 'c0'.repeat(32), time_of_day: 2 },
  },
  {
    label: 'scripted attacker',
    sample: {
      typing_speed: 12, key_hold_time: 20, mouse_velocity: 2000, click_interval: 50, scroll_depth: 0,
      network_latency: 650, device_hash: '00'.repeat(32), location_hash: '11'.repeat(32), time_of_day: 3,
    },
  },
];

const RISK_COLOR: Record<RiskLevel, string> = {
  low:    '\x1b[32m', // green
  medium: '\x1b[33m', // yellow
  high:   '\x1b[31m', // red
};
const RESET = '\x1b[0m';

const scorer = new RuleBasedScorer();

console.log('\n  \x1b[1mBehavioral Login — Trust Scoring Demo\x1b[0m\n');
console.log('═'.repeat(60));

for (const { label, sample } of attempts) {
  const result = scorer.score(sample, baseline);
  const outcome = decide(result, 60, scorer.table());

  const filled = Math.round(result.total / 5);
  const scoreBar = '█'.repeat(filled) + '░'.repeat(20 - filled);
  const color = RISK_COLOR[outcome.risk_level];

  console.log(`\n  \x1b[1m${label}\x1b[0m`);
  console.log(`  Score  [${color}${scoreBar}${RESET}] ${result.total}/100`);
  console.log(`  Risk   ${color}${outcome.risk_level.toUpperCase()}${RESET} → ${outcome.decision.toUpperCase()}`);
  if (outcome.rejection_reasons.length > 0) {
    console.log(`  Weak   ${outcome.rejection_reasons.map((r) => r.signal).join(', ')}`);
  }
}

console.log('\n' + '═'.repeat(60) + '\n');
