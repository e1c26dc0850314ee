// Markdown rendering for the MCP tools. Pure functions so they can be tested
// without a transport.

import type { LoginDecision, RiskLevel, ScoreResult, SignalSpec } from '@cadence-auth/core';

const BAR_WIDTH = 20;

function riskEmoji(risk: RiskLevel): string {
  switch (risk) {
    case 'low':    return '🟢';
    case 'medium': return '🟠';
    case 'high':   return '🔴';
  }
}

/** 0–100 score as a fixed-width bar: 50 → ██████████░░░░░░░░░░ */
export function scoreBar(total: number): string {
  const filled = Math.round((total / 100) * BAR_WIDTH);
  return '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);
}

function formatPoints(points: number): string {
  return Number.isInteger(points) ? String(points) : points.toFixed(2);
}

export function formatScoreReport(
  result: ScoreResult,
  outcome: LoginDecision,
  signals: readonly SignalSpec[],
): string {
  const lines: string[] = [
    '## Behavioral Trust Report',
    '',
    `**Score:** [${scoreBar(result.total)}] ${result.total}/100`,
    `**Decision:** ${outcome.accepted ? '✅ ACCEPT' : '🚫 DENY'} (threshold ${outcome.threshold})`,
    `**Risk Level:** ${riskEmoji(outcome.risk_level)} ${outcome.risk_level.toUpperCase()}`,
    '',
    '### Signals',
    '| Signal | Kind | Points | Weight |',
    '|---|---|---|---|',
  ];

  for (const spec of signals) {
    const awarded = result.sub_scores[spec.signal] ?? 0;
    const points = result.excluded.includes(spec.signal) ? 'excluded' : formatPoints(awarded);
    lines.push(`| ${spec.signal} | ${spec.kind} | ${points} | ${spec.weight} |`);
  }
  lines.push('');

  const device = result.matched_flags.device_hash;
  const location = result.matched_flags.location_hash;
  if (device !== undefined || location !== undefined) {
    lines.push('### Matches');
    if (device !== undefined)   lines.push(`- **device:** ${device ? 'known' : 'unrecognized'}`);
    if (location !== undefined) lines.push(`- **location:** ${location ? 'known' : 'unrecognized'}`);
    lines.push('');
  }

  if (outcome.rejection_reasons.length > 0) {
    lines.push('### ⚠️ Weak Signals');
    for (const r of outcome.rejection_reasons) {
      lines.push(`- **${r.signal}**: ${formatPoints(r.awarded)} of ${r.weight}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export function formatVerdict(outcome: LoginDecision): string {
  const lines = [
    outcome.accepted ? '**ACCEPT: YES** ✅' : '**ACCEPT: NO** ❌',
    '',
    `**Score:** ${outcome.trust_score}/100 (minimum required: ${outcome.threshold})`,
    `**Risk:** ${riskEmoji(outcome.risk_level)} ${outcome.risk_level}`,
  ];

  if (outcome.rejection_reasons.length > 0) {
    lines.push('', `Signals below half weight: ${outcome.rejection_reasons.map((r) => r.signal).join(', ')}.`);
  }
  return lines.join('\n');
}
