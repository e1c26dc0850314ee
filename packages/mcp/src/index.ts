#!/usr/bin/env node
// Behavioral trust MCP server
// Exposes the scoring engine as MCP tools for any MCP host over stdio.
//
// Tools:
//   behavior_score — full report: total, per-signal breakdown, device/location matches
//   should_accept  — binary accept/deny check with the weak signals named

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import {
  DECISION,
  RuleBasedScorer,
  baselineProfileSchema,
  behaviorSampleSchema,
  decide,
} from '@cadence-auth/core';
import { formatScoreReport, formatVerdict } from './report.js';

// ── Engine ────────────────────────────────────────────────────────────────────

const scorers = {
  zero:    new RuleBasedScorer({ missingHash: 'zero' }),
  exclude: new RuleBasedScorer({ missingHash: 'exclude' }),
};

// ── Server ────────────────────────────────────────────────────────────────────

const server = new McpServer(
  { name: 'cadence-auth', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

const behaviorInput = behaviorSampleSchema.describe(
  'Behavior captured during this login attempt. Hashes are 64-char hex digests; time_of_day is an integer hour 0–23.',
);
const baselineInput = baselineProfileSchema.describe(
  'Stored baseline for the user. device_hash / location_hash may be null when never recorded.',
);
const missingHash = z
  .enum(['zero', 'exclude'])
  .optional()
  .describe('How to treat an unrecorded baseline hash: award 0 (default) or drop it and rescale.');

// ── Tool 1: behavior_score ────────────────────────────────────────────────────

server.registerTool(
  'behavior_score',
  {
    title: 'Behavioral Trust Score',
    description:
      'Score a login attempt against a user\'s behavioral baseline. ' +
      'Returns the 0–100 trust score, the points each signal earned, and whether device and location matched.',
    inputSchema: {
      behavior: behaviorInput,
      baseline: baselineInput,
      threshold: z
        .number()
        .min(0)
        .max(100)
        .optional()
        .describe(`Acceptance threshold (0–100). Default: ${DECISION.THRESHOLD}`),
      missing_hash: missingHash,
    },
  },
  async ({ behavior, baseline, threshold = DECISION.THRESHOLD, missing_hash = 'zero' }) => {
    const scorer = scorers[missing_hash];
    const result = scorer.score(behavior, baseline);
    const outcome = decide(result, threshold, scorer.table());
    return { content: [{ type: 'text', text: formatScoreReport(result, outcome, scorer.table()) }] };
  },
);

// ── Tool 2: should_accept ─────────────────────────────────────────────────────

server.registerTool(
  'should_accept',
  {
    title: 'Should Accept Login',
    description:
      'Quick binary check: does this behavior match the baseline closely enough to let the user in? ' +
      'Returns a clear YES or NO with the signals that fell short.',
    inputSchema: {
      behavior: behaviorInput,
      baseline: baselineInput,
      min_score: z
        .number()
        .min(0)
        .max(100)
        .optional()
        .describe(`Minimum acceptable trust score (0–100). Default: ${DECISION.THRESHOLD}`),
      missing_hash: missingHash,
    },
  },
  async ({ behavior, baseline, min_score = DECISION.THRESHOLD, missing_hash = 'zero' }) => {
    const scorer = scorers[missing_hash];
    const outcome = decide(scorer.score(behavior, baseline), min_score, scorer.table());
    return { content: [{ type: 'text', text: formatVerdict(outcome) }] };
  },
);

// ── Start ─────────────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
