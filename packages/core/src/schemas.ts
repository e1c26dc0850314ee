// Wire-level validation for payloads crossing the HTTP / MCP boundary.
// The engine itself only does structural checks; these schemas enforce the
// collector's format (64-char hex digests, integer hours) before scoring.

import { z } from 'zod';
import { HASH, HOURS } from './constants.js';
import { InvalidInputError } from './errors.js';
import type { BaselineProfile, BehaviorSample, SignalSpec } from './types/index.js';

const HEX_DIGEST = new RegExp(`^[0-9a-fA-F]{${HASH.HEX_LENGTH}}$`);

const nonNegative = z.number().finite().min(0);
const digest = z.string().regex(HEX_DIGEST, `must be a ${HASH.HEX_LENGTH}-character hex digest`);

// ─── Behavior sample ──────────────────────────────────────────────────────────

export const behaviorSampleSchema = z.object({
  typing_speed:    nonNegative,
  key_hold_time:   nonNegative,
  mouse_velocity:  nonNegative,
  click_interval:  nonNegative,
  scroll_depth:    nonNegative.max(1),
  network_latency: nonNegative,
  device_hash:     digest,
  location_hash:   digest,
  time_of_day:     z.number().int().min(0).max(HOURS.MAX_HOUR),
});

// ─── Baseline profile ─────────────────────────────────────────────────────────

export const baselineProfileSchema = z.object({
  typing_speed:    nonNegative,
  key_hold_time:   nonNegative,
  mouse_velocity:  nonNegative,
  click_interval:  nonNegative,
  scroll_depth:    nonNegative.max(1),
  network_latency: nonNegative.optional(),
  device_hash:     digest.nullish(),
  location_hash:   digest.nullish(),
  time_of_day:     nonNegative.lt(HOURS.PERIOD),
});

// ─── Signal table ─────────────────────────────────────────────────────────────

const continuousSignal = z.enum([
  'typing_speed',
  'key_hold_time',
  'mouse_velocity',
  'click_interval',
  'scroll_depth',
  'network_latency',
]);

const weight = nonNegative;

export const signalSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('deviation'), signal: continuousSignal, weight, maxDeviation: z.number().finite() }),
  z.object({ kind: z.literal('hard_cap'), signal: continuousSignal, weight, cap: nonNegative }),
  z.object({ kind: z.literal('binary_match'), signal: z.enum(['device_hash', 'location_hash']), weight }),
  z.object({
    kind: z.literal('circular_proximity'),
    signal: z.literal('time_of_day'),
    weight,
    period: z.number().finite().positive().default(HOURS.PERIOD),
  }),
]);

export const signalSpecsSchema = z.array(signalSpecSchema).min(1);

// ─── Parsers ──────────────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InvalidInputError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function parseBehaviorSample(raw: unknown): BehaviorSample {
  return parseWith(behaviorSampleSchema, raw, 'behavior sample');
}

export function parseBaselineProfile(raw: unknown): BaselineProfile {
  return parseWith(baselineProfileSchema, raw, 'baseline profile');
}

export function parseSignalSpecs(raw: unknown): SignalSpec[] {
  return parseWith(signalSpecsSchema, raw, 'signal table');
}
