import { describe, it, expect } from 'vitest';
import { parseBaselineProfile, parseBehaviorSample, parseSignalSpecs } from '../schemas.js';
import { DEFAULT_SIGNALS } from '../engine/signals.js';
import { InvalidInputError } from '../errors.js';

const DEVICE   = '0123456789abcdef'.repeat(4);
const LOCATION = 'fedcba9876543210'.repeat(4);

const payload = {
  typing_speed: 4.2,
  key_hold_time: 112.5,
  mouse_velocity: 380,
  click_interval: 620,
  scroll_depth: 0.65,
  network_latency: 45,
  device_hash: DEVICE,
  location_hash: LOCATION,
  time_of_day: 14,
};

// ── parseBehaviorSample ───────────────────────────────────────────────────────
describe('parseBehaviorSample', () => {
  it('accepts a complete payload', () => {
    expect(parseBehaviorSample(payload)).toEqual(payload);
  });

  it('requires every field', () => {
    const { time_of_day: _dropped, ...partial } = payload;
    expect(() => parseBehaviorSample(partial)).toThrow(InvalidInputError);
  });

  it('rejects short or non-hex digests', () => {
    expect(() => parseBehaviorSample({ ...payload, device_hash: 'abc123' })).toThrow(/device_hash/);
    expect(() => parseBehaviorSample({ ...payload, location_hash: 'z'.repeat(64) })).toThrow(/location_hash/);
  });

  it('rejects fractional or out-of-range hours', () => {
    expect(() => parseBehaviorSample({ ...payload, time_of_day: 24 })).toThrow(InvalidInputError);
    expect(() => parseBehaviorSample({ ...payload, time_of_day: 9.5 })).toThrow(InvalidInputError);
  });

  it('reports issues with their field path', () => {
    try {
      parseBehaviorSample({ ...payload, scroll_depth: 2, typing_speed: 'fast' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.issues).toHaveLength(2);
        expect(err.issues[0]).toMatch(/^typing_speed: /);
        expect(err.issues[1]).toMatch(/^scroll_depth: /);
      }
    }
  });
});

// ── parseBaselineProfile ──────────────────────────────────────────────────────
describe('parseBaselineProfile', () => {
  it('allows absent or null hashes and a fractional hour', () => {
    const { device_hash: _d, location_hash: _l, network_latency: _n, ...rest } = payload;
    const parsed = parseBaselineProfile({ ...rest, location_hash: null, time_of_day: 13.5 });
    expect(parsed.device_hash).toBeUndefined();
    expect(parsed.location_hash).toBeNull();
    expect(parsed.time_of_day).toBe(13.5);
  });

  it('rejects negative values', () => {
    expect(() => parseBaselineProfile({ ...payload, click_interval: -4 })).toThrow(/click_interval/);
  });
});

// ── parseSignalSpecs ──────────────────────────────────────────────────────────
describe('parseSignalSpecs', () => {
  it('round-trips the default table through JSON', () => {
    expect(parseSignalSpecs(JSON.parse(JSON.stringify(DEFAULT_SIGNALS)))).toEqual(DEFAULT_SIGNALS);
  });

  it('defaults the circular period to 24', () => {
    expect(parseSignalSpecs([{ kind: 'circular_proximity', signal: 'time_of_day', weight: 5 }]))
      .toEqual([{ kind: 'circular_proximity', signal: 'time_of_day', weight: 5, period: 24 }]);
  });

  it('rejects a signal under the wrong kind', () => {
    expect(() => parseSignalSpecs([{ kind: 'binary_match', signal: 'typing_speed', weight: 5 }]))
      .toThrow(InvalidInputError);
  });

  it('rejects an unknown kind and an empty table', () => {
    expect(() => parseSignalSpecs([{ kind: 'fuzzy', signal: 'typing_speed', weight: 5 }])).toThrow(InvalidInputError);
    expect(() => parseSignalSpecs([])).toThrow(InvalidInputError);
  });
});
