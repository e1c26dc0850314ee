import { describe, it, expect } from 'vitest';
import type { BaselineProfile } from '@cadence-auth/core';
import { MemoryProfileStore, initDb } from '../db.js';
import type { LoginEvent } from '../db.js';

const BASELINE: BaselineProfile = {
  typing_speed:   4.0,
  key_hold_time:  110,
  mouse_velocity: 400,
  click_interval: 600,
  scroll_depth:   0.6,
  device_hash:    null,
  location_hash:  null,
  time_of_day:    9.5,
};

const event = (userId: string, trustScore: number): LoginEvent => ({
  user_id:          userId,
  trust_score:      trustScore,
  threshold:        60,
  decision:         trustScore >= 60 ? 'accept' : 'deny',
  risk_level:       trustScore >= 60 ? 'low' : 'high',
  device_matched:   false,
  location_matched: false,
  evaluated_at:     '2026-01-01T00:00:00.000Z',
});

describe('MemoryProfileStore', () => {
  it('returns null for an unknown user', async () => {
    expect(await new MemoryProfileStore().getBaseline('nobody')).toBeNull();
  });

  it('overwrites a baseline on put', async () => {
    const store = new MemoryProfileStore();
    await store.putBaseline('alice', BASELINE);
    await store.putBaseline('alice', { ...BASELINE, typing_speed: 5.5 });
    const stored = await store.getBaseline('alice');
    expect(stored?.baseline.typing_speed).toBe(5.5);
    expect((await store.stats()).profiles).toBe(1);
  });

  it('copies the baseline so later mutation of the input has no effect', async () => {
    const store = new MemoryProfileStore();
    const input = { ...BASELINE };
    await store.putBaseline('alice', input);
    input.typing_speed = 99;
    expect((await store.getBaseline('alice'))?.baseline.typing_speed).toBe(4.0);
  });

  it('hands out copies so mutating a read leaves the store intact', async () => {
    const store = new MemoryProfileStore();
    await store.putBaseline('alice', BASELINE);
    const read = await store.getBaseline('alice');
    if (read) read.baseline.typing_speed = 99;
    expect((await store.getBaseline('alice'))?.baseline.typing_speed).toBe(4.0);
  });

  it('returns events newest first, per user, up to the limit', async () => {
    const store = new MemoryProfileStore();
    await store.appendEvent(event('alice', 10));
    await store.appendEvent(event('alice', 20));
    await store.appendEvent(event('bob', 30));
    await store.appendEvent(event('alice', 40));

    const recent = await store.recentEvents('alice', 2);
    expect(recent.map((e) => e.trust_score)).toEqual([40, 20]);
    expect(await store.stats()).toEqual({ backend: 'memory', profiles: 0, events: 4 });
  });

  it('keeps at most 100 events per user', async () => {
    const store = new MemoryProfileStore();
    for (let i = 0; i < 105; i++) await store.appendEvent(event('alice', i));
    const recent = await store.recentEvents('alice', 1000);
    expect(recent).toHaveLength(100);
    expect(recent[0]?.trust_score).toBe(104);
    expect(recent[99]?.trust_score).toBe(5);
  });
});

describe('initDb', () => {
  it('falls back to the in-memory store without a DATABASE_URL', async () => {
    const store = await initDb(undefined);
    expect(store).toBeInstanceOf(MemoryProfileStore);
    await store.close();
  });
});
