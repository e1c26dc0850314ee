// Database — baseline profiles and login decision history
//
// Two things persist:
//   1. Baseline profiles  (written by the profile maintainer, read on every login)
//   2. Login events       (trust score + decision per attempt, for auditing)
//
// Falls back to in-memory if DATABASE_URL is not set.
// Both backends implement ProfileStore with identical semantics.

import pg from 'pg';
import { parseBaselineProfile } from '@cadence-auth/core';
import type { BaselineProfile, Decision, RiskLevel } from '@cadence-auth/core';
const { Pool } = pg;

// ─── Types ────────────────────────────────────────────────────────────────────

export interface StoredBaseline {
  user_id:    string;
  baseline:   BaselineProfile;
  updated_at: string; // ISO 8601
}

export interface LoginEvent {
  user_id:          string;
  trust_score:      number;
  threshold:        number;
  decision:         Decision;
  risk_level:       RiskLevel;
  device_matched:   boolean;
  location_matched: boolean;
  evaluated_at:     string; // ISO 8601
}

export interface StoreStats {
  backend:  'memory' | 'postgres';
  profiles: number;
  events:   number;
}

export interface ProfileStore {
  getBaseline(userId: string): Promise<StoredBaseline | null>;
  putBaseline(userId: string, baseline: BaselineProfile): Promise<StoredBaseline>;
  appendEvent(event: LoginEvent): Promise<void>;
  /** Most recent first. */
  recentEvents(userId: string, limit: number): Promise<LoginEvent[]>;
  stats(): Promise<StoreStats>;
  close(): Promise<void>;
}

// ─── In-memory ────────────────────────────────────────────────────────────────

/** Events kept per user in memory; older ones are dropped. */
const MEMORY_EVENT_CAP = 100;

export class MemoryProfileStore implements ProfileStore {
  private readonly baselines = new Map<string, StoredBaseline>();
  private readonly events = new Map<string, LoginEvent[]>();

  async getBaseline(userId: string): Promise<StoredBaseline | null> {
    const stored = this.baselines.get(userId);
    if (!stored) return null;
    return { ...stored, baseline: { ...stored.baseline } };
  }

  async putBaseline(userId: string, baseline: BaselineProfile): Promise<StoredBaseline> {
    const stored: StoredBaseline = {
      user_id: userId,
      baseline: { ...baseline },
      updated_at: new Date().toISOString(),
    };
    this.baselines.set(userId, stored);
    return { ...stored, baseline: { ...baseline } };
  }

  async appendEvent(event: LoginEvent): Promise<void> {
    const list = this.events.get(event.user_id) ?? [];
    list.unshift(event);
    if (list.length > MEMORY_EVENT_CAP) list.length = MEMORY_EVENT_CAP;
    this.events.set(event.user_id, list);
  }

  async recentEvents(userId: string, limit: number): Promise<LoginEvent[]> {
    return (this.events.get(userId) ?? []).slice(0, limit);
  }

  async stats(): Promise<StoreStats> {
    let events = 0;
    for (const list of this.events.values()) events += list.length;
    return { backend: 'memory', profiles: this.baselines.size, events };
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

// ─── Postgres ─────────────────────────────────────────────────────────────────

interface BaselineRow {
  user_id:    string;
  baseline:   unknown; // JSONB, validated on read
  updated_at: Date;
}

interface EventRow {
  user_id:          string;
  trust_score:      number;
  threshold:        number;
  decision:         string;
  risk_level:       string;
  device_matched:   boolean;
  location_matched: boolean;
  evaluated_at:     Date;
}

function toDecision(value: string): Decision {
  return value === 'accept' ? 'accept' : 'deny';
}

function toRiskLevel(value: string): RiskLevel {
  switch (value) {
    case 'low':    return 'low';
    case 'medium': return 'medium';
    default:       return 'high';
  }
}

export class PostgresProfileStore implements ProfileStore {
  constructor(private readonly pool: InstanceType<typeof Pool>) {}

  async migrate(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS baseline_profiles (
        user_id    TEXT PRIMARY KEY,
        baseline   JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE TABLE IF NOT EXISTS login_events (
        id               BIGSERIAL PRIMARY KEY,
        user_id          TEXT NOT NULL,
        trust_score      INTEGER NOT NULL,
        threshold        DOUBLE PRECISION NOT NULL,
        decision         TEXT NOT NULL,
        risk_level       TEXT NOT NULL,
        device_matched   BOOLEAN NOT NULL,
        location_matched BOOLEAN NOT NULL,
        evaluated_at     TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_login_events_user ON login_events (user_id, evaluated_at DESC);
    `);

    console.log('[db] Tables ready');
  }

  async getBaseline(userId: string): Promise<StoredBaseline | null> {
    const res = await this.pool.query<BaselineRow>(
      'SELECT user_id, baseline, updated_at FROM baseline_profiles WHERE user_id = $1',
      [userId],
    );
    const row = res.rows[0];
    if (!row) return null;
    return {
      user_id: row.user_id,
      baseline: parseBaselineProfile(row.baseline),
      updated_at: row.updated_at.toISOString(),
    };
  }

  async putBaseline(userId: string, baseline: BaselineProfile): Promise<StoredBaseline> {
    const res = await this.pool.query<{ updated_at: Date }>(
      `INSERT INTO baseline_profiles (user_id, baseline, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (user_id) DO UPDATE SET
         baseline   = EXCLUDED.baseline,
         updated_at = EXCLUDED.updated_at
       RETURNING updated_at`,
      [userId, JSON.stringify(baseline)],
    );
    const updatedAt = res.rows[0]?.updated_at ?? new Date();
    return { user_id: userId, baseline, updated_at: updatedAt.toISOString() };
  }

  async appendEvent(event: LoginEvent): Promise<void> {
    await this.pool.query(
      `INSERT INTO login_events
         (user_id, trust_score, threshold, decision, risk_level, device_matched, location_matched, evaluated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8)`,
      [
        event.user_id, event.trust_score, event.threshold, event.decision,
        event.risk_level, event.device_matched, event.location_matched, event.evaluated_at,
      ],
    );
  }

  async recentEvents(userId: string, limit: number): Promise<LoginEvent[]> {
    const res = await this.pool.query<EventRow>(
      `SELECT user_id, trust_score, threshold, decision, risk_level, device_matched, location_matched, evaluated_at
         FROM login_events
        WHERE user_id = $1
        ORDER BY evaluated_at DESC, id DESC
        LIMIT $2`,
      [userId, limit],
    );
    return res.rows.map((row) => ({
      user_id:          row.user_id,
      trust_score:      row.trust_score,
      threshold:        row.threshold,
      decision:         toDecision(row.decision),
      risk_level:       toRiskLevel(row.risk_level),
      device_matched:   row.device_matched,
      location_matched: row.location_matched,
      evaluated_at:     row.evaluated_at.toISOString(),
    }));
  }

  async stats(): Promise<StoreStats> {
    const [profiles, events] = await Promise.all([
      this.pool.query<{ count: string }>('SELECT COUNT(*) FROM baseline_profiles'),
      this.pool.query<{ count: string }>('SELECT COUNT(*) FROM login_events'),
    ]);
    return {
      backend:  'postgres',
      profiles: parseInt(profiles.rows[0]?.count ?? '0', 10),
      events:   parseInt(events.rows[0]?.count ?? '0', 10),
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// ─── Connection ───────────────────────────────────────────────────────────────

export async function initDb(databaseUrl?: string): Promise<ProfileStore> {
  if (!databaseUrl) {
    console.log('[db] DATABASE_URL not set — using in-memory store (data lost on restart)');
    return new MemoryProfileStore();
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: databaseUrl.includes('localhost') ? false : { rejectUnauthorized: false },
    max: 10,
    idleTimeoutMillis: 30_000,
  });

  // Smoke test
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
    console.log('[db] Postgres connected');
  } finally {
    client.release();
  }

  const store = new PostgresProfileStore(pool);
  await store.migrate();
  return store;
}
