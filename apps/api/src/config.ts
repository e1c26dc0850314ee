// Runtime configuration — environment variables plus an optional signal table file.

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DECISION, InvalidInputError, parseSignalSpecs } from '@cadence-auth/core';
import type { MissingHashPolicy, SignalSpec } from '@cadence-auth/core';

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  PORT:                z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(65_535).default(3000)),
  HOST:                z.string().min(1).default('0.0.0.0'),
  TRUST_THRESHOLD:     z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(100).default(DECISION.THRESHOLD)),
  DATABASE_URL:        z.preprocess(blankAsUndefined, z.string().optional()),
  SIGNALS_CONFIG:      z.string().min(1).default('config/signals.json'),
  MISSING_HASH_POLICY: z.enum(['zero', 'exclude']).default('zero'),
  CORS_ORIGINS:        z.preprocess(blankAsUndefined, z.string().optional()),
  LOG_LEVEL:           z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV:            z.string().default('development'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port:         number;
  host:         string;
  threshold:    number;
  databaseUrl?: string;
  signalsPath:  string;
  missingHash:  MissingHashPolicy;
  corsOrigins:  Array<string | RegExp>;
  logLevel:     LogLevel;
  /** Request logging is off under NODE_ENV=test */
  logRequests:  boolean;
}

/** Local development origins allowed when CORS_ORIGINS is unset. */
const DEFAULT_CORS_ORIGINS: RegExp[] = [/^http:\/\/localhost(:\d+)?$/, /^http:\/\/127\.0\.0\.1(:\d+)?$/];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidInputError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;

  return {
    port:        e.PORT,
    host:        e.HOST,
    threshold:   e.TRUST_THRESHOLD,
    databaseUrl: e.DATABASE_URL,
    signalsPath: e.SIGNALS_CONFIG,
    missingHash: e.MISSING_HASH_POLICY,
    corsOrigins: e.CORS_ORIGINS
      ? e.CORS_ORIGINS.split(',').map((o) => o.trim()).filter((o) => o.length > 0)
      : DEFAULT_CORS_ORIGINS,
    logLevel:    e.LOG_LEVEL,
    logRequests: e.NODE_ENV !== 'test',
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load a signal table from a JSON file, relative paths resolved against cwd.
 * Returns null when the file does not exist so callers fall back to the defaults.
 */
export function loadSignals(path: string, cwd: string = process.cwd()): SignalSpec[] | null {
  const fullPath = resolve(cwd, path);
  let text: string;
  try {
    text = readFileSync(fullPath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new InvalidInputError(`Invalid signal table: ${fullPath} is not valid JSON`);
  }
  return parseSignalSpecs(raw);
}
