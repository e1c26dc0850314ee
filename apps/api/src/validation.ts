// Request-level validation shared by the route modules.

import { InvalidInputError } from '@cadence-auth/core';

const MAX_USER_ID_LEN = 128;
const USER_ID_PATTERN = /^[A-Za-z0-9_.@+-]+$/;

export const EVENTS_DEFAULT_LIMIT = 20;
export const EVENTS_MAX_LIMIT = 100;

export function parseUserId(raw: unknown): string {
  if (typeof raw !== 'string' || raw.length === 0) {
    throw new InvalidInputError('Invalid user_id: must be a non-empty string');
  }
  if (raw.length > MAX_USER_ID_LEN) {
    throw new InvalidInputError(`Invalid user_id: exceeds maximum length of ${MAX_USER_ID_LEN} characters`);
  }
  if (!USER_ID_PATTERN.test(raw)) {
    throw new InvalidInputError('Invalid user_id: only letters, digits and _ . @ + - are allowed');
  }
  return raw;
}

/** `?limit=` with a default and an upper bound; garbage falls back to the default. */
export function parseLimit(raw: string | undefined): number {
  const n = parseInt(raw ?? '', 10);
  if (!Number.isFinite(n) || n < 1) return EVENTS_DEFAULT_LIMIT;
  return Math.min(n, EVENTS_MAX_LIMIT);
}
