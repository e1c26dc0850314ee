// Baseline profile storage and login history.
//
// Baselines are stored exactly as supplied — forming or updating them from
// past logins is the profile maintainer's job, not this service's.

import type { FastifyInstance } from 'fastify';
import { parseBaselineProfile } from '@cadence-auth/core';
import type { ProfileStore } from '../db.js';
import { parseLimit, parseUserId } from '../validation.js';

interface UserParams {
  userId: string;
}

export async function registerProfileRoutes(
  server: FastifyInstance,
  { store }: { store: ProfileStore },
): Promise<void> {
  // PUT /v1/profiles/:userId/baseline
  server.put<{ Params: UserParams; Body: unknown }>(
    '/v1/profiles/:userId/baseline',
    async (request, reply) => {
      const userId = parseUserId(request.params.userId);
      const baseline = parseBaselineProfile(request.body);
      const stored = await store.putBaseline(userId, baseline);
      request.log.info({ user_id: userId }, 'baseline profile stored');
      return reply.send(stored);
    },
  );

  // GET /v1/profiles/:userId/baseline
  server.get<{ Params: UserParams }>(
    '/v1/profiles/:userId/baseline',
    async (request, reply) => {
      const userId = parseUserId(request.params.userId);
      const stored = await store.getBaseline(userId);
      if (!stored) return reply.code(404).send({ error: 'Profile not found' });
      return reply.send(stored);
    },
  );

  // GET /v1/profiles/:userId/events?limit=20 — newest first
  server.get<{ Params: UserParams; Querystring: { limit?: string } }>(
    '/v1/profiles/:userId/events',
    async (request, reply) => {
      const userId = parseUserId(request.params.userId);
      const limit = parseLimit(request.query.limit);
      const events = await store.recentEvents(userId, limit);
      return reply.send({ user_id: userId, count: events.length, events });
    },
  );
}
