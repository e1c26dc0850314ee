// POST /v1/auth/login — passwordless login gated on behavioral trust
// POST /v1/trust/score — stateless scoring of a sample against a supplied baseline
//
// Responses:
//   200 → accepted (total ≥ threshold)
//   401 → denied, including unknown users (no account enumeration)
//   400 → malformed payload

import type { FastifyInstance } from 'fastify';
import { InvalidInputError, decide, parseBaselineProfile, parseBehaviorSample } from '@cadence-auth/core';
import type { RuleBasedScorer } from '@cadence-auth/core';
import type { ProfileStore } from '../db.js';
import { parseUserId } from '../validation.js';

interface LoginBody {
  user_id?: unknown;
  behavior?: unknown;
}

interface ScoreBody {
  behavior?: unknown;
  baseline?: unknown;
  threshold?: unknown;
}

export interface AuthRouteDeps {
  store: ProfileStore;
  scorer: RuleBasedScorer;
  threshold: number;
}

export async function registerAuthRoutes(
  server: FastifyInstance,
  { store, scorer, threshold }: AuthRouteDeps,
): Promise<void> {
  // POST /v1/auth/login — 20 req/min (credential-equivalent endpoint)
  server.post<{ Body: LoginBody }>(
    '/v1/auth/login',
    { config: { rateLimit: { max: 20, timeWindow: '1 minute' } } },
    async (request, reply) => {
      const userId = parseUserId(request.body?.user_id);
      const sample = parseBehaviorSample(request.body?.behavior);
      const evaluatedAt = new Date().toISOString();

      const stored = await store.getBaseline(userId);
      if (!stored) {
        request.log.info({ user_id: userId }, 'login denied: no baseline profile');
        return reply.code(401).send({
          user_id: userId,
          decision: 'deny',
          trust_score: 0,
          threshold,
          risk_level: 'high',
          sub_scores: {},
          matched_flags: {},
          rejection_reasons: [],
          evaluated_at: evaluatedAt,
        });
      }

      const result = scorer.score(sample, stored.baseline);
      const outcome = decide(result, threshold, scorer.table());

      store.appendEvent({
        user_id: userId,
        trust_score: outcome.trust_score,
        threshold: outcome.threshold,
        decision: outcome.decision,
        risk_level: outcome.risk_level,
        device_matched: result.matched_flags.device_hash ?? false,
        location_matched: result.matched_flags.location_hash ?? false,
        evaluated_at: evaluatedAt,
      }).catch((err: unknown) => {
        // history is best-effort; the decision has already been made
        request.log.warn({ err, user_id: userId }, 'failed to record login event');
      });

      request.log.info(
        { user_id: userId, trust_score: outcome.trust_score, decision: outcome.decision },
        'behavioral login evaluated',
      );

      return reply.code(outcome.accepted ? 200 : 401).send({
        user_id: userId,
        decision: outcome.decision,
        trust_score: outcome.trust_score,
        threshold: outcome.threshold,
        risk_level: outcome.risk_level,
        sub_scores: result.sub_scores,
        matched_flags: result.matched_flags,
        rejection_reasons: outcome.rejection_reasons,
        evaluated_at: evaluatedAt,
      });
    },
  );

  // POST /v1/trust/score — diagnostics; nothing is stored
  server.post<{ Body: ScoreBody }>('/v1/trust/score', async (request, reply) => {
    const sample = parseBehaviorSample(request.body?.behavior);
    const baseline = parseBaselineProfile(request.body?.baseline);
    const requested = request.body?.threshold;
    let effective = threshold;
    if (requested !== undefined) {
      if (typeof requested !== 'number') throw new InvalidInputError('Invalid threshold: must be a number');
      effective = requested;
    }

    const result = scorer.score(sample, baseline);
    const outcome = decide(result, effective, scorer.table());

    return reply.send({
      ...outcome,
      sub_scores: result.sub_scores,
      matched_flags: result.matched_flags,
      excluded: result.excluded,
    });
  });
}
