// HTTP API — Fastify adapter around the trust scoring engine.
// Built as a factory so tests can inject a store and run requests in-process.

import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { InvalidInputError, totalWeight } from '@cadence-auth/core';
import type { RuleBasedScorer } from '@cadence-auth/core';
import type { ProfileStore } from './db.js';
import type { LogLevel } from './config.js';
import { registerAuthRoutes } from './routes/auth.js';
import { registerProfileRoutes } from './routes/profiles.js';

export const API_VERSION = '0.1.0';

export interface ServerOptions {
  store:        ProfileStore;
  scorer:       RuleBasedScorer;
  threshold:    number;
  corsOrigins?: Array<string | RegExp>;
  /** false disables request logging entirely */
  logger?:      false | { level: LogLevel };
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { store, scorer, threshold } = options;

  // trustProxy: false — rate limit on the socket address; X-Forwarded-For is client-controlled.
  const server = Fastify({
    logger: options.logger ?? false,
    trustProxy: false,
  });

  // ── Rate limiting ─────────────────────────────────────────────────────────
  await server.register(rateLimit, {
    global: true,
    max: 60,               // 60 req/min per IP — baseline
    timeWindow: '1 minute',
  });

  // ── Security headers ──────────────────────────────────────────────────────
  server.addHook('onSend', (_req, reply, _payload, done) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
    reply.header('Cache-Control', 'no-store');
    done();
  });

  // ── CORS ──────────────────────────────────────────────────────────────────
  await server.register(cors, {
    origin: options.corsOrigins ?? [/^http:\/\/localhost(:\d+)?$/],
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  // ── Errors ────────────────────────────────────────────────────────────────
  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof InvalidInputError) {
      return reply.code(400).send({ error: error.message, issues: error.issues });
    }
    const status = error.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({ error: error.message });
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send({ error: 'Internal server error' });
  });

  server.setNotFoundHandler((request, reply) =>
    reply.code(404).send({ error: `Route ${request.method} ${request.url} not found` }),
  );

  // ── Routes ────────────────────────────────────────────────────────────────
  await registerAuthRoutes(server, { store, scorer, threshold });
  await registerProfileRoutes(server, { store });

  // GET /v1/signals — the active signal table
  server.get('/v1/signals', async () => ({
    scorer: scorer.name,
    signals: scorer.table(),
    total_weight: totalWeight(scorer.table()),
    threshold,
  }));

  // GET /health
  server.get('/health', async () => ({
    status: 'ok',
    version: API_VERSION,
    scorer: scorer.name,
    threshold,
    store: await store.stats(),
    uptime_seconds: process.uptime(),
  }));

  return server;
}
