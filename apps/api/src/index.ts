// Behavioral login API — process entry point
// Wires configuration, the signal table, the profile store and the Fastify server.

import { DEFAULT_SIGNALS, RuleBasedScorer } from '@cadence-auth/core';
import { loadConfig, loadSignals } from './config.js';
import { initDb } from './db.js';
import { API_VERSION, buildServer } from './server.js';

const config = loadConfig();

// ── Engine ────────────────────────────────────────────────────────────────────
const fromFile = loadSignals(config.signalsPath);
if (!fromFile) {
  console.log(`[config] ${config.signalsPath} not found — using the built-in signal table`);
}
const scorer = new RuleBasedScorer({
  signals: fromFile ?? DEFAULT_SIGNALS,
  missingHash: config.missingHash,
});

// ── Storage ───────────────────────────────────────────────────────────────────
const store = await initDb(config.databaseUrl);

// ── Server ────────────────────────────────────────────────────────────────────
const server = await buildServer({
  store,
  scorer,
  threshold: config.threshold,
  corsOrigins: config.corsOrigins,
  logger: config.logRequests ? { level: config.logLevel } : false,
});

const shutdown = (signal: string) => {
  server.log.info({ signal }, 'shutting down');
  server.close()
    .then(() => store.close())
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error('[shutdown] failed to close cleanly', err);
      process.exit(1);
    });
};
process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

server.listen({ port: config.port, host: config.host }, (err) => {
  if (err) {
    server.log.error(err);
    process.exit(1);
  }
  console.log(`
Cadence behavioral login API v${API_VERSION}
  → Scorer:      ${scorer.name} (${scorer.table().length} signals, missing hash: ${config.missingHash})
  → Threshold:   ${config.threshold}
  → Listening on http://${config.host}:${config.port}
`);
});
