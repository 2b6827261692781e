#!/usr/bin/env node
/**
 * Trader backend: Express + SQLite.
 * Serves the read API over sessions, trades and tick telemetry.
 */

import app from "./app.ts";
import { _resetDb } from "./db.ts";

const PORT = Number(process.env.PORT) || 3000;

const server = app.listen(PORT, "0.0.0.0", () => {
  console.log(`Trader backend: http://localhost:${PORT}`);
  console.log(`  API: /api/health, /api/sessions, /api/trades, /api/ticks`);
});

// ── Clean shutdown ────────────────────────────────────────────────────────────

function shutdown(signal: string): void {
  console.log(`\n[server] ${signal} received — shutting down`);
  server.close(() => {
    _resetDb();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
