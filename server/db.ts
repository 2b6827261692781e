/**
 * SQLite journal shared by the agent (writer) and the read API.
 *
 * TRADER_ENV picks the file: `testing` keeps everything in memory, `local`
 * writes trader-local.db and anything else trader.db, both under
 * TRADER_DATA_DIR (default ./.trader).
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";

export type JournalEnv = "testing" | "local" | "production";

function journalEnv(): JournalEnv {
  const value = process.env.TRADER_ENV;
  return value === "testing" || value === "local" ? value : "production";
}

function journalPath(env: JournalEnv): string {
  if (env === "testing") return ":memory:";
  const dir = process.env.TRADER_DATA_DIR || path.join(process.cwd(), ".trader");
  fs.mkdirSync(dir, { recursive: true });
  return path.join(dir, env === "local" ? "trader-local.db" : "trader.db");
}

let dbInstance: Database.Database | null = null;

export function getDb(env: JournalEnv = journalEnv()): Database.Database {
  if (!dbInstance) {
    const db = new Database(journalPath(env));
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    initSchema(db);
    dbInstance = db;
  }
  return dbInstance;
}

/** Close and reset the singleton (tests, server shutdown) */
export function _resetDb(): void {
  dbInstance?.close();
  dbInstance = null;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id           TEXT PRIMARY KEY,
      symbol       TEXT NOT NULL,
      timeframe    TEXT NOT NULL,
      mode         TEXT NOT NULL DEFAULT 'paper',
      env          TEXT NOT NULL DEFAULT 'production',
      config_json  TEXT,
      started_at   INTEGER NOT NULL,
      ended_at     INTEGER,
      stats_json   TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_started ON sessions(started_at DESC);

    -- Append-only: one row per filled order (opens and closes)
    CREATE TABLE IF NOT EXISTS trades (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id    TEXT NOT NULL REFERENCES sessions(id),
      strategy_id   TEXT NOT NULL,
      action        TEXT NOT NULL CHECK (action IN ('open', 'close')),
      ticket        TEXT NOT NULL,
      symbol        TEXT NOT NULL,
      side          TEXT NOT NULL CHECK (side IN ('buy', 'sell')),
      volume        REAL NOT NULL,
      price         REAL NOT NULL,
      stop          REAL,
      target        REAL,
      return_code   INTEGER,
      warnings_json TEXT,
      reason        TEXT,
      at            INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_trades_session  ON trades(session_id);
    CREATE INDEX IF NOT EXISTS idx_trades_strategy ON trades(strategy_id);
    CREATE INDEX IF NOT EXISTS idx_trades_at       ON trades(at DESC);

    CREATE TABLE IF NOT EXISTS ticks (
      id                 INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id         TEXT NOT NULL REFERENCES sessions(id),
      seq                INTEGER NOT NULL,
      at                 INTEGER NOT NULL,
      outcome            TEXT NOT NULL,
      duration_ms        REAL NOT NULL,
      bars               INTEGER NOT NULL,
      signals            INTEGER NOT NULL,
      submitted          INTEGER NOT NULL,
      failed             INTEGER NOT NULL,
      blocked            INTEGER NOT NULL,
      exits              INTEGER NOT NULL,
      exit_failures      INTEGER NOT NULL,
      stops_updated      INTEGER NOT NULL,
      positions_json     TEXT NOT NULL,
      error              TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_ticks_session ON ticks(session_id, seq);
  `);
}

// ── Types ────────────────────────────────────────────────────────────────────

export interface SessionRow {
  id: string;
  symbol: string;
  timeframe: string;
  mode: "paper" | "live";
  env: string;
  config_json: string | null;
  started_at: number;
  ended_at: number | null;
  stats_json: string | null;
}

export interface TradeRow {
  id: number;
  session_id: string;
  strategy_id: string;
  action: "open" | "close";
  ticket: string;
  symbol: string;
  side: "buy" | "sell";
  volume: number;
  price: number;
  stop: number | null;
  target: number | null;
  return_code: number | null;
  warnings_json: string | null;
  reason: string | null;
  at: number;
}

export interface TickRow {
  id: number;
  session_id: string;
  seq: number;
  at: number;
  outcome: string;
  duration_ms: number;
  bars: number;
  signals: number;
  submitted: number;
  failed: number;
  blocked: number;
  exits: number;
  exit_failures: number;
  stops_updated: number;
  positions_json: string;
  error: string | null;
}
