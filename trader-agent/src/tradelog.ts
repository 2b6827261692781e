/**
 * Trade journal: sessions, the append-only trade log and tick telemetry.
 *
 * SqliteTradeJournal writes straight into the shared SQLite file that the
 * read API serves; MemoryTradeJournal keeps trades and the latest ticks in
 * arrays for --no-journal runs.
 */

import type Database from "better-sqlite3";
import { getDb } from "../../server/db.ts";
import type { Side } from "../../src/lib/types";
import type { SessionStats, TickTelemetry } from "./telemetry.js";

export interface SessionInfo {
  sessionId: string;
  symbol: string;
  timeframe: string;
  mode: "paper" | "live";
  env?: string;
  configJson?: string;
  startedAt: number;
}

export interface TradeRecord {
  sessionId: string;
  strategyId: string;
  action: "open" | "close";
  ticket: string;
  symbol: string;
  side: Side;
  volume: number;
  price: number;
  stop: number | null;
  target: number | null;
  returnCode: number | null;
  warnings: string[];
  reason: string | null;
  at: number;
}

export interface TradeJournal {
  openSession(info: SessionInfo): void;
  recordTrade(record: TradeRecord): void;
  recordTick(tick: TickTelemetry): void;
  closeSession(sessionId: string, stats: SessionStats, endedAt?: number): void;
}

export class SqliteTradeJournal implements TradeJournal {
  private readonly db: Database.Database;

  constructor(db: Database.Database = getDb()) {
    this.db = db;
  }

  openSession(info: SessionInfo): void {
    // Upsert: a restart re-registers the same id
    this.db
      .prepare(
        `INSERT INTO sessions (id, symbol, timeframe, mode, env, config_json, started_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET started_at = excluded.started_at,
           config_json = COALESCE(excluded.config_json, config_json)`
      )
      .run(
        info.sessionId,
        info.symbol,
        info.timeframe,
        info.mode,
        info.env ?? process.env.TRADER_ENV ?? "production",
        info.configJson ?? null,
        info.startedAt
      );
  }

  recordTrade(r: TradeRecord): void {
    this.db
      .prepare(
        `INSERT INTO trades (session_id, strategy_id, action, ticket, symbol, side, volume, price,
           stop, target, return_code, warnings_json, reason, at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        r.sessionId,
        r.strategyId,
        r.action,
        r.ticket,
        r.symbol,
        r.side,
        r.volume,
        r.price,
        r.stop,
        r.target,
        r.returnCode,
        r.warnings.length > 0 ? JSON.stringify(r.warnings) : null,
        r.reason,
        r.at
      );
  }

  recordTick(t: TickTelemetry): void {
    this.db
      .prepare(
        `INSERT INTO ticks (session_id, seq, at, outcome, duration_ms, bars, signals, submitted,
           failed, blocked, exits, exit_failures, stops_updated, positions_json, error)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        t.sessionId,
        t.seq,
        t.at,
        t.outcome,
        t.durationMs,
        t.bars,
        t.signals,
        t.submitted,
        t.failed,
        t.blocked,
        t.exits,
        t.exitFailures,
        t.stopsUpdated,
        JSON.stringify(t.positionsByStrategy),
        t.error
      );
  }

  closeSession(sessionId: string, stats: SessionStats, endedAt: number = Date.now()): void {
    this.db
      .prepare(`UPDATE sessions SET ended_at = ?, stats_json = ? WHERE id = ?`)
      .run(endedAt, JSON.stringify(stats), sessionId);
  }
}

export class MemoryTradeJournal implements TradeJournal {
  readonly sessions: SessionInfo[] = [];
  readonly trades: TradeRecord[] = [];
  /** The most recent `maxTicks` tick records. */
  readonly ticks: TickTelemetry[] = [];
  readonly closed = new Map<string, SessionStats>();
  private readonly maxTicks: number;

  constructor(opts: { maxTicks?: number } = {}) {
    this.maxTicks = Math.max(1, opts.maxTicks ?? 1000);
  }

  openSession(info: SessionInfo): void {
    this.sessions.push(info);
  }

  recordTrade(record: TradeRecord): void {
    this.trades.push(record);
  }

  recordTick(tick: TickTelemetry): void {
    this.ticks.push(tick);
    if (this.ticks.length > this.maxTicks) this.ticks.splice(0, this.ticks.length - this.maxTicks);
  }

  closeSession(sessionId: string, stats: SessionStats): void {
    this.closed.set(sessionId, stats);
  }
}
