#!/usr/bin/env node
/**
 * Trader CLI: headless operator commands.
 * Usage: npm run cli [command] [options]
 */

import { Command } from "commander";
import { loadBars } from "../trader-agent/src/candles.js";
import { loadConfig } from "../trader-agent/src/config.js";
import { getDb, type TradeRow } from "../server/db.ts";
import { buildStrategies, defaultConfig, strategies } from "./lib/strategies/registry";
import { strategyMeta } from "./lib/strategies/meta";
import { INITIAL_STATE, type Strategy } from "./lib/strategies/types";
import { columns } from "./lib/strategies/define";
import {
  atr,
  bollingerSeries,
  ema,
  last,
  macdSeries,
  rsi,
  stochasticSeries,
} from "./lib/indicators";

const program = new Command();

program
  .name("trader")
  .description("Multi-strategy trader — headless CLI")
  .option("--json", "Output as JSON");

// --- strategies ---

program
  .command("strategies")
  .description("List strategy kinds with default parameters")
  .action(() => {
    const rows = strategies.map((f) => ({
      kind: f.kind,
      name: f.name,
      pattern: strategyMeta[f.kind].pattern,
      risk: strategyMeta[f.kind].risk,
      cooldownSeconds: f.cooldownSeconds,
      minimumBars: f.minimumBars(),
      defaults: f.defaults(),
    }));
    if (program.opts().json) {
      console.log(JSON.stringify(rows));
      return;
    }
    for (const r of rows) {
      console.log(`${r.kind} — ${r.name} (${r.pattern}, ${r.risk} risk)`);
      console.log(`  ${strategyMeta[r.kind].whenToUse}`);
      console.log(`  min bars ${r.minimumBars}, cooldown ${r.cooldownSeconds}s`);
      console.log(`  ${Object.entries(r.defaults).map(([k, v]) => `${k}=${v}`).join(" ")}`);
    }
  });

// --- indicators ---

program
  .command("indicators <bars-file>")
  .description("Compute technical indicators on the last bar of a bar file")
  .action((file: string) => {
    const bars = loadBars(file);
    if (bars.length < 30) {
      console.error(`Not enough bars (got ${bars.length}, need 30+)`);
      process.exit(1);
    }
    const { highs, lows, closes } = columns(bars);
    const m = macdSeries(closes);
    const bb = bollingerSeries(closes, 20, 2);
    const st = stochasticSeries(highs, lows, closes);
    const result = {
      time: new Date(bars[bars.length - 1].t).toISOString(),
      price: last(closes),
      rsi_14: round(rsi(closes, 14)),
      ema_12: round(ema(closes, 12)),
      ema_26: round(ema(closes, 26)),
      macd: { macd: round(last(m.macd), 4), signal: round(last(m.signal), 4), histogram: round(last(m.histogram), 4) },
      bollinger: {
        upper: round(last(bb.upper)),
        middle: round(last(bb.middle)),
        lower: round(last(bb.lower)),
        width: round(last(bb.width), 4),
      },
      stochastic: { k: round(last(st.k)), d: round(last(st.d)) },
      atr_14: round(atr(highs, lows, closes, 14), 4),
    };
    if (program.opts().json) {
      console.log(JSON.stringify(result));
      return;
    }
    console.log(`${file} @ ${result.price} (${result.time})`);
    console.log(`RSI(14):     ${result.rsi_14} — ${rsiLabel(result.rsi_14)}`);
    console.log(`EMA(12/26):  ${result.ema_12} / ${result.ema_26}`);
    console.log(`MACD:        ${result.macd.macd} | signal: ${result.macd.signal} | hist: ${result.macd.histogram}`);
    console.log(`Bollinger:   ${result.bollinger.lower} — ${result.bollinger.middle} — ${result.bollinger.upper} (w: ${result.bollinger.width})`);
    console.log(`Stochastic:  %K ${result.stochastic.k} | %D ${result.stochastic.d}`);
    console.log(`ATR(14):     ${result.atr_14}`);
  });

// --- scan ---

program
  .command("scan <bars-file>")
  .description("Evaluate strategies on the last window of a bar file")
  .option("--config <path>", "Config JSON (default: every kind with default params)")
  .action((file: string, opts: { config?: string }) => {
    const bars = loadBars(file);
    if (bars.length === 0) {
      console.error(`No bars in ${file}`);
      process.exit(1);
    }
    let list: Strategy[];
    let window = bars;
    if (opts.config) {
      const config = loadConfig(opts.config);
      list = buildStrategies(config.strategies).filter((s) => s.enabled);
      window = bars.slice(-config.barCount);
    } else {
      list = buildStrategies(strategies.map((f) => defaultConfig(f.kind)));
    }

    const rows = list.map((s) => {
      const { signal } = s.signal(window, INITIAL_STATE);
      const entry = window[window.length - 1].c;
      const side = signal.direction;
      return {
        strategy: s.id,
        signal: side,
        enoughBars: window.length >= s.minimumBars(),
        entry,
        stop: side === "none" ? null : round(s.stopPrice(window, side, entry), 5),
        target: side === "none" ? null : round(s.targetPrice(window, side, entry), 5),
      };
    });
    if (program.opts().json) {
      console.log(JSON.stringify(rows));
      return;
    }
    for (const r of rows) {
      const note = r.enoughBars ? "" : " (not enough bars)";
      const levels = r.signal === "none" ? "" : ` @ ${r.entry} SL ${r.stop} TP ${r.target}`;
      console.log(`${r.strategy.padEnd(22)} ${r.signal.toUpperCase()}${levels}${note}`);
    }
  });

// --- trades ---

program
  .command("trades")
  .description("List journaled trades")
  .option("-s, --session <id>", "Session id (default: most recent)")
  .option("--strategy <id>", "Filter by strategy id")
  .option("-n, --limit <n>", "Max rows", "50")
  .action((opts: { session?: string; strategy?: string; limit: string }) => {
    const db = getDb();
    let sessionId = opts.session;
    if (!sessionId) {
      const latest = db
        .prepare<[], { id: string }>("SELECT id FROM sessions ORDER BY started_at DESC LIMIT 1")
        .get();
      if (!latest) {
        console.log("No sessions recorded.");
        return;
      }
      sessionId = latest.id;
    }
    const limit = Math.min(1000, Math.max(1, Number(opts.limit) || 50));
    const params: (string | number)[] = [sessionId];
    let sql = "SELECT * FROM trades WHERE session_id = ?";
    if (opts.strategy) {
      sql += " AND strategy_id = ?";
      params.push(opts.strategy);
    }
    sql += " ORDER BY id ASC LIMIT ?";
    params.push(limit);
    const rows = db.prepare<(string | number)[], TradeRow>(sql).all(...params);

    if (program.opts().json) {
      console.log(JSON.stringify(rows));
      return;
    }
    console.log(`Session ${sessionId}: ${rows.length} trade(s)`);
    for (const r of rows) {
      const at = new Date(r.at).toISOString().slice(0, 16).replace("T", " ");
      console.log(
        `${at}  ${r.action.padEnd(5)} #${r.ticket.padEnd(6)} ${r.strategy_id.padEnd(20)} ${r.side.toUpperCase().padEnd(4)} ${r.volume} @ ${r.price}`
      );
    }
  });

function round(n: number, decimals = 2): number {
  if (isNaN(n)) return n;
  const f = 10 ** decimals;
  return Math.round(n * f) / f;
}

function rsiLabel(v: number): string {
  if (isNaN(v)) return "N/A";
  if (v > 70) return "overbought";
  if (v < 30) return "oversold";
  return "neutral";
}

program.parse();
