#!/usr/bin/env node
/**
 * Multi-strategy trading agent.
 * Runs the configured strategies through the risk-gated execution loop
 * against a replayed bar file (paper venue).
 *
 * Usage:
 *   npx tsx trader-agent/src/agent.ts --replay data/xauusd-m5.csv --verbose
 *   npx tsx trader-agent/src/agent.ts --replay bars.json --interval 0 --max-ticks 500
 */

import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { Command } from "commander";

// Load .env from the trader-agent directory regardless of CWD
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: resolve(__dirname, "..", ".env") });

import { loadConfig, resolveOverrides } from "./config.js";
import { TraderContext, sessionIdFor } from "./context.js";
import { createLogger } from "./logger.js";
import { loadBars } from "./candles.js";
import { PaperVenue } from "./paper-venue.js";
import { ExecutionScheduler } from "./scheduler.js";
import { MemoryTradeJournal, SqliteTradeJournal, type TradeJournal } from "./tradelog.js";
import { formatStats } from "./telemetry.js";
import { RiskManager } from "../../src/lib/risk";
import { buildStrategies } from "../../src/lib/strategies/registry";
import { errorMessage } from "../../src/lib/errors";

// ── CLI ──────────────────────────────────────────────────────────────────────

const projectRoot = resolve(__dirname, "..", "..");

const program = new Command();

program
  .name("trader-agent")
  .description("Multi-strategy signal-to-execution trading agent (paper venue)")
  .option("--config <path>", "Config JSON", process.env.TRADER_CONFIG ?? resolve(projectRoot, "config", "trader.json"))
  .requiredOption("--replay <file>", "Bar file to replay (CSV or JSON)")
  .option("--balance <amount>", "Starting paper balance", "10000")
  .option("--symbol <symbol>", "Symbol override")
  .option("--timeframe <tf>", "Timeframe override (M1, M5, M15, M30, H1, H4, D1)")
  .option("--interval <sec>", "Tick interval in seconds")
  .option("--max-ticks <n>", "Stop after N ticks")
  .option("--warmup <n>", "Bars visible before the first tick (default: barCount)")
  .option("--no-journal", "Keep trades/telemetry in memory instead of SQLite")
  .option("--log-dir <dir>", "Log directory", resolve(projectRoot, "logs"))
  .option("--verbose", "Extra logging", false);

interface AgentOptions {
  config: string;
  replay: string;
  balance: string;
  symbol?: string;
  timeframe?: string;
  interval?: string;
  maxTicks?: string;
  warmup?: string;
  journal: boolean;
  logDir: string;
  verbose: boolean;
}

function parseNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`--${name} must be a number, got "${value}"`);
  return n;
}

// ── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  program.parse();
  const opts = program.opts<AgentOptions>();

  const sessionId = sessionIdFor(new Date());
  const logger = createLogger({ name: sessionId, logsDir: opts.logDir, verbose: opts.verbose });
  const ctx = new TraderContext({ sessionId, logger });

  const config = loadConfig(
    opts.config,
    resolveOverrides(process.env, {
      symbol: opts.symbol,
      timeframe: opts.timeframe,
      tickIntervalSeconds: parseNumber("interval", opts.interval),
    })
  );
  const strategies = buildStrategies(config.strategies);
  if (strategies.filter((s) => s.enabled).length === 0) {
    throw new Error(`No enabled strategies in ${opts.config}`);
  }

  const bars = loadBars(resolve(opts.replay));
  const venue = new PaperVenue({
    bars,
    symbol: config.symbol,
    spec: config.symbolSpec,
    balance: parseNumber("balance", opts.balance) ?? 10_000,
    warmup: parseNumber("warmup", opts.warmup) ?? config.barCount,
  });

  const risk = new RiskManager({
    limits: config.risk,
    timeZone: config.tradingHours.timezone,
    // Trading days follow the replayed bars, not the wall clock.
    clock: () => venue.currentBar.t,
    log: (msg) => logger.info(msg),
  });

  const journal: TradeJournal = opts.journal ? new SqliteTradeJournal() : new MemoryTradeJournal();
  journal.openSession({
    sessionId,
    symbol: config.symbol,
    timeframe: config.timeframe,
    mode: "paper",
    configJson: JSON.stringify(config),
    startedAt: Date.now(),
  });

  const scheduler = new ExecutionScheduler(
    ctx,
    { venue, risk, strategies, journal },
    {
      symbol: config.symbol,
      timeframe: config.timeframe,
      barCount: config.barCount,
      tickIntervalMs: config.tickIntervalSeconds * 1000,
      minSleepMs: config.minSleepMs,
      tradingHours: config.tradingHours,
      maxTicks: parseNumber("max-ticks", opts.maxTicks),
      shouldStop: () => venue.exhausted,
      clock: () => venue.nextBarTime,
      onOutsideHours: () => venue.skip(),
    }
  );

  ctx.onTeardown(ctx.installSignalHandlers());
  ctx.onTeardown(async () => {
    const account = await venue.getAccountSnapshot();
    const open = await venue.getOpenPositions();
    logger.info("=== Agent Stopped ===");
    for (const line of formatStats(scheduler.stats)) logger.info(line);
    logger.info(`Balance ${account.balance.toFixed(2)} | Equity ${account.equity.toFixed(2)} | Open positions (NOT closed): ${open.length}`);
    journal.closeSession(sessionId, scheduler.stats);
  });

  logger.info(`=== Agent Started: ${sessionId} ===`);
  logger.info(`${config.symbol} ${config.timeframe} | ${bars.length} bars from ${opts.replay}`);
  for (const s of strategies) {
    logger.info(`  ${s.enabled ? "●" : "○"} ${s.id} (${s.kind}) priority ${s.priority}, max ${s.maxPositions}, min bars ${s.minimumBars()}`);
  }
  if (logger.file) logger.info(`Log file: ${logger.file}`);

  try {
    await scheduler.run();
  } finally {
    await ctx.teardown();
  }
}

main().catch((err) => {
  console.error(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
