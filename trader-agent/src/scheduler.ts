/**
 * Execution scheduler: the single control loop.
 *
 * Each tick runs strictly in order:
 *   Fetch → TrailingUpdate → ExitScan → EntryScan → Telemetry → Sleep
 *
 * Exits are processed before any entry is considered, and each strategy gets
 * at most one signal / validation / submission per tick. A thrown venue call
 * abandons the tick; the loop carries on with the next one.
 *
 * Known limitation: account and position snapshots are read and then acted
 * on without locking, so another writer on the same account can race the
 * submission. This process assumes it is the only writer.
 */

import type { TraderContext } from "./context.js";
import type { TradeJournal, TradeRecord } from "./tradelog.js";
import type { TradingHours } from "./hours.js";
import { isWithinTradingHours } from "./hours.js";
import {
  accumulate,
  emptyStats,
  newTick,
  type SessionStats,
  type StrategyCounters,
  type TickTelemetry,
} from "./telemetry.js";
import { PositionBook, PositionTracker } from "../../src/lib/positions";
import type { RiskManager } from "../../src/lib/risk";
import type { Strategy, StrategyState } from "../../src/lib/strategies/types";
import type { Venue } from "../../src/lib/venue";
import type { AccountSnapshot, Bar, Position, SymbolSpec, Timeframe } from "../../src/lib/types";
import {
  BrokerRejectionError,
  ConnectivityError,
  DataUnavailableError,
  RiskBreachError,
  TraderError,
  ValidationError,
  errorMessage,
} from "../../src/lib/errors";

export interface SchedulerOptions {
  symbol: string;
  timeframe: Timeframe;
  barCount: number;
  tickIntervalMs: number;
  /** Floor for the sleep between ticks. */
  minSleepMs: number;
  tradingHours?: TradingHours;
  /** Stop after this many ticks. */
  maxTicks?: number;
  /** Checked after every tick; true ends the loop (e.g. replay exhausted). */
  shouldStop?: () => boolean;
  /** Called on ticks the trading-hours gate skips; a replay lets a bar pass here. */
  onOutsideHours?: () => void;
  /** Market time for the hours gate and tick timestamps (a replay passes bar time). */
  clock?: () => number;
}

export interface SchedulerDeps {
  venue: Venue;
  risk: RiskManager;
  /** Already in execution order (see buildStrategies). */
  strategies: Strategy[];
  journal: TradeJournal;
  tracker?: PositionTracker;
}

export class ExecutionScheduler {
  readonly stats: SessionStats;
  private readonly ctx: TraderContext;
  private readonly venue: Venue;
  private readonly risk: RiskManager;
  private readonly strategies: Strategy[];
  private readonly byId: Map<string, Strategy>;
  private readonly journal: TradeJournal;
  private readonly tracker: PositionTracker;
  private readonly opts: SchedulerOptions;
  private readonly clock: () => number;
  private readonly states = new Map<string, StrategyState>();
  private seq = 0;

  constructor(ctx: TraderContext, deps: SchedulerDeps, opts: SchedulerOptions) {
    this.ctx = ctx;
    this.venue = deps.venue;
    this.risk = deps.risk;
    this.strategies = deps.strategies;
    this.byId = new Map(deps.strategies.map((s) => [s.id, s]));
    this.journal = deps.journal;
    this.tracker = deps.tracker ?? new PositionTracker(deps.venue);
    this.opts = opts;
    this.clock = opts.clock ?? Date.now;
    this.stats = emptyStats(deps.strategies.map((s) => s.id));
  }

  get ticks(): number {
    return this.seq;
  }

  strategyState(id: string): StrategyState {
    return this.states.get(id) ?? { lastSignalAt: null };
  }

  resetStrategyStates(): void {
    this.states.clear();
  }

  private counters(id: string): StrategyCounters {
    let c = this.stats.byStrategy[id];
    if (!c) {
      c = { signals: 0, submitted: 0, failed: 0, blocked: 0, exits: 0 };
      this.stats.byStrategy[id] = c;
    }
    return c;
  }

  /** Run a venue call; a throw becomes a ConnectivityError. */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new ConnectivityError(operation, err);
    }
  }

  private record(r: Omit<TradeRecord, "sessionId">): void {
    try {
      this.journal.recordTrade({ sessionId: this.ctx.sessionId, ...r });
    } catch (err) {
      this.ctx.logger.warn(`[TRADELOG] Failed to record ${r.action} ${r.ticket}: ${errorMessage(err)}`);
    }
  }

  // ── Tick ───────────────────────────────────────────────────────────────────

  async tick(): Promise<TickTelemetry> {
    const now = this.clock();
    const started = Date.now();
    this.seq++;
    const t = newTick(this.ctx.sessionId, this.seq, now);

    if (this.opts.tradingHours && !isWithinTradingHours(new Date(now), this.opts.tradingHours)) {
      t.outcome = "outside_hours";
      this.ctx.logger.verbose(`[TICK] #${t.seq} outside trading hours`);
      this.opts.onOutsideHours?.();
    } else {
      try {
        await this.runPhases(t);
      } catch (err) {
        t.outcome = "abandoned";
        t.error = errorMessage(err);
        const kind = err instanceof TraderError ? err.kind : "internal";
        this.ctx.logger.error(`[TICK] #${t.seq} abandoned (${kind}): ${t.error}`);
      }
    }

    t.durationMs = Date.now() - started;
    accumulate(this.stats, t);
    try {
      this.journal.recordTick(t);
    } catch (err) {
      this.ctx.logger.warn(`[TRADELOG] Failed to record tick #${t.seq}: ${errorMessage(err)}`);
    }
    if (t.outcome === "completed") {
      this.ctx.logger.verbose(
        `[TICK] #${t.seq} bars=${t.bars} signals=${t.signals} submitted=${t.submitted} failed=${t.failed} ` +
          `blocked=${t.blocked} exits=${t.exits} trailed=${t.stopsUpdated} (${t.durationMs}ms)`
      );
    }
    return t;
  }

  private noData(t: TickTelemetry, err: DataUnavailableError): void {
    t.outcome = "no_data";
    t.error = err.message;
    this.ctx.logger.verbose(`[TICK] #${t.seq} (${err.kind}) ${err.message}`);
  }

  private async runPhases(t: TickTelemetry): Promise<void> {
    const { symbol, timeframe, barCount } = this.opts;

    // Fetch
    const bars = await this.call("getBars", () => this.venue.getBars(symbol, timeframe, barCount));
    if (bars === null || bars.length === 0) {
      this.noData(t, new DataUnavailableError(`no bars for ${symbol} ${timeframe}`));
      return;
    }
    t.bars = bars.length;
    const enabled = this.strategies.filter((s) => s.enabled);
    // With nothing enabled, trailing and exits still run on whatever is open.
    const needed = enabled.length > 0 ? Math.min(...enabled.map((s) => s.minimumBars())) : 0;
    if (bars.length < needed) {
      this.noData(t, new DataUnavailableError(`${bars.length} bars, every strategy needs at least ${needed}`));
      return;
    }
    const spec = await this.call("getSymbolSpec", () => this.venue.getSymbolSpec(symbol));
    let book = await this.call("getOpenPositions", () => this.tracker.refresh(symbol));

    // TrailingUpdate
    if (this.risk.limits.trailingStop && book.size > 0) {
      const distance = this.risk.limits.trailingStopPoints * spec.pointSize;
      const trail = await this.call("modifyPosition", () =>
        this.risk.updateTrailingStops(this.venue, book.toArray(), distance)
      );
      t.stopsUpdated = trail.updated.length;
      for (const u of trail.updated) {
        this.ctx.logger.verbose(`[TRAIL] #${u.ticket} ${u.side} stop ${u.from ?? "none"} → ${u.to}`);
      }
      for (const r of trail.rejected) {
        this.ctx.logger.warn(`[TRAIL] #${r.update.ticket} stop update rejected: ${r.reason}`);
      }
    }

    // ExitScan
    book = await this.exitScan(t, bars, book);

    // EntryScan
    const fills = await this.entryScan(t, bars, spec, book);

    const finalBook = new PositionBook([...book.positions, ...fills]);
    t.positionsByStrategy = finalBook.counts(this.strategies.map((s) => s.id));
    t.outcome = "completed";
  }

  private async exitScan(t: TickTelemetry, bars: Bar[], book: PositionBook): Promise<PositionBook> {
    const closed: string[] = [];
    const price = bars[bars.length - 1].c;
    for (const position of book.positions) {
      const owner = this.byId.get(position.ownerTag);
      if (!owner || !owner.shouldExit(bars, position)) continue;

      const ack = await this.call("closePosition", () => this.venue.closePosition(position.ticket));
      if (!ack.ok) {
        t.exitFailures++;
        const err = new BrokerRejectionError(`close #${position.ticket}`, ack.returnCode, ack.reason);
        this.ctx.logger.warn(`[EXIT] ${owner.id}: ${err.message}`);
        continue;
      }
      t.exits++;
      this.counters(owner.id).exits++;
      closed.push(position.ticket);
      this.ctx.logger.info(`[EXIT] ${owner.id} closed #${position.ticket} ${position.side} ${position.volume} @ ~${price}`);
      this.record({
        strategyId: owner.id,
        action: "close",
        ticket: position.ticket,
        symbol: position.symbol,
        side: position.side,
        volume: position.volume,
        price,
        stop: position.stop,
        target: position.target,
        returnCode: null,
        warnings: [],
        reason: "exit signal",
        at: bars[bars.length - 1].t,
      });
    }
    return closed.length > 0 ? book.without(closed) : book;
  }

  private async entryScan(
    t: TickTelemetry,
    bars: Bar[],
    spec: SymbolSpec,
    book: PositionBook
  ): Promise<Position[]> {
    const fills: Position[] = [];
    const last = bars[bars.length - 1];
    let account: AccountSnapshot | null = null;

    for (const s of this.strategies) {
      if (!s.enabled) continue;

      const owned = book.count(s.id) + fills.filter((f) => f.ownerTag === s.id).length;
      if (owned >= s.maxPositions) {
        this.ctx.logger.verbose(`[ENTRY] ${s.id} at cap (${owned}/${s.maxPositions}), skipped`);
        continue;
      }
      if (bars.length < s.minimumBars()) {
        this.ctx.logger.verbose(`[ENTRY] ${s.id} needs ${s.minimumBars()} bars, have ${bars.length}`);
        continue;
      }

      const { signal, state } = s.signal(bars, this.strategyState(s.id));
      this.states.set(s.id, state);
      if (signal.direction === "none") continue;
      const side = signal.direction;
      t.signals++;
      const counters = this.counters(s.id);
      counters.signals++;

      account ??= await this.call("getAccountSnapshot", () => this.venue.getAccountSnapshot());
      // Fills from this tick count against caps even though the venue list is not re-read.
      const positions = [...book.positions, ...fills];
      const gate = this.risk.checkTradingAllowed(account, positions, s.id, s.maxPositions);
      if (!gate.ok) {
        t.blocked++;
        counters.blocked++;
        const err = new RiskBreachError(`${s.id} ${side} blocked: ${gate.reason ?? "not allowed"}`);
        this.ctx.logger.info(`[RISK] (${err.kind}) ${err.message}`);
        continue;
      }

      const entry = last.c;
      const stop = s.stopPrice(bars, side, entry);
      const target = s.targetPrice(bars, side, entry);
      const volume = this.risk.positionSize(account, spec, entry, stop, s.riskFraction);
      const validation = this.risk.validateTrade({
        account,
        positions,
        spec,
        side,
        volume,
        entryPrice: entry,
        stop,
        target,
      });
      for (const w of validation.warnings) this.ctx.logger.verbose(`[ENTRY] ${s.id} adjusted: ${w}`);
      if (!validation.valid) {
        t.failed++;
        counters.failed++;
        this.ctx.logger.warn(`[ENTRY] ${s.id} ${side} invalid: ${new ValidationError(validation.errors).message}`);
        continue;
      }

      const result = await this.call("submitMarketOrder", () =>
        this.venue.submitMarketOrder({
          symbol: spec.symbol,
          side,
          volume: validation.volume,
          stop,
          target,
          ownerTag: s.id,
        })
      );
      if (!result.ok) {
        t.failed++;
        counters.failed++;
        const err = new BrokerRejectionError(`${side} ${validation.volume} ${spec.symbol}`, result.returnCode, result.reason);
        this.ctx.logger.warn(`[ENTRY] ${s.id}: ${err.message}`);
        continue;
      }

      t.submitted++;
      counters.submitted++;
      this.ctx.logger.info(
        `[ENTRY] ${s.id} ${side.toUpperCase()} ${validation.volume} ${spec.symbol} @ ${result.fillPrice} ` +
          `SL ${stop.toFixed(5)} TP ${target.toFixed(5)} #${result.ticket}`
      );
      fills.push({
        ticket: result.ticket,
        symbol: spec.symbol,
        side,
        volume: validation.volume,
        entryPrice: result.fillPrice,
        currentPrice: result.fillPrice,
        stop,
        target,
        openedAt: last.t,
        ownerTag: s.id,
      });
      this.record({
        strategyId: s.id,
        action: "open",
        ticket: result.ticket,
        symbol: spec.symbol,
        side,
        volume: validation.volume,
        price: result.fillPrice,
        stop,
        target,
        returnCode: result.returnCode,
        warnings: validation.warnings,
        reason: null,
        at: last.t,
      });
      account = null;
    }
    return fills;
  }

  // ── Loop ───────────────────────────────────────────────────────────────────

  /** Tick until shutdown is requested, maxTicks is reached or shouldStop() says so. */
  async run(): Promise<SessionStats> {
    const { tickIntervalMs, minSleepMs, maxTicks, shouldStop } = this.opts;
    while (this.ctx.running) {
      const started = Date.now();
      await this.tick();
      if (maxTicks !== undefined && this.seq >= maxTicks) {
        this.ctx.requestShutdown(`reached ${maxTicks} ticks`);
        break;
      }
      if (shouldStop?.()) {
        this.ctx.requestShutdown("stop condition met");
        break;
      }
      const elapsed = Date.now() - started;
      await this.ctx.sleep(Math.max(minSleepMs, tickIntervalMs - elapsed));
    }
    return this.stats;
  }
}
