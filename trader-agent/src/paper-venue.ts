/**
 * Paper venue: replays a bar file one bar per `getBars` call and keeps a
 * virtual account. Orders fill at the latest close; stops and targets are
 * settled against each new bar's range (stop first when both are touched).
 */

import type { Ack, MarketOrder, OrderResult, Venue } from "../../src/lib/venue";
import type { AccountSnapshot, Bar, Position, Side, SymbolSpec, Timeframe } from "../../src/lib/types";
import { grossPnl, realizedPnl, requiredMargin } from "../../src/lib/pnl";
import { isOnStep } from "../../src/lib/risk";

/** Return codes, numbered the way MT5-style terminals report them. */
export const RETCODE = {
  DONE: 10009,
  INVALID: 10013,
  INVALID_VOLUME: 10014,
  TRADE_DISABLED: 10017,
  NO_MONEY: 10019,
  POSITION_CLOSED: 10036,
} as const;

export interface PaperVenueOptions {
  bars: Bar[];
  symbol: string;
  spec: Omit<SymbolSpec, "symbol">;
  balance: number;
  /** Bars already visible before the first tick. */
  warmup?: number;
  commissionPerLot?: number;
}

interface PaperPosition {
  ticket: string;
  side: Side;
  volume: number;
  entryPrice: number;
  stop: number | null;
  target: number | null;
  openedAt: number;
  ownerTag: string;
}

export interface ClosedTrade {
  ticket: string;
  side: Side;
  volume: number;
  entryPrice: number;
  exitPrice: number;
  pnl: number;
  reason: "stop" | "target" | "close";
  ownerTag: string;
  closedAt: number;
}

export class PaperVenue implements Venue {
  readonly symbol: string;
  readonly closedTrades: ClosedTrade[] = [];
  tradeAllowed = true;

  private readonly bars: Bar[];
  private readonly spec: SymbolSpec;
  private readonly commissionPerLot: number;
  private balance: number;
  private cursor: number;
  private started = false;
  private done = false;
  private nextTicket = 1;
  private readonly open = new Map<string, PaperPosition>();

  constructor(opts: PaperVenueOptions) {
    if (opts.bars.length === 0) throw new Error("PaperVenue needs at least one bar");
    this.bars = opts.bars;
    this.symbol = opts.symbol;
    this.spec = { symbol: opts.symbol, ...opts.spec };
    this.balance = opts.balance;
    this.commissionPerLot = opts.commissionPerLot ?? 0;
    this.cursor = Math.min(Math.max(1, opts.warmup ?? 1), opts.bars.length) - 1;
  }

  get exhausted(): boolean {
    return this.done;
  }

  get currentBar(): Bar {
    return this.bars[this.cursor];
  }

  private get price(): number {
    return this.currentBar.c;
  }

  private settle(bar: Bar): void {
    for (const p of [...this.open.values()]) {
      const stopHit =
        p.stop !== null && (p.side === "buy" ? bar.l <= p.stop : bar.h >= p.stop);
      const targetHit =
        p.target !== null && (p.side === "buy" ? bar.h >= p.target : bar.l <= p.target);
      if (stopHit && p.stop !== null) this.realize(p, p.volume, p.stop, "stop", bar.t);
      else if (targetHit && p.target !== null) this.realize(p, p.volume, p.target, "target", bar.t);
    }
  }

  private realize(
    p: PaperPosition,
    volume: number,
    exitPrice: number,
    reason: ClosedTrade["reason"],
    at: number
  ): void {
    const pnl = realizedPnl(p.side, p.entryPrice, exitPrice, volume, this.spec, this.commissionPerLot);
    this.balance += pnl;
    this.closedTrades.push({
      ticket: p.ticket,
      side: p.side,
      volume,
      entryPrice: p.entryPrice,
      exitPrice,
      pnl,
      reason,
      ownerTag: p.ownerTag,
      closedAt: at,
    });
    const remaining = Number((p.volume - volume).toFixed(8));
    if (remaining <= 0) this.open.delete(p.ticket);
    else p.volume = remaining;
  }

  /** Replay time: the open time of the bar the next `getBars` call reveals. */
  get nextBarTime(): number {
    const next = this.started ? Math.min(this.cursor + 1, this.bars.length - 1) : this.cursor;
    return this.bars[next].t;
  }

  /** Move to the next bar. False once the replay has run out. */
  private advance(): boolean {
    if (this.done) return false;
    if (this.started) {
      if (this.cursor + 1 >= this.bars.length) {
        this.done = true;
        return false;
      }
      this.cursor++;
      this.settle(this.bars[this.cursor]);
    }
    this.started = true;
    return true;
  }

  /** Let one bar pass unseen, e.g. while the trading-hours gate is closed. */
  skip(): void {
    this.advance();
  }

  async getBars(symbol: string, _timeframe: Timeframe, count: number): Promise<Bar[] | null> {
    if (symbol !== this.symbol) return null;
    if (!this.advance()) return null;
    return this.bars.slice(Math.max(0, this.cursor - count + 1), this.cursor + 1);
  }

  async getAccountSnapshot(): Promise<AccountSnapshot> {
    let unrealized = 0;
    let margin = 0;
    for (const p of this.open.values()) {
      unrealized += grossPnl(p.side, p.entryPrice, this.price, p.volume, this.spec.unitValue);
      margin += requiredMargin(p.volume, this.spec);
    }
    const equity = this.balance + unrealized;
    return {
      balance: this.balance,
      equity,
      margin,
      freeMargin: equity - margin,
      tradeAllowed: this.tradeAllowed,
    };
  }

  async getSymbolSpec(symbol: string): Promise<SymbolSpec> {
    if (symbol !== this.symbol) return { ...this.spec, symbol, tradeable: false };
    return { ...this.spec };
  }

  async getOpenPositions(symbol?: string): Promise<Position[]> {
    if (symbol !== undefined && symbol !== this.symbol) return [];
    return [...this.open.values()].map((p) => ({
      ticket: p.ticket,
      symbol: this.symbol,
      side: p.side,
      volume: p.volume,
      entryPrice: p.entryPrice,
      currentPrice: this.price,
      stop: p.stop,
      target: p.target,
      openedAt: p.openedAt,
      ownerTag: p.ownerTag,
    }));
  }

  async submitMarketOrder(order: MarketOrder): Promise<OrderResult> {
    if (order.symbol !== this.symbol) {
      return { ok: false, returnCode: RETCODE.INVALID, reason: `unknown symbol ${order.symbol}` };
    }
    if (!this.spec.tradeable || !this.tradeAllowed) {
      return { ok: false, returnCode: RETCODE.TRADE_DISABLED, reason: "trading disabled" };
    }
    if (
      !(order.volume > 0) ||
      order.volume < this.spec.minLot ||
      order.volume > this.spec.maxLot ||
      !isOnStep(order.volume, this.spec.lotStep)
    ) {
      return { ok: false, returnCode: RETCODE.INVALID_VOLUME, reason: `invalid volume ${order.volume}` };
    }
    const account = await this.getAccountSnapshot();
    if (requiredMargin(order.volume, this.spec) > account.freeMargin) {
      return { ok: false, returnCode: RETCODE.NO_MONEY, reason: "not enough free margin" };
    }

    const ticket = String(this.nextTicket++);
    this.open.set(ticket, {
      ticket,
      side: order.side,
      volume: order.volume,
      entryPrice: this.price,
      stop: order.stop ?? null,
      target: order.target ?? null,
      openedAt: this.currentBar.t,
      ownerTag: order.ownerTag,
    });
    return { ok: true, ticket, fillPrice: this.price, returnCode: RETCODE.DONE };
  }

  async modifyPosition(ticket: string, stop?: number, target?: number): Promise<Ack> {
    const p = this.open.get(ticket);
    if (!p) return { ok: false, returnCode: RETCODE.POSITION_CLOSED, reason: `no open position ${ticket}` };
    if (stop !== undefined) p.stop = stop;
    if (target !== undefined) p.target = target;
    return { ok: true };
  }

  async closePosition(ticket: string, volume?: number): Promise<Ack> {
    const p = this.open.get(ticket);
    if (!p) return { ok: false, returnCode: RETCODE.POSITION_CLOSED, reason: `no open position ${ticket}` };
    const closeVolume = volume === undefined ? p.volume : Math.min(volume, p.volume);
    if (!(closeVolume > 0)) {
      return { ok: false, returnCode: RETCODE.INVALID_VOLUME, reason: `invalid volume ${volume}` };
    }
    this.realize(p, closeVolume, this.price, "close", this.currentBar.t);
    return { ok: true };
  }
}
