/**
 * Shared fixtures: bar builders and an in-process venue double.
 */

import { vi } from "vitest";
import type { AccountSnapshot, Bar, Position, SymbolSpec, Timeframe } from "../src/lib/types.ts";
import type { Ack, MarketOrder, OrderResult, Venue } from "../src/lib/venue.ts";
import { TraderContext } from "../trader-agent/src/context.ts";
import { silentLogger } from "../trader-agent/src/logger.ts";

/** Monday 2026-01-05 10:00 UTC */
export const T0 = Date.UTC(2026, 0, 5, 10, 0);
export const MINUTE = 60_000;

/** Bars from closes: open = close, high/low half a unit either side. */
export function barsFromCloses(closes: number[], start: number = T0, step: number = MINUTE): Bar[] {
  return closes.map((c, i) => ({ t: start + i * step, o: c, h: c + 0.5, l: c - 0.5, c, v: 1000 }));
}

export function flatBars(n: number, price: number = 100, start: number = T0): Bar[] {
  return Array.from({ length: n }, (_, i) => ({
    t: start + i * MINUTE,
    o: price,
    h: price + 0.05,
    l: price - 0.05,
    c: price,
    v: 1000,
  }));
}

/** Falling by 0.1 per bar from 110, then a jump to 106: close crosses above EMA(5) on the last bar. */
export function emaCrossUpBars(n: number = 60): Bar[] {
  const closes = Array.from({ length: n - 1 }, (_, i) => 110 - 0.1 * i);
  closes.push(106);
  return barsFromCloses(closes);
}

/** 119 dead-flat bars, then a bullish breakout bar. */
export function squeezeBreakoutBars(volume: number = 1600, baseVolume: number = 1000): Bar[] {
  const bars = flatBars(119).map((b) => ({ ...b, v: baseVolume }));
  bars.push({ t: T0 + 119 * MINUTE, o: 100, h: 101.2, l: 99.9, c: 101, v: volume });
  return bars;
}

export function shiftTime(bars: Bar[], ms: number): Bar[] {
  return bars.map((b) => ({ ...b, t: b.t + ms }));
}

export const SPEC: SymbolSpec = {
  symbol: "XAUUSD",
  minLot: 0.01,
  maxLot: 100,
  lotStep: 0.01,
  pointSize: 0.01,
  minStopDistance: 0,
  unitValue: 1,
  marginPerLot: 100,
  tradeable: true,
};

export function account(overrides: Partial<AccountSnapshot> = {}): AccountSnapshot {
  return { balance: 10_000, equity: 10_000, margin: 0, freeMargin: 10_000, tradeAllowed: true, ...overrides };
}

export function position(overrides: Partial<Position> = {}): Position {
  return {
    ticket: "1",
    symbol: "XAUUSD",
    side: "buy",
    volume: 0.1,
    entryPrice: 100,
    currentPrice: 100,
    stop: null,
    target: null,
    openedAt: T0,
    ownerTag: "ema-crossover",
    ...overrides,
  };
}

/**
 * Venue double backed by plain fields. Every method is a vi.fn so tests can
 * inspect calls or swap in a rejection / thrown error.
 */
export class FakeVenue implements Venue {
  bars: Bar[] | null = [];
  snapshot: AccountSnapshot = account();
  spec: SymbolSpec = { ...SPEC };
  positions: Position[] = [];
  orders: MarketOrder[] = [];
  private nextTicket = 100;

  getBars = vi.fn(async (_symbol: string, _tf: Timeframe, _count: number): Promise<Bar[] | null> => this.bars);

  getAccountSnapshot = vi.fn(async (): Promise<AccountSnapshot> => ({ ...this.snapshot }));

  getSymbolSpec = vi.fn(async (_symbol: string): Promise<SymbolSpec> => ({ ...this.spec }));

  getOpenPositions = vi.fn(async (_symbol?: string): Promise<Position[]> => this.positions.map((p) => ({ ...p })));

  submitMarketOrder = vi.fn(async (order: MarketOrder): Promise<OrderResult> => {
    this.orders.push(order);
    const ticket = String(this.nextTicket++);
    const price = this.bars && this.bars.length > 0 ? this.bars[this.bars.length - 1].c : 0;
    this.positions.push({
      ticket,
      symbol: order.symbol,
      side: order.side,
      volume: order.volume,
      entryPrice: price,
      currentPrice: price,
      stop: order.stop ?? null,
      target: order.target ?? null,
      openedAt: T0,
      ownerTag: order.ownerTag,
    });
    return { ok: true, ticket, fillPrice: price, returnCode: 10009 };
  });

  modifyPosition = vi.fn(async (ticket: string, stop?: number, target?: number): Promise<Ack> => {
    const p = this.positions.find((x) => x.ticket === ticket);
    if (!p) return { ok: false, returnCode: 10036, reason: "no such position" };
    if (stop !== undefined) p.stop = stop;
    if (target !== undefined) p.target = target;
    return { ok: true };
  });

  closePosition = vi.fn(async (ticket: string, _volume?: number): Promise<Ack> => {
    const before = this.positions.length;
    this.positions = this.positions.filter((p) => p.ticket !== ticket);
    return before === this.positions.length
      ? { ok: false, returnCode: 10036, reason: "no such position" }
      : { ok: true };
  });
}

export function testContext(sessionId: string = "trader-test"): TraderContext {
  return new TraderContext({ sessionId, logger: silentLogger });
}
