/**
 * Venue: the brokerage/market-data collaborator. Rejections come back as
 * values; a thrown error means the call never completed (connectivity).
 */

import type { AccountSnapshot, Bar, Position, Side, SymbolSpec, Timeframe } from "./types";

export interface Rejected {
  ok: false;
  returnCode: number;
  reason: string;
}

export interface OrderFill {
  ok: true;
  ticket: string;
  fillPrice: number;
  returnCode: number;
}

export type OrderResult = OrderFill | Rejected;

export type Ack = { ok: true } | Rejected;

export interface MarketOrder {
  symbol: string;
  side: Side;
  volume: number;
  stop?: number;
  target?: number;
  ownerTag: string;
}

export interface Venue {
  /** Trailing `count` bars, oldest first, or null when data is unavailable. */
  getBars(symbol: string, timeframe: Timeframe, count: number): Promise<Bar[] | null>;
  getAccountSnapshot(): Promise<AccountSnapshot>;
  getSymbolSpec(symbol: string): Promise<SymbolSpec>;
  getOpenPositions(symbol?: string): Promise<Position[]>;
  submitMarketOrder(order: MarketOrder): Promise<OrderResult>;
  modifyPosition(ticket: string, stop?: number, target?: number): Promise<Ack>;
  closePosition(ticket: string, volume?: number): Promise<Ack>;
}
