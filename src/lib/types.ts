/**
 * Shared market/account data model.
 */

/** One bar. `t` is the bar open time in epoch ms. */
export interface Bar {
  t: number;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
}

export type Side = "buy" | "sell";

export type Timeframe = "M1" | "M5" | "M15" | "M30" | "H1" | "H4" | "D1";

/** An open position as reported by the venue. The venue is the source of truth. */
export interface Position {
  ticket: string;
  symbol: string;
  side: Side;
  volume: number;
  entryPrice: number;
  currentPrice: number;
  stop: number | null;
  target: number | null;
  openedAt: number;
  /** Strategy instance id attached at submission. */
  ownerTag: string;
}

export interface AccountSnapshot {
  balance: number;
  equity: number;
  margin: number;
  freeMargin: number;
  tradeAllowed: boolean;
}

export interface SymbolSpec {
  symbol: string;
  minLot: number;
  maxLot: number;
  lotStep: number;
  pointSize: number;
  /** Minimum stop/target distance from entry, in points. */
  minStopDistance: number;
  /** Account-currency value of a one-unit price move for one lot. */
  unitValue: number;
  /** Margin required to hold one lot. */
  marginPerLot: number;
  tradeable: boolean;
}

export interface RiskLimits {
  maxPositions: number;
  riskPerTrade: number;
  maxDailyLoss: number;
  maxDrawdown: number;
  trailingStop: boolean;
  /** Trailing distance in points; converted with the symbol's point size. */
  trailingStopPoints: number;
  /** Fraction of free margin a single new position may consume. */
  marginUsageCap: number;
  /** Upper bound on volume as a multiple of the risk amount per unit value. */
  maxRiskMultiple: number;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = {
  maxPositions: 5,
  riskPerTrade: 0.01,
  maxDailyLoss: 0.05,
  maxDrawdown: 0.1,
  trailingStop: true,
  trailingStopPoints: 3,
  marginUsageCap: 0.5,
  maxRiskMultiple: 10,
};

export interface TradeValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
  volume: number;
}
