/**
 * Strategy types: every variant implements the same contract and the
 * scheduler dispatches only through it.
 */

import type { Bar, Position, Side } from "../types";

export type Direction = Side | "none";

export interface Signal {
  direction: Direction;
  strategyId: string;
  /** Timestamp of the bar the signal was derived on. */
  timestamp: number;
}

/** Cooldown state, owned by the caller and threaded through `signal()`. */
export interface StrategyState {
  lastSignalAt: number | null;
}

export const INITIAL_STATE: StrategyState = { lastSignalAt: null };

export interface SignalResult {
  signal: Signal;
  state: StrategyState;
}

export const STRATEGY_KINDS = [
  "ema-crossover",
  "macd-cross",
  "rsi-divergence",
  "bollinger-squeeze",
  "stochastic-reversal",
  "momentum-breakout",
  "mean-reversion",
  "scalping",
] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

export type ParamValue = number | boolean;
export type ParamMap = Record<string, ParamValue>;

/** Per-instance configuration. `id` doubles as the ownership tag. */
export interface StrategyConfig {
  id: string;
  kind: StrategyKind;
  enabled: boolean;
  /** Lower runs first. */
  priority: number;
  maxPositions: number;
  riskFraction?: number;
  cooldownSeconds?: number;
  params: Record<string, unknown>;
}

export interface Strategy {
  id: string;
  kind: StrategyKind;
  name: string;
  description: string;
  enabled: boolean;
  priority: number;
  maxPositions: number;
  riskFraction?: number;
  cooldownMs: number;
  /** Resolved parameters, defaults filled in. */
  params: Readonly<ParamMap>;
  minimumBars: () => number;
  signal: (window: Bar[], state: StrategyState) => SignalResult;
  stopPrice: (window: Bar[], side: Side, entryPrice: number) => number;
  targetPrice: (window: Bar[], side: Side, entryPrice: number) => number;
  shouldExit: (window: Bar[], position: Position) => boolean;
}
