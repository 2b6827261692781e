/**
 * defineStrategy: turns a variant definition (pure detect/stop/target/exit
 * functions plus a zod parameter schema) into a configured `Strategy`.
 *
 * The minimum-bars gate and the cooldown live here so no variant
 * re-implements them.
 */

import type { z } from "zod";
import { atrSeries, last } from "../indicators";
import type { Bar, Position, Side } from "../types";
import type {
  ParamMap,
  Strategy,
  StrategyConfig,
  StrategyKind,
  StrategyState,
  SignalResult,
} from "./types";

export interface StrategyDefinition<P extends ParamMap> {
  kind: StrategyKind;
  name: string;
  description: string;
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  cooldownSeconds: number;
  minimumBars: (p: P) => number;
  detect: (window: Bar[], p: P) => Side | null;
  stopPrice: (window: Bar[], side: Side, entryPrice: number, p: P) => number;
  targetPrice: (window: Bar[], side: Side, entryPrice: number, p: P) => number;
  shouldExit?: (window: Bar[], position: Position, p: P) => boolean;
}

export interface StrategyFactory {
  kind: StrategyKind;
  name: string;
  description: string;
  cooldownSeconds: number;
  defaults: () => ParamMap;
  minimumBars: (params?: Record<string, unknown>) => number;
  create: (config: StrategyConfig) => Strategy;
}

export function defineStrategy<P extends ParamMap>(
  def: StrategyDefinition<P>
): StrategyFactory {
  return {
    kind: def.kind,
    name: def.name,
    description: def.description,
    cooldownSeconds: def.cooldownSeconds,
    defaults: () => def.params.parse({}),
    minimumBars: (params = {}) => def.minimumBars(def.params.parse(params)),
    create(config) {
      if (config.kind !== def.kind) {
        throw new Error(`Strategy ${config.id}: kind ${config.kind} does not match ${def.kind}`);
      }
      const p = def.params.parse(config.params);
      const minBars = def.minimumBars(p);
      const cooldownMs = (config.cooldownSeconds ?? def.cooldownSeconds) * 1000;

      const signal = (window: Bar[], state: StrategyState): SignalResult => {
        const timestamp = window.length > 0 ? window[window.length - 1].t : 0;
        const none: SignalResult = {
          signal: { direction: "none", strategyId: config.id, timestamp },
          state,
        };
        if (window.length < minBars) return none;
        const side = def.detect(window, p);
        if (side === null) return none;
        if (state.lastSignalAt !== null && timestamp - state.lastSignalAt < cooldownMs) {
          return none;
        }
        return {
          signal: { direction: side, strategyId: config.id, timestamp },
          state: { lastSignalAt: timestamp },
        };
      };

      return {
        id: config.id,
        kind: def.kind,
        name: def.name,
        description: def.description,
        enabled: config.enabled,
        priority: config.priority,
        maxPositions: config.maxPositions,
        riskFraction: config.riskFraction,
        cooldownMs,
        params: p,
        minimumBars: () => minBars,
        signal,
        stopPrice: (window, side, entry) => def.stopPrice(window, side, entry, p),
        targetPrice: (window, side, entry) => def.targetPrice(window, side, entry, p),
        shouldExit: (window, position) =>
          window.length >= minBars && (def.shouldExit?.(window, position, p) ?? false),
      };
    },
  };
}

// ── Shared helpers ───────────────────────────────────────────────────────────

export interface Columns {
  opens: number[];
  highs: number[];
  lows: number[];
  closes: number[];
  volumes: number[];
}

export function columns(window: Bar[]): Columns {
  return {
    opens: window.map((b) => b.o),
    highs: window.map((b) => b.h),
    lows: window.map((b) => b.l),
    closes: window.map((b) => b.c),
    volumes: window.map((b) => b.v),
  };
}

export function lastAtr(window: Bar[], period: number): number {
  const { highs, lows, closes } = columns(window);
  return last(atrSeries(highs, lows, closes, period));
}

export function isDegenerate(value: number): boolean {
  return !Number.isFinite(value) || value <= 0;
}

/** Stop `mult × atr` away from entry, or `fallbackPct` of entry when ATR is unusable. */
export function atrStop(
  side: Side,
  entry: number,
  atrValue: number,
  mult: number,
  fallbackPct: number
): number {
  const distance = isDegenerate(atrValue) ? entry * fallbackPct : atrValue * mult;
  return side === "buy" ? entry - distance : entry + distance;
}

export function atrTarget(
  side: Side,
  entry: number,
  atrValue: number,
  mult: number,
  fallbackPct: number
): number {
  const distance = isDegenerate(atrValue) ? entry * fallbackPct : atrValue * mult;
  return side === "buy" ? entry + distance : entry - distance;
}

/**
 * Stop behind the recent swing (low for buys, high for sells) padded by
 * `buffer × atr`, but never further than the plain ATR stop.
 */
export function swingStop(
  window: Bar[],
  side: Side,
  entry: number,
  atrValue: number,
  opts: { lookback: number; buffer: number; mult: number; fallbackPct: number }
): number {
  const plain = atrStop(side, entry, atrValue, opts.mult, opts.fallbackPct);
  if (isDegenerate(atrValue)) return plain;
  const recent = window.slice(-opts.lookback);
  if (side === "buy") {
    const swingLow = Math.min(...recent.map((b) => b.l));
    return Math.max(swingLow - atrValue * opts.buffer, plain);
  }
  const swingHigh = Math.max(...recent.map((b) => b.h));
  return Math.min(swingHigh + atrValue * opts.buffer, plain);
}
