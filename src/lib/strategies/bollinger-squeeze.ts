import { z } from "zod";
import { bollingerSeries, percentile, sma } from "../indicators";
import type { Bar, Side } from "../types";
import { atrTarget, columns, defineStrategy, isDegenerate, lastAtr } from "./define";

const params = z.object({
  bbPeriod: z.number().int().min(2).default(20),
  bbStdDev: z.number().positive().default(2),
  /** Number of prior widths the squeeze is ranked against. */
  squeezeLookback: z.number().int().min(5).default(50),
  squeezePercentile: z.number().min(0).max(100).default(20),
  atrPeriod: z.number().int().min(1).default(14),
  volumeConfirmation: z.boolean().default(true),
  volumeMultiple: z.number().positive().default(1.5),
  volumePeriod: z.number().int().min(1).default(20),
  minBodyRatio: z.number().min(0).max(1).default(0.5),
  trendFilter: z.boolean().default(true),
  trendPeriod: z.number().int().min(2).default(50),
  stopAtrMultiplier: z.number().positive().default(1.0),
  targetAtrMultiplier: z.number().positive().default(2.5),
});

type Params = z.infer<typeof params>;

/** True when the bar before the last one sat in a squeeze. */
export function inSqueeze(widths: number[], lookback: number, pct: number): boolean {
  const at = widths.length - 2;
  const history = widths.slice(at - lookback, at);
  if (at - lookback < 0 || history.some((w) => Number.isNaN(w))) return false;
  return widths[at] <= percentile(history, pct);
}

function breakoutBody(bar: Bar, side: Side, minRatio: number): boolean {
  const range = bar.h - bar.l;
  if (range <= 0) return false;
  const body = bar.c - bar.o;
  if (side === "buy" ? body <= 0 : body >= 0) return false;
  return Math.abs(body) / range >= minRatio;
}

/**
 * Bollinger squeeze: bands contract into the low end of their recent width
 * distribution, then the next bar closes outside them.
 */
export const bollingerSqueeze = defineStrategy<Params>({
  kind: "bollinger-squeeze",
  name: "Bollinger Squeeze",
  description: "Breakout from a volatility squeeze with body, volume and trend confirmation",
  params,
  cooldownSeconds: 300,
  minimumBars: (p) => Math.max(100, p.bbPeriod * 2, p.squeezeLookback + p.bbPeriod + 1),

  detect(window, p) {
    const { closes, volumes } = columns(window);
    const n = window.length;
    const bb = bollingerSeries(closes, p.bbPeriod, p.bbStdDev);
    if (!inSqueeze(bb.width, p.squeezeLookback, p.squeezePercentile)) return null;

    const close = closes[n - 1];
    const before = closes[n - 2];
    let side: Side | null = null;
    if (close > bb.upper[n - 1] && before <= bb.upper[n - 2]) side = "buy";
    else if (close < bb.lower[n - 1] && before >= bb.lower[n - 2]) side = "sell";
    if (side === null) return null;

    if (!breakoutBody(window[n - 1], side, p.minBodyRatio)) return null;

    if (p.volumeConfirmation) {
      const avg = sma(volumes, p.volumePeriod);
      if (!(volumes[n - 1] >= avg * p.volumeMultiple)) return null;
    }

    if (p.trendFilter) {
      const trend = sma(closes, p.trendPeriod);
      if (side === "buy" ? close <= trend : close >= trend) return null;
    }
    return side;
  },

  stopPrice(window, side, entry, p) {
    const atrNow = lastAtr(window, p.atrPeriod);
    if (isDegenerate(atrNow)) return side === "buy" ? entry * 0.998 : entry * 1.002;
    const middle = sma(columns(window).closes, p.bbPeriod);
    const plain = p.stopAtrMultiplier * atrNow;
    return side === "buy"
      ? Math.max(middle - 0.5 * atrNow, entry - plain)
      : Math.min(middle + 0.5 * atrNow, entry + plain);
  },

  targetPrice: (window, side, entry, p) =>
    atrTarget(side, entry, lastAtr(window, p.atrPeriod), p.targetAtrMultiplier, 0.004),

  shouldExit(window, position, p) {
    const { closes } = columns(window);
    const middle = sma(closes, p.bbPeriod);
    const close = closes[closes.length - 1];
    return position.side === "buy" ? close <= middle : close >= middle;
  },
});
