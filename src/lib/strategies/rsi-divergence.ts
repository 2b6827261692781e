import { z } from "zod";
import { last, rsiSeries, sma } from "../indicators";
import { atrTarget, columns, defineStrategy, lastAtr, swingStop } from "./define";

const params = z.object({
  rsiPeriod: z.number().int().min(2).default(14),
  lookback: z.number().int().min(4).default(10),
  overbought: z.number().min(0).max(100).default(70),
  oversold: z.number().min(0).max(100).default(30),
  /** Minimum RSI gap between the two extremes. */
  minDivergence: z.number().nonnegative().default(5),
  atrPeriod: z.number().int().min(1).default(14),
  stopAtrMultiplier: z.number().positive().default(1.0),
  targetAtrMultiplier: z.number().positive().default(2.0),
  volumeConfirmation: z.boolean().default(true),
  volumeMultiple: z.number().positive().default(1.2),
  volumePeriod: z.number().int().min(1).default(10),
  swingLookback: z.number().int().min(2).default(10),
});

type Params = z.infer<typeof params>;

/** Index of the first min (or max) of `values` within [from, to). */
function extremeIndex(values: number[], from: number, to: number, kind: "min" | "max"): number {
  let best = from;
  for (let i = from + 1; i < to; i++) {
    if (kind === "min" ? values[i] < values[best] : values[i] > values[best]) best = i;
  }
  return best;
}

export interface Divergence {
  /** Index of the latest price extreme. */
  current: number;
  previous: number;
  /** RSI at the latest price extreme. */
  rsi: number;
}

/**
 * Over the last `lookback + 1` bars, find the price extreme and the extreme
 * before it (at least 3 bars of history required). Bullish: lower low in
 * price, higher low in RSI. Bearish: the mirror on highs.
 */
export function findDivergence(
  prices: number[],
  rsi: number[],
  lookback: number,
  kind: "bullish" | "bearish",
  minDivergence: number
): Divergence | null {
  const n = prices.length;
  const from = n - (lookback + 1);
  if (from < 0) return null;
  const ext = kind === "bullish" ? "min" : "max";

  const current = extremeIndex(prices, from, n, ext);
  if (current - from < 3) return null;
  const previous = extremeIndex(prices, from, current, ext);

  const gap = kind === "bullish" ? rsi[current] - rsi[previous] : rsi[previous] - rsi[current];
  const priceBreaks = kind === "bullish" ? prices[current] < prices[previous] : prices[current] > prices[previous];
  if (!priceBreaks || !(gap > 0) || gap < minDivergence) return null;
  return { current, previous, rsi: rsi[current] };
}

export const rsiDivergence = defineStrategy<Params>({
  kind: "rsi-divergence",
  name: "RSI Divergence",
  description: "Price and RSI extremes disagreeing, confirmed by volume",
  params,
  cooldownSeconds: 300,
  minimumBars: (p) => Math.max(100, p.rsiPeriod * 3, p.lookback * 2),

  detect(window, p) {
    const { highs, lows, closes, volumes } = columns(window);
    const rsi = rsiSeries(closes, p.rsiPeriod);

    let side: "buy" | "sell" | null = null;
    const bullish = findDivergence(lows, rsi, p.lookback, "bullish", p.minDivergence);
    const bearish = findDivergence(highs, rsi, p.lookback, "bearish", p.minDivergence);
    if (bullish && bullish.rsi < p.oversold + 10) side = "buy";
    else if (bearish && bearish.rsi > p.overbought - 10) side = "sell";
    if (side === null) return null;

    if (p.volumeConfirmation) {
      const avg = sma(volumes, p.volumePeriod);
      if (!(last(volumes) > avg * p.volumeMultiple)) return null;
    }
    return side;
  },

  stopPrice(window, side, entry, p) {
    return swingStop(window, side, entry, lastAtr(window, p.atrPeriod), {
      lookback: p.swingLookback,
      buffer: 0.5,
      mult: p.stopAtrMultiplier,
      fallbackPct: 0.0015,
    });
  },

  targetPrice: (window, side, entry, p) =>
    atrTarget(side, entry, lastAtr(window, p.atrPeriod), p.targetAtrMultiplier, 0.003),

  shouldExit(window, position, p) {
    const rsiNow = last(rsiSeries(columns(window).closes, p.rsiPeriod));
    return position.side === "buy" ? rsiNow >= p.overbought : rsiNow <= p.oversold;
  },
});
