import { z } from "zod";
import { bollingerSeries, last, rsiSeries, sma } from "../indicators";
import { columns, defineStrategy } from "./define";

const params = z.object({
  maPeriod: z.number().int().min(2).default(10),
  stdMultiplier: z.number().positive().default(1.0),
  rsiPeriod: z.number().int().min(2).default(7),
  oversold: z.number().min(0).max(100).default(40),
  overbought: z.number().min(0).max(100).default(60),
  /** Floor for stop and target distance, as a fraction of entry. */
  minStopPct: z.number().positive().default(0.002),
});

type Params = z.infer<typeof params>;

/**
 * Mean reversion: fade closes outside a short band when RSI agrees,
 * targeting the moving average.
 */
export const meanReversion = defineStrategy<Params>({
  kind: "mean-reversion",
  name: "Mean Reversion",
  description: "Buy below the lower band, sell above the upper band, target the mean",
  params,
  cooldownSeconds: 3,
  minimumBars: (p) => Math.max(30, p.maPeriod + 1, p.rsiPeriod + 1),

  detect(window, p) {
    const { closes } = columns(window);
    const bands = bollingerSeries(closes, p.maPeriod, p.stdMultiplier);
    const close = last(closes);
    const rsiNow = last(rsiSeries(closes, p.rsiPeriod));
    if (close < last(bands.lower) && rsiNow < p.oversold) return "buy";
    if (close > last(bands.upper) && rsiNow > p.overbought) return "sell";
    return null;
  },

  stopPrice(window, side, entry, p) {
    const ma = sma(columns(window).closes, p.maPeriod);
    const gap = Number.isNaN(ma) ? 0 : Math.abs(ma - entry);
    const distance = Math.max(gap, entry * p.minStopPct);
    return side === "buy" ? entry - distance : entry + distance;
  },

  targetPrice(window, side, entry, p) {
    const ma = sma(columns(window).closes, p.maPeriod);
    if (side === "buy") return ma > entry ? ma : entry * (1 + p.minStopPct);
    return ma < entry ? ma : entry * (1 - p.minStopPct);
  },

  shouldExit(window, position, p) {
    const { closes } = columns(window);
    const ma = sma(closes, p.maPeriod);
    const close = last(closes);
    return position.side === "buy" ? close >= ma : close <= ma;
  },
});
