import { z } from "zod";
import { crossover, emaSeries, last, macdSeries, prev } from "../indicators";
import { atrTarget, columns, defineStrategy, lastAtr, swingStop } from "./define";

const params = z.object({
  fastPeriod: z.number().int().min(2).default(12),
  slowPeriod: z.number().int().min(3).default(26),
  signalPeriod: z.number().int().min(2).default(9),
  atrPeriod: z.number().int().min(1).default(14),
  stopAtrMultiplier: z.number().positive().default(1.2),
  targetAtrMultiplier: z.number().positive().default(2.4),
  zeroLineFilter: z.boolean().default(true),
  histogramConfirmation: z.boolean().default(true),
  trendFilter: z.boolean().default(true),
  trendEmaPeriod: z.number().int().min(2).default(50),
  swingLookback: z.number().int().min(2).default(10),
});

type Params = z.infer<typeof params>;

/**
 * MACD signal-line cross, filtered by the zero line (buy only from below,
 * sell only from above), a growing histogram and a longer trend EMA.
 */
export const macdCross = defineStrategy<Params>({
  kind: "macd-cross",
  name: "MACD Signal Cross",
  description: "MACD line crossing its signal line with zero-line and trend filters",
  params,
  cooldownSeconds: 300,
  minimumBars: (p) => Math.max(100, p.slowPeriod * 2, p.trendEmaPeriod),

  detect(window, p) {
    const { closes } = columns(window);
    const m = macdSeries(closes, p.fastPeriod, p.slowPeriod, p.signalPeriod);
    const cross = crossover(m.macd, m.signal);
    if (cross === null) return null;
    const side = cross === "up" ? "buy" : "sell";

    const macdNow = last(m.macd);
    if (p.zeroLineFilter && (side === "buy" ? macdNow > 0 : macdNow < 0)) return null;

    if (p.histogramConfirmation) {
      const h1 = last(m.histogram);
      const h0 = prev(m.histogram);
      if (side === "buy" ? h1 <= h0 : h1 >= h0) return null;
    }

    if (p.trendFilter) {
      const trend = last(emaSeries(closes, p.trendEmaPeriod));
      const close = last(closes);
      // 0.1% tolerance around the trend line
      if (side === "buy" && close < trend * 0.999) return null;
      if (side === "sell" && close > trend * 1.001) return null;
    }
    return side;
  },

  stopPrice(window, side, entry, p) {
    return swingStop(window, side, entry, lastAtr(window, p.atrPeriod), {
      lookback: p.swingLookback,
      buffer: 0.5,
      mult: p.stopAtrMultiplier,
      fallbackPct: 0.002,
    });
  },

  targetPrice(window, side, entry, p) {
    return atrTarget(side, entry, lastAtr(window, p.atrPeriod), p.targetAtrMultiplier, 0.004);
  },

  shouldExit(window, position, p) {
    const { closes } = columns(window);
    const m = macdSeries(closes, p.fastPeriod, p.slowPeriod, p.signalPeriod);
    const cross = crossover(m.macd, m.signal);
    return position.side === "buy" ? cross === "down" : cross === "up";
  },
});
