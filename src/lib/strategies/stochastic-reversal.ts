import { z } from "zod";
import { crossover, last, rsiSeries, stochasticSeries } from "../indicators";
import { atrTarget, columns, defineStrategy, lastAtr, swingStop } from "./define";

const params = z.object({
  kPeriod: z.number().int().min(2).default(14),
  dPeriod: z.number().int().min(1).default(3),
  smoothK: z.number().int().min(1).default(3),
  overbought: z.number().min(0).max(100).default(80),
  oversold: z.number().min(0).max(100).default(20),
  atrPeriod: z.number().int().min(1).default(14),
  rsiFilter: z.boolean().default(true),
  rsiPeriod: z.number().int().min(2).default(14),
  momentumConfirmation: z.boolean().default(true),
  stopAtrMultiplier: z.number().positive().default(1.0),
  targetAtrMultiplier: z.number().positive().default(2.0),
  swingLookback: z.number().int().min(2).default(7),
});

type Params = z.infer<typeof params>;

/**
 * Stochastic reversal: %K crossing %D while %K is still in the oversold
 * (buy) or overbought (sell) zone.
 */
export const stochasticReversal = defineStrategy<Params>({
  kind: "stochastic-reversal",
  name: "Stochastic Reversal",
  description: "%K/%D crossover inside the overbought/oversold zones",
  params,
  cooldownSeconds: 300,
  minimumBars: (p) => Math.max(50, p.kPeriod * 2, p.atrPeriod * 2),

  detect(window, p) {
    const { highs, lows, closes } = columns(window);
    const st = stochasticSeries(highs, lows, closes, p.kPeriod, p.dPeriod, p.smoothK);
    const cross = crossover(st.k, st.d);
    const k = last(st.k);

    let side: "buy" | "sell" | null = null;
    if (cross === "up" && k < p.oversold) side = "buy";
    else if (cross === "down" && k > p.overbought) side = "sell";
    if (side === null) return null;

    if (p.momentumConfirmation) {
      const now = closes[closes.length - 1];
      const then = closes[closes.length - 3];
      if (side === "buy" ? !(now > then) : !(now < then)) return null;
    }

    if (p.rsiFilter) {
      const rsiNow = last(rsiSeries(closes, p.rsiPeriod));
      if (side === "buy" ? !(rsiNow < 70) : !(rsiNow > 30)) return null;
    }
    return side;
  },

  stopPrice(window, side, entry, p) {
    return swingStop(window, side, entry, lastAtr(window, p.atrPeriod), {
      lookback: p.swingLookback,
      buffer: 0.3,
      mult: p.stopAtrMultiplier,
      fallbackPct: 0.0015,
    });
  },

  targetPrice: (window, side, entry, p) =>
    atrTarget(side, entry, lastAtr(window, p.atrPeriod), p.targetAtrMultiplier, 0.003),

  shouldExit(window, position, p) {
    const { highs, lows, closes } = columns(window);
    const st = stochasticSeries(highs, lows, closes, p.kPeriod, p.dPeriod, p.smoothK);
    const cross = crossover(st.k, st.d);
    const k = last(st.k);
    if (position.side === "buy") return cross === "down" && k > p.overbought;
    return cross === "up" && k < p.oversold;
  },
});
