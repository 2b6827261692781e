import { z } from "zod";
import { crossover, emaSeries, last } from "../indicators";
import { atrStop, atrTarget, columns, defineStrategy, lastAtr } from "./define";

const params = z.object({
  emaPeriod: z.number().int().min(2).default(5),
  atrPeriod: z.number().int().min(1).default(14),
  stopAtrMultiplier: z.number().positive().default(1.5),
  targetAtrMultiplier: z.number().positive().default(2.5),
  /** Skip signals while ATR sits below this (dead market). */
  minAtr: z.number().nonnegative().default(0.0001),
  /** Closes that must be strictly rising (falling for sells) into the cross. */
  confirmationCandles: z.number().int().min(1).default(1),
});

type Params = z.infer<typeof params>;

function isMonotonic(closes: number[], n: number, rising: boolean): boolean {
  const tail = closes.slice(-n);
  for (let i = 1; i < tail.length; i++) {
    if (rising ? tail[i] <= tail[i - 1] : tail[i] >= tail[i - 1]) return false;
  }
  return true;
}

/**
 * EMA crossover: buy when close crosses above its EMA, sell on the cross
 * below. Exits once price closes back on the wrong side of the EMA.
 */
export const emaCrossover = defineStrategy<Params>({
  kind: "ema-crossover",
  name: "EMA Crossover",
  description: "Close crossing a short EMA, ATR-sized stop and target",
  params,
  cooldownSeconds: 300,
  minimumBars: (p) => Math.max(50, p.emaPeriod * 3, p.atrPeriod * 2),

  detect(window, p) {
    const atrNow = lastAtr(window, p.atrPeriod);
    if (Number.isNaN(atrNow) || atrNow < p.minAtr) return null;

    const { closes } = columns(window);
    const cross = crossover(closes, emaSeries(closes, p.emaPeriod));
    if (cross === null) return null;
    if (p.confirmationCandles > 1 && !isMonotonic(closes, p.confirmationCandles, cross === "up")) {
      return null;
    }
    return cross === "up" ? "buy" : "sell";
  },

  stopPrice: (window, side, entry, p) =>
    atrStop(side, entry, lastAtr(window, p.atrPeriod), p.stopAtrMultiplier, 0.001),

  targetPrice: (window, side, entry, p) =>
    atrTarget(side, entry, lastAtr(window, p.atrPeriod), p.targetAtrMultiplier, 0.002),

  shouldExit(window, position, p) {
    const { closes } = columns(window);
    const emaNow = last(emaSeries(closes, p.emaPeriod));
    const close = last(closes);
    if (Number.isNaN(emaNow)) return false;
    return position.side === "buy" ? close < emaNow : close > emaNow;
  },
});
