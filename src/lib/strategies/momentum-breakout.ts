import { z } from "zod";
import type { Bar, Side } from "../types";
import { atrStop, atrTarget, columns, defineStrategy, lastAtr } from "./define";

const params = z.object({
  momentumPeriod: z.number().int().min(1).default(5),
  volatilityPeriod: z.number().int().min(1).default(10),
  /** Minimum move over the momentum period, in percent. */
  minMomentumPct: z.number().nonnegative().default(0.005),
  /** Minimum |momentum| relative to ATR as a fraction of price. */
  minNormalizedMomentum: z.number().nonnegative().default(0.1),
});

type Params = z.infer<typeof params>;

function breakout(window: Bar[], p: Params): Side | null {
  const { closes } = columns(window);
  const n = closes.length;
  if (n - 1 - p.momentumPeriod < 0) return null;
  const base = closes[n - 1 - p.momentumPeriod];
  if (base === 0) return null;
  const close = closes[n - 1];
  const momentum = (close - base) / base;

  const vol = lastAtr(window, p.volatilityPeriod);
  const normalized = vol > 0 ? Math.abs(momentum) / (vol / close) : Math.abs(momentum);
  if (!(normalized > p.minNormalizedMomentum)) return null;

  const threshold = p.minMomentumPct / 100;
  if (momentum > threshold) return "buy";
  if (momentum < -threshold) return "sell";
  return null;
}

/** Momentum breakout: percentage change over a short period, scaled by volatility. */
export const momentumBreakout = defineStrategy<Params>({
  kind: "momentum-breakout",
  name: "Momentum Breakout",
  description: "Short-period price acceleration relative to ATR",
  params,
  cooldownSeconds: 2,
  minimumBars: (p) => Math.max(20, p.momentumPeriod + 1, p.volatilityPeriod + 1),
  detect: breakout,
  stopPrice: (window, side, entry, p) =>
    atrStop(side, entry, lastAtr(window, p.volatilityPeriod), 1.0, 0.0005),
  targetPrice: (window, side, entry, p) =>
    atrTarget(side, entry, lastAtr(window, p.volatilityPeriod), 2.0, 0.001),
  shouldExit(window, position, p) {
    const side = breakout(window, p);
    return side !== null && side !== position.side;
  },
});
