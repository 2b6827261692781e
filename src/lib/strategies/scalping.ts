import { z } from "zod";
import { columns, defineStrategy } from "./define";

const params = z.object({
  /** Minimum one-bar close change, in price units. */
  minPriceChange: z.number().nonnegative().default(0.000001),
  momentumPeriod: z.number().int().min(1).default(3),
  stopPct: z.number().positive().default(0.0002),
  targetPct: z.number().positive().default(0.0003),
});

type Params = z.infer<typeof params>;

/**
 * Scalping: quick in/out on the latest bar's move when short momentum
 * agrees. Fixed percentage stop and target, exits left to them.
 */
export const scalping = defineStrategy<Params>({
  kind: "scalping",
  name: "Scalping",
  description: "Quick trades on small moves, tight fixed stops",
  params,
  cooldownSeconds: 1,
  minimumBars: (p) => Math.max(10, p.momentumPeriod + 1),

  detect(window, p) {
    const { closes } = columns(window);
    const n = closes.length;
    const change = closes[n - 1] - closes[n - 2];
    const base = closes[n - 1 - p.momentumPeriod];
    if (base === 0) return null;
    const momentum = (closes[n - 1] - base) / base;
    if (change > p.minPriceChange && momentum > 0) return "buy";
    if (change < -p.minPriceChange && momentum < 0) return "sell";
    return null;
  },

  stopPrice: (_window, side, entry, p) =>
    side === "buy" ? entry * (1 - p.stopPct) : entry * (1 + p.stopPct),
  targetPrice: (_window, side, entry, p) =>
    side === "buy" ? entry * (1 + p.targetPct) : entry * (1 - p.targetPct),
});
