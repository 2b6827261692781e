/**
 * Strategy display metadata: signal pattern, risk and indicator list.
 * Used by the operator CLI to explain each strategy kind.
 */

import type { StrategyKind } from "./types";

export type SignalPattern =
  | "crossover"
  | "divergence"
  | "squeeze-breakout"
  | "oscillator-reversal"
  | "momentum"
  | "reversion";

export interface StrategyMeta {
  kind: StrategyKind;
  pattern: SignalPattern;
  risk: "low" | "medium" | "high";
  whenToUse: string;
  indicators: string[];
}

export const strategyMeta: Record<StrategyKind, StrategyMeta> = {
  "ema-crossover": {
    kind: "ema-crossover",
    pattern: "crossover",
    risk: "medium",
    whenToUse: "Trending sessions. Enters as price reclaims a short EMA.",
    indicators: ["EMA", "ATR"],
  },
  "macd-cross": {
    kind: "macd-cross",
    pattern: "crossover",
    risk: "medium",
    whenToUse: "Early trend turns. Buys crosses below the zero line, sells crosses above it.",
    indicators: ["MACD", "EMA", "ATR"],
  },
  "rsi-divergence": {
    kind: "rsi-divergence",
    pattern: "divergence",
    risk: "medium",
    whenToUse: "Exhausted moves where RSI stops confirming new price extremes.",
    indicators: ["RSI", "ATR", "Volume"],
  },
  "bollinger-squeeze": {
    kind: "bollinger-squeeze",
    pattern: "squeeze-breakout",
    risk: "high",
    whenToUse: "After quiet consolidation, when volatility expands out of the bands.",
    indicators: ["Bollinger Bands", "SMA", "ATR", "Volume"],
  },
  "stochastic-reversal": {
    kind: "stochastic-reversal",
    pattern: "oscillator-reversal",
    risk: "medium",
    whenToUse: "Ranging markets. Fades the extremes of the stochastic oscillator.",
    indicators: ["Stochastic", "RSI", "ATR"],
  },
  "momentum-breakout": {
    kind: "momentum-breakout",
    pattern: "momentum",
    risk: "high",
    whenToUse: "Fast markets with short bursts of acceleration.",
    indicators: ["Rate of change", "ATR"],
  },
  "mean-reversion": {
    kind: "mean-reversion",
    pattern: "reversion",
    risk: "medium",
    whenToUse: "Range-bound markets where stretched closes snap back to the average.",
    indicators: ["SMA", "Std dev", "RSI"],
  },
  scalping: {
    kind: "scalping",
    pattern: "momentum",
    risk: "high",
    whenToUse: "Quick in/out on small moves. Tight stops, small targets, high frequency.",
    indicators: ["Price change"],
  },
};
