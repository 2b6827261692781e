import type { StrategyFactory } from "./define";
import type { Strategy, StrategyConfig, StrategyKind } from "./types";
import { emaCrossover } from "./ema-crossover";
import { macdCross } from "./macd-cross";
import { rsiDivergence } from "./rsi-divergence";
import { bollingerSqueeze } from "./bollinger-squeeze";
import { stochasticReversal } from "./stochastic-reversal";
import { momentumBreakout } from "./momentum-breakout";
import { meanReversion } from "./mean-reversion";
import { scalping } from "./scalping";

export const strategies: StrategyFactory[] = [
  emaCrossover,
  macdCross,
  rsiDivergence,
  bollingerSqueeze,
  stochasticReversal,
  momentumBreakout,
  meanReversion,
  scalping,
];

export function getStrategy(kind: string): StrategyFactory | undefined {
  return strategies.find((s) => s.kind === kind);
}

export function createStrategy(config: StrategyConfig): Strategy {
  const factory = getStrategy(config.kind);
  if (!factory) throw new Error(`Unknown strategy kind: ${config.kind}`);
  return factory.create(config);
}

/**
 * Build strategy instances from config, in execution order: ascending
 * priority, ties keep their configured order. Duplicate ids are rejected
 * since the id is the ownership tag.
 */
export function buildStrategies(configs: StrategyConfig[]): Strategy[] {
  const seen = new Set<string>();
  for (const c of configs) {
    if (seen.has(c.id)) throw new Error(`Duplicate strategy id: ${c.id}`);
    seen.add(c.id);
  }
  return configs
    .map((c, index) => ({ strategy: createStrategy(c), index }))
    .sort((a, b) => a.strategy.priority - b.strategy.priority || a.index - b.index)
    .map((e) => e.strategy);
}

export function defaultConfig(kind: StrategyKind, overrides: Partial<StrategyConfig> = {}): StrategyConfig {
  return {
    id: kind,
    kind,
    enabled: true,
    priority: 1,
    maxPositions: 1,
    params: {},
    ...overrides,
  };
}
