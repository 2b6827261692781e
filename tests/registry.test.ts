import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import {
  buildStrategies,
  createStrategy,
  defaultConfig,
  getStrategy,
  strategies,
} from "../src/lib/strategies/registry.ts";
import { strategyMeta } from "../src/lib/strategies/meta.ts";
import { STRATEGY_KINDS } from "../src/lib/strategies/types.ts";
import { emaCrossover } from "../src/lib/strategies/ema-crossover.ts";

describe("strategy registry", () => {
  it("registers every kind once, with metadata", () => {
    expect(strategies.map((s) => s.kind)).toEqual([...STRATEGY_KINDS]);
    for (const kind of STRATEGY_KINDS) expect(strategyMeta[kind].kind).toBe(kind);
  });

  it("reports default minimum bars per kind", () => {
    const mins = Object.fromEntries(strategies.map((s) => [s.kind, s.minimumBars()]));
    expect(mins).toEqual({
      "ema-crossover": 50,
      "macd-cross": 100,
      "rsi-divergence": 100,
      "bollinger-squeeze": 100,
      "stochastic-reversal": 50,
      "momentum-breakout": 20,
      "mean-reversion": 30,
      scalping: 10,
    });
  });

  it("derives minimum bars from params", () => {
    expect(emaCrossover.minimumBars({ emaPeriod: 30 })).toBe(90);
  });

  it("fills defaults for omitted params", () => {
    expect(emaCrossover.defaults()).toEqual({
      emaPeriod: 5,
      atrPeriod: 14,
      stopAtrMultiplier: 1.5,
      targetAtrMultiplier: 2.5,
      minAtr: 0.0001,
      confirmationCandles: 1,
    });
    const s = createStrategy(defaultConfig("ema-crossover", { params: { emaPeriod: 9 } }));
    expect(s.params.emaPeriod).toBe(9);
    expect(s.params.atrPeriod).toBe(14);
  });

  it("rejects invalid params", () => {
    expect(() => createStrategy(defaultConfig("ema-crossover", { params: { emaPeriod: 1 } }))).toThrow(ZodError);
    expect(() => createStrategy(defaultConfig("scalping", { params: { stopPct: "wide" } }))).toThrow(ZodError);
  });

  it("rejects a config of another kind", () => {
    expect(() => emaCrossover.create(defaultConfig("macd-cross", { id: "m" }))).toThrow(
      "Strategy m: kind macd-cross does not match ema-crossover"
    );
  });

  it("returns undefined for an unknown kind", () => {
    expect(getStrategy("grid")).toBeUndefined();
  });

  it("takes the cooldown from config when given", () => {
    expect(createStrategy(defaultConfig("ema-crossover")).cooldownMs).toBe(300_000);
    expect(createStrategy(defaultConfig("ema-crossover", { cooldownSeconds: 0 })).cooldownMs).toBe(0);
  });
});

describe("buildStrategies", () => {
  it("orders by ascending priority, ties in configured order", () => {
    const built = buildStrategies([
      defaultConfig("scalping", { id: "c", priority: 3 }),
      defaultConfig("ema-crossover", { id: "a", priority: 1 }),
      defaultConfig("macd-cross", { id: "b1", priority: 2 }),
      defaultConfig("mean-reversion", { id: "b2", priority: 2 }),
    ]);
    expect(built.map((s) => s.id)).toEqual(["a", "b1", "b2", "c"]);
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      buildStrategies([defaultConfig("scalping", { id: "x" }), defaultConfig("ema-crossover", { id: "x" })])
    ).toThrow("Duplicate strategy id: x");
  });
});
