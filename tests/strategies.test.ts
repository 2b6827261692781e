/**
 * Strategy variants: signal, stop/target and exit behaviour on hand-built bars.
 */

import { describe, it, expect } from "vitest";
import { createStrategy, defaultConfig } from "../src/lib/strategies/registry.ts";
import { INITIAL_STATE, STRATEGY_KINDS, type StrategyKind } from "../src/lib/strategies/types.ts";
import { inSqueeze } from "../src/lib/strategies/bollinger-squeeze.ts";
import { findDivergence } from "../src/lib/strategies/rsi-divergence.ts";
import type { Bar } from "../src/lib/types.ts";
import {
  barsFromCloses,
  emaCrossUpBars,
  position,
  shiftTime,
  squeezeBreakoutBars,
  T0,
  MINUTE,
} from "./helpers.ts";

function make(kind: StrategyKind, params: Record<string, unknown> = {}) {
  return createStrategy(defaultConfig(kind, { params }));
}

function lastT(bars: Bar[]): number {
  return bars[bars.length - 1].t;
}

/** 89 quiet bars, then `tail`; the last bar trades `lastVolume`. `mirror` flips prices around 100. */
function divergenceBars(tail: number[], opts: { mirror?: boolean; lastVolume?: number } = {}): Bar[] {
  const quiet = Array.from({ length: 89 }, (_, i) => (i % 2 === 0 ? 100 : 100.2));
  const closes = [...quiet, ...tail].map((c) => (opts.mirror ? 200 - c : c));
  const bars = barsFromCloses(closes);
  return bars.map((b, i) => (i === bars.length - 1 ? { ...b, v: opts.lastVolume ?? 2000 } : b));
}

/** An accelerating trend for 49 bars, then a two point reversal. */
function stochasticBars(side: "buy" | "sell"): Bar[] {
  const dir = side === "buy" ? -1 : 1;
  const start = side === "buy" ? 150 : 50;
  const closes = Array.from({ length: 49 }, (_, i) => start + dir * 0.01 * i * i);
  closes.push(closes[48] - dir * 2);
  return barsFromCloses(closes);
}

/** 100 bars rising 0.1, a 10-point dip, then six 1-point recovery bars (mirrored for sell). */
function macdBars(side: "buy" | "sell"): Bar[] {
  const closes = Array.from({ length: 100 }, (_, i) => 100 + 0.1 * i);
  for (let i = 0; i < 10; i++) closes.push(closes[closes.length - 1] - 1.0);
  for (let i = 0; i < 6; i++) closes.push(closes[closes.length - 1] + 1.0);
  return barsFromCloses(side === "buy" ? closes : closes.map((c) => 200 - c));
}

describe("ema-crossover", () => {
  const s = make("ema-crossover", { emaPeriod: 5 });
  const bars = emaCrossUpBars(60);

  it("emits none at bar n-1 and buy at bar n when close crosses above EMA", () => {
    expect(s.signal(bars.slice(0, 59), INITIAL_STATE).signal.direction).toBe("none");
    const { signal, state } = s.signal(bars, INITIAL_STATE);
    expect(signal).toEqual({ direction: "buy", strategyId: "ema-crossover", timestamp: lastT(bars) });
    expect(state.lastSignalAt).toBe(lastT(bars));
  });

  it("emits none below the minimum bar count", () => {
    expect(s.minimumBars()).toBe(50);
    const short = emaCrossUpBars(49);
    expect(s.signal(short, INITIAL_STATE).signal.direction).toBe("none");
  });

  it("suppresses a repeat signal inside the cooldown", () => {
    const first = s.signal(bars, INITIAL_STATE);
    expect(s.signal(shiftTime(bars, 299_999), first.state).signal.direction).toBe("none");
    expect(s.signal(shiftTime(bars, 300_000), first.state).signal.direction).toBe("buy");
  });

  it("keeps the state when suppressed", () => {
    const first = s.signal(bars, INITIAL_STATE);
    const again = s.signal(bars, first.state);
    expect(again.state).toBe(first.state);
  });

  it("sizes stop and target from ATR", () => {
    // ATR(14): thirteen bars of TR 1, last bar TR 2.3
    const atr = 15.3 / 14;
    expect(s.stopPrice(bars, "buy", 106)).toBeCloseTo(106 - 1.5 * atr, 9);
    expect(s.targetPrice(bars, "buy", 106)).toBeCloseTo(106 + 2.5 * atr, 9);
    expect(s.stopPrice(bars, "sell", 106)).toBeCloseTo(106 + 1.5 * atr, 9);
  });

  it("falls back to fixed percentages when ATR is zero", () => {
    const dead: Bar[] = Array.from({ length: 60 }, (_, i) => ({ t: T0 + i * MINUTE, o: 100, h: 100, l: 100, c: 100, v: 0 }));
    expect(s.stopPrice(dead, "buy", 100)).toBeCloseTo(99.9, 9);
    expect(s.targetPrice(dead, "buy", 100)).toBeCloseTo(100.2, 9);
    expect(s.signal(dead, INITIAL_STATE).signal.direction).toBe("none");
  });

  it("exits when price closes on the wrong side of the EMA", () => {
    expect(s.shouldExit(bars, position({ side: "buy" }))).toBe(false);
    expect(s.shouldExit(bars, position({ side: "sell" }))).toBe(true);
  });
});

describe("bollinger-squeeze", () => {
  const s = make("bollinger-squeeze");

  it("buys a breakout from a squeeze with body, volume and trend confirmation", () => {
    const bars = squeezeBreakoutBars(1600);
    expect(bars.length).toBeGreaterThanOrEqual(s.minimumBars());
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("needs volume above 1.5x the 20-bar average", () => {
    // average (19 × 1000 + 1500) / 20 = 1025, × 1.5 = 1537.5
    expect(s.signal(squeezeBreakoutBars(1500), INITIAL_STATE).signal.direction).toBe("none");
  });

  it("accepts volume at exactly the multiple", () => {
    // average (19 × 925 + 1425) / 20 = 950, × 1.5 = 1425
    expect(s.signal(squeezeBreakoutBars(1425, 925), INITIAL_STATE).signal.direction).toBe("buy");
    expect(s.signal(squeezeBreakoutBars(1424, 925), INITIAL_STATE).signal.direction).toBe("none");
  });

  it("ignores the volume gate when confirmation is off", () => {
    const loose = make("bollinger-squeeze", { volumeConfirmation: false });
    expect(loose.signal(squeezeBreakoutBars(1000), INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("minimum bars cover the squeeze lookback plus one band period", () => {
    expect(s.minimumBars()).toBe(100);
    expect(make("bollinger-squeeze", { squeezeLookback: 100 }).minimumBars()).toBe(121);
  });

  it("stops at the tighter of middle band and ATR stop", () => {
    const bars = squeezeBreakoutBars(1600);
    const atr = (13 * 0.1 + 1.3) / 14;
    // middle 100.05 - 0.5 ATR is below 101 - ATR, so the ATR stop wins
    expect(s.stopPrice(bars, "buy", 101)).toBeCloseTo(101 - atr, 9);
    expect(s.targetPrice(bars, "buy", 101)).toBeCloseTo(101 + 2.5 * atr, 9);
  });

  it("exits a long once price is back at the middle band", () => {
    const bars = squeezeBreakoutBars(1600);
    expect(s.shouldExit(bars, position({ side: "buy" }))).toBe(false);
    const back = [...bars.slice(1), { t: lastT(bars) + MINUTE, o: 101, h: 101, l: 99.8, c: 99.9, v: 1000 }];
    expect(s.shouldExit(back, position({ side: "buy" }))).toBe(true);
  });

  it("inSqueeze ranks the bar before the breakout against its history", () => {
    const widths = [...new Array(10).fill(0.5), 0.1, 0.9];
    expect(inSqueeze(widths, 10, 20)).toBe(true);
    expect(inSqueeze([...new Array(10).fill(0.5), 0.6, 0.9], 10, 20)).toBe(false);
    expect(inSqueeze(widths, 11, 20)).toBe(false);
  });
});

describe("rsi-divergence", () => {
  const s = make("rsi-divergence");

  it("findDivergence: lower low in price with a higher RSI low", () => {
    const lows = [10, 9, 8, 9, 10, 7, 9];
    expect(findDivergence(lows, [50, 40, 20, 40, 50, 30, 40], 6, "bullish", 5)).toEqual({ current: 5, previous: 2, rsi: 30 });
    expect(findDivergence(lows, [50, 40, 20, 40, 50, 22, 40], 6, "bullish", 5)).toBeNull();
  });

  it("findDivergence: higher high in price with a lower RSI high", () => {
    const highs = [10, 11, 12, 11, 10, 13, 11];
    expect(findDivergence(highs, [50, 60, 80, 60, 50, 70, 60], 6, "bearish", 5)).toEqual({ current: 5, previous: 2, rsi: 70 });
  });

  it("needs at least three bars before the latest extreme", () => {
    const lows = [10, 7, 9, 8, 9, 9, 9];
    expect(findDivergence(lows, [50, 20, 40, 30, 40, 40, 40], 6, "bullish", 5)).toBeNull();
  });

  it("buys a lower low on a higher RSI with a volume spike", () => {
    const bars = divergenceBars([100, 95, 97, 98, 97, 96.5, 96, 95.5, 94.8, 95.5, 96]);
    expect(bars.length).toBe(s.minimumBars());
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("sells the mirrored higher high on a lower RSI", () => {
    const bars = divergenceBars([100, 95, 97, 98, 97, 96.5, 96, 95.5, 94.8, 95.5, 96], { mirror: true });
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("sell");
  });

  it("reads the RSI zone at the extreme, not at the latest bar", () => {
    // RSI 27.9 at the new low, 46.2 after the rebound
    const rebound = divergenceBars([100, 95, 97, 98, 97, 96.5, 96, 95.5, 94.8, 97, 99]);
    expect(s.signal(rebound, INITIAL_STATE).signal.direction).toBe("buy");
    // RSI 42.2 at the new low: outside oversold + 10
    const shallow = divergenceBars([100, 95, 99, 102, 104, 108, 108.5, 108, 107, 94.9, 95.9]);
    expect(s.signal(shallow, INITIAL_STATE).signal.direction).toBe("none");
  });

  it("needs the last bar's volume above 1.2x the average", () => {
    const quiet = divergenceBars([100, 95, 97, 98, 97, 96.5, 96, 95.5, 94.8, 95.5, 96], { lastVolume: 1000 });
    expect(s.signal(quiet, INITIAL_STATE).signal.direction).toBe("none");
  });

  it("exits a long once RSI reaches overbought", () => {
    const s = make("rsi-divergence");
    const rising = barsFromCloses(Array.from({ length: 100 }, (_, i) => 100 + i));
    expect(s.shouldExit(rising, position({ side: "buy" }))).toBe(true);
    expect(s.shouldExit(rising, position({ side: "sell" }))).toBe(false);
  });
});

describe("momentum-breakout", () => {
  const s = make("momentum-breakout");
  const bars = barsFromCloses([...new Array(19).fill(100), 101]);

  it("buys a move that is large relative to ATR", () => {
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("has a two second cooldown", () => {
    const first = s.signal(bars, INITIAL_STATE);
    expect(s.signal(shiftTime(bars, 1_000), first.state).signal.direction).toBe("none");
    expect(s.signal(shiftTime(bars, 2_000), first.state).signal.direction).toBe("buy");
  });

  it("uses one and two ATRs for stop and target", () => {
    // ATR(10): nine bars of TR 1, last bar TR 1.5
    expect(s.stopPrice(bars, "buy", 101)).toBeCloseTo(101 - 1.05, 9);
    expect(s.targetPrice(bars, "buy", 101)).toBeCloseTo(101 + 2.1, 9);
  });

  it("exits on an opposite breakout", () => {
    expect(s.shouldExit(bars, position({ side: "sell" }))).toBe(true);
    expect(s.shouldExit(bars, position({ side: "buy" }))).toBe(false);
  });
});

describe("mean-reversion", () => {
  const s = make("mean-reversion");
  const closes: number[] = Array.from({ length: 29 }, (_, i) => (i % 2 === 0 ? 100 : 101));
  closes.push(95);
  const bars = barsFromCloses(closes);

  it("buys a close below the lower band with RSI oversold", () => {
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("targets the moving average and stops the same distance away", () => {
    expect(s.targetPrice(bars, "buy", 95)).toBeCloseTo(99.9, 9);
    expect(s.stopPrice(bars, "buy", 95)).toBeCloseTo(90.1, 9);
  });

  it("floors the stop distance at minStopPct of entry", () => {
    expect(s.stopPrice(bars, "buy", 99.9)).toBeCloseTo(99.9 - 99.9 * 0.002, 9);
  });

  it("exits a long once price is back at the mean", () => {
    expect(s.shouldExit(bars, position({ side: "buy" }))).toBe(false);
    expect(s.shouldExit(bars, position({ side: "sell" }))).toBe(true);
  });
});

describe("scalping", () => {
  const s = make("scalping");
  const bars = barsFromCloses([...new Array(9).fill(100), 100.5]);

  it("follows the latest bar when short momentum agrees", () => {
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
    const down = barsFromCloses([...new Array(9).fill(100), 99.5]);
    expect(s.signal(down, INITIAL_STATE).signal.direction).toBe("sell");
  });

  it("uses fixed percentage stop and target", () => {
    expect(s.stopPrice(bars, "buy", 100)).toBeCloseTo(99.98, 9);
    expect(s.targetPrice(bars, "buy", 100)).toBeCloseTo(100.03, 9);
    expect(s.stopPrice(bars, "sell", 100)).toBeCloseTo(100.02, 9);
  });

  it("never asks for an exit", () => {
    expect(s.shouldExit(bars, position({ side: "buy" }))).toBe(false);
  });
});

describe("stochastic-reversal", () => {
  const s = make("stochastic-reversal");

  it("buys %K crossing up through %D in the oversold zone", () => {
    const bars = stochasticBars("buy");
    expect(bars.length).toBe(s.minimumBars());
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("sells %K crossing down through %D in the overbought zone", () => {
    const bars = stochasticBars("sell");
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("sell");
  });

  it("needs the close above the close two bars back", () => {
    const closes = Array.from({ length: 49 }, (_, i) => 150 - 0.01 * i * i);
    closes.push(closes[48] + 0.5);
    expect(s.signal(barsFromCloses(closes), INITIAL_STATE).signal.direction).toBe("none");
  });

  it("keeps shouldExit false below the minimum bar count", () => {
    expect(s.shouldExit(barsFromCloses([100, 101, 102]), position())).toBe(false);
  });
});

describe("macd-cross", () => {
  const s = make("macd-cross");

  it("buys the signal cross below zero after a dip in an uptrend", () => {
    const bars = macdBars("buy");
    expect(s.signal(bars.slice(0, 115), INITIAL_STATE).signal.direction).toBe("none");
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("buy");
  });

  it("sells the mirrored cross above zero", () => {
    const bars = macdBars("sell");
    expect(s.signal(bars.slice(0, 115), INITIAL_STATE).signal.direction).toBe("none");
    expect(s.signal(bars, INITIAL_STATE).signal.direction).toBe("sell");
  });

  it("keeps shouldExit false below the minimum bar count", () => {
    expect(s.shouldExit(barsFromCloses([100, 101, 102]), position())).toBe(false);
  });
});

describe("cooldown", () => {
  const windows: Record<StrategyKind, { bars: Bar[]; params?: Record<string, unknown> }> = {
    "ema-crossover": { bars: emaCrossUpBars(60), params: { emaPeriod: 5 } },
    "macd-cross": { bars: macdBars("buy") },
    "rsi-divergence": { bars: divergenceBars([100, 95, 97, 98, 97, 96.5, 96, 95.5, 94.8, 95.5, 96]) },
    "bollinger-squeeze": { bars: squeezeBreakoutBars(1600) },
    "stochastic-reversal": { bars: stochasticBars("buy") },
    "momentum-breakout": { bars: barsFromCloses([...new Array(19).fill(100), 101]) },
    "mean-reversion": {
      bars: barsFromCloses([...Array.from({ length: 29 }, (_, i) => (i % 2 === 0 ? 100 : 101)), 95]),
    },
    scalping: { bars: barsFromCloses([...new Array(9).fill(100), 100.5]) },
  };

  for (const kind of STRATEGY_KINDS) {
    it(`${kind} repeats a signal only once the cooldown has passed`, () => {
      const { bars, params } = windows[kind];
      const s = make(kind, params);
      expect(s.cooldownMs).toBeGreaterThan(0);

      const first = s.signal(bars, INITIAL_STATE);
      expect(first.signal.direction).toBe("buy");
      expect(s.signal(shiftTime(bars, s.cooldownMs - 1), first.state).signal.direction).toBe("none");
      expect(s.signal(shiftTime(bars, s.cooldownMs), first.state).signal.direction).toBe("buy");
    });
  }
});
