import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { loadConfig, parseConfig, resolveOverrides } from "../trader-agent/src/config.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.join(__dirname, "..");

describe("parseConfig", () => {
  it("fills defaults for an empty object", () => {
    const cfg = parseConfig({});
    expect(cfg.symbol).toBe("XAUUSD");
    expect(cfg.timeframe).toBe("M5");
    expect(cfg.barCount).toBe(200);
    expect(cfg.tickIntervalSeconds).toBe(0.2);
    expect(cfg.risk.maxPositions).toBe(5);
    expect(cfg.risk.trailingStop).toBe(true);
    expect(cfg.tradingHours).toEqual({ days: [1, 2, 3, 4, 5], startHour: 0, endHour: 23, timezone: "UTC" });
    expect(cfg.strategies).toEqual([]);
    expect(cfg.symbolSpec.lotStep).toBe(0.01);
  });

  it("fills strategy defaults", () => {
    const cfg = parseConfig({ strategies: [{ id: "fast", kind: "scalping" }] });
    expect(cfg.strategies).toEqual([
      { id: "fast", kind: "scalping", enabled: true, priority: 1, maxPositions: 1, params: {} },
    ]);
  });

  it("lists every schema problem with its path", () => {
    expect(() => parseConfig({ timeframe: "M2", risk: { riskPerTrade: 2 } })).toThrow(
      /^Invalid config: .*timeframe: .*risk\.riskPerTrade: /
    );
  });

  it("rejects an unknown strategy kind", () => {
    expect(() => parseConfig({ strategies: [{ id: "g", kind: "grid" }] })).toThrow(/strategies\.0\.kind/);
  });

  it("rejects an unknown timezone", () => {
    expect(() => parseConfig({ tradingHours: { timezone: "Mars/Olympus" } })).toThrow("unknown timezone");
  });

  it("validates strategy params against the kind's schema", () => {
    expect(() =>
      parseConfig({ strategies: [{ id: "e", kind: "ema-crossover", params: { emaPeriod: 0 } }] })
    ).toThrow(/^Invalid strategy params: emaPeriod: /);
  });

  it("rejects duplicate strategy ids", () => {
    expect(() =>
      parseConfig({
        strategies: [
          { id: "x", kind: "scalping" },
          { id: "x", kind: "mean-reversion" },
        ],
      })
    ).toThrow("Duplicate strategy id: x");
  });

  it("applies overrides over file values", () => {
    const cfg = parseConfig({ symbol: "EURUSD", timeframe: "H1" }, { symbol: "GBPUSD", tickIntervalSeconds: 1 });
    expect(cfg.symbol).toBe("GBPUSD");
    expect(cfg.timeframe).toBe("H1");
    expect(cfg.tickIntervalSeconds).toBe(1);
  });
});

describe("resolveOverrides", () => {
  it("prefers CLI values over env", () => {
    const env = { TRADER_SYMBOL: "EURUSD", TRADER_TIMEFRAME: "M15", TRADER_TICK_SECONDS: "2" };
    expect(resolveOverrides(env, { symbol: "XAUUSD" })).toEqual({
      symbol: "XAUUSD",
      timeframe: "M15",
      tickIntervalSeconds: 2,
    });
  });

  it("rejects a non-numeric tick interval", () => {
    expect(() => resolveOverrides({ TRADER_TICK_SECONDS: "soon" })).toThrow(
      'TRADER_TICK_SECONDS must be a number, got "soon"'
    );
  });
});

describe("loadConfig", () => {
  it("loads the shipped sample config", () => {
    const cfg = loadConfig(path.join(projectRoot, "config", "trader.json"));
    expect(cfg.strategies.map((s) => s.id)).toEqual(["bb-squeeze", "macd-trend", "rsi-div", "ema-fast", "stoch", "mean-rev"]);
    expect(cfg.risk.trailingStopPoints).toBe(300);
  });

  it("reports a missing file and bad JSON", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "trader-test-"));
    try {
      expect(() => loadConfig(path.join(tmpDir, "nope.json"))).toThrow("Config file not found");
      const bad = path.join(tmpDir, "bad.json");
      fs.writeFileSync(bad, "{ symbol: ");
      expect(() => loadConfig(bad)).toThrow(/is not valid JSON/);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
