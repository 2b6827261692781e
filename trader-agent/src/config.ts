/**
 * Agent configuration: JSON file validated with zod, then env and CLI
 * overrides (CLI > env > file).
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import type { RiskLimits, SymbolSpec, Timeframe } from "../../src/lib/types";
import type { StrategyConfig } from "../../src/lib/strategies/types";
import { STRATEGY_KINDS } from "../../src/lib/strategies/types";
import { buildStrategies } from "../../src/lib/strategies/registry";
import type { TradingHours } from "./hours.js";

const timeframeSchema = z.enum(["M1", "M5", "M15", "M30", "H1", "H4", "D1"]);

const riskSchema = z
  .object({
    riskPerTrade: z.number().positive().max(1).default(0.01),
    maxDailyLoss: z.number().positive().max(1).default(0.05),
    maxDrawdown: z.number().positive().max(1).default(0.1),
    maxPositions: z.number().int().positive().default(5),
    trailingStop: z.boolean().default(true),
    trailingStopPoints: z.number().nonnegative().default(3),
    marginUsageCap: z.number().positive().max(1).default(0.5),
    maxRiskMultiple: z.number().positive().default(10),
  })
  .default({});

const hoursSchema = z
  .object({
    days: z.array(z.number().int().min(0).max(6)).default([1, 2, 3, 4, 5]),
    startHour: z.number().int().min(0).max(23).default(0),
    endHour: z.number().int().min(0).max(23).default(23),
    timezone: z.string().default("UTC"),
  })
  .default({})
  .refine((h) => isValidTimeZone(h.timezone), { message: "unknown timezone" });

const strategySchema = z.object({
  id: z.string().min(1),
  kind: z.enum(STRATEGY_KINDS),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(1),
  maxPositions: z.number().int().nonnegative().default(1),
  riskFraction: z.number().positive().max(1).optional(),
  cooldownSeconds: z.number().nonnegative().optional(),
  params: z.record(z.unknown()).default({}),
});

const symbolSpecSchema = z.object({
  minLot: z.number().positive().default(0.01),
  maxLot: z.number().positive().default(100),
  lotStep: z.number().positive().default(0.01),
  pointSize: z.number().positive().default(0.01),
  minStopDistance: z.number().nonnegative().default(0),
  unitValue: z.number().positive().default(100),
  marginPerLot: z.number().nonnegative().default(1000),
  tradeable: z.boolean().default(true),
});

export const configSchema = z.object({
  symbol: z.string().min(1).default("XAUUSD"),
  timeframe: timeframeSchema.default("M5"),
  barCount: z.number().int().min(10).default(200),
  tickIntervalSeconds: z.number().positive().default(0.2),
  minSleepMs: z.number().int().nonnegative().default(50),
  risk: riskSchema,
  tradingHours: hoursSchema,
  strategies: z.array(strategySchema).default([]),
  symbolSpec: symbolSpecSchema.default({}),
});

export type AgentConfigInput = z.input<typeof configSchema>;

export interface AgentConfig {
  symbol: string;
  timeframe: Timeframe;
  barCount: number;
  tickIntervalSeconds: number;
  minSleepMs: number;
  risk: RiskLimits;
  tradingHours: TradingHours;
  strategies: StrategyConfig[];
  symbolSpec: Omit<SymbolSpec, "symbol">;
}

export interface ConfigOverrides {
  symbol?: string;
  timeframe?: string;
  tickIntervalSeconds?: number;
}

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

function formatIssues(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Validate a raw config object. Strategy params are checked against each
 * kind's own schema here so a bad config fails at startup.
 */
export function parseConfig(raw: unknown, overrides: ConfigOverrides = {}): AgentConfig {
  const merged =
    typeof raw === "object" && raw !== null
      ? {
          ...raw,
          ...(overrides.symbol !== undefined ? { symbol: overrides.symbol } : {}),
          ...(overrides.timeframe !== undefined ? { timeframe: overrides.timeframe } : {}),
          ...(overrides.tickIntervalSeconds !== undefined
            ? { tickIntervalSeconds: overrides.tickIntervalSeconds }
            : {}),
        }
      : raw;

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid config: ${formatIssues(result.error)}`);
  }
  const cfg = result.data;

  try {
    buildStrategies(cfg.strategies);
  } catch (err) {
    if (err instanceof z.ZodError) throw new Error(`Invalid strategy params: ${formatIssues(err)}`);
    throw err;
  }
  return cfg;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const v = env[key];
  if (v === undefined || v === "") return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`${key} must be a number, got "${v}"`);
  return n;
}

/** Env overrides first, then CLI overrides on top. */
export function resolveOverrides(env: NodeJS.ProcessEnv, cli: ConfigOverrides = {}): ConfigOverrides {
  return {
    symbol: cli.symbol ?? env.TRADER_SYMBOL,
    timeframe: cli.timeframe ?? env.TRADER_TIMEFRAME,
    tickIntervalSeconds: cli.tickIntervalSeconds ?? envNumber(env, "TRADER_TICK_SECONDS"),
  };
}

export function loadConfig(path: string, overrides: ConfigOverrides = {}): AgentConfig {
  if (!existsSync(path)) throw new Error(`Config file not found: ${path}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new Error(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw, overrides);
}
