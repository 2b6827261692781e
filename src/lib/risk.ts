/**
 * Risk manager: gates new entries, sizes and validates trades, and trails
 * stops on open positions.
 *
 * Daily-loss and drawdown breakers latch: once tripped, new entries stay
 * blocked until the trading day (in the configured time zone) rolls over or
 * `resetBreaker()` is called. Open positions are never closed from here.
 */

import type { Ack, Venue } from "./venue";
import type {
  AccountSnapshot,
  Position,
  RiskLimits,
  Side,
  SymbolSpec,
  TradeValidation,
} from "./types";

export type BreachKind = "daily_loss" | "drawdown";

export interface RiskCheck {
  ok: boolean;
  reason?: string;
}

export interface TradeRequest {
  account: AccountSnapshot;
  positions: Position[];
  spec: SymbolSpec;
  side: Side;
  volume: number;
  entryPrice: number;
  stop?: number;
  target?: number;
}

export interface StopUpdate {
  ticket: string;
  side: Side;
  from: number | null;
  to: number;
  target: number | null;
}

export interface TrailingResult {
  updated: StopUpdate[];
  rejected: { update: StopUpdate; reason: string }[];
}

export interface RiskManagerOptions {
  limits: RiskLimits;
  /** IANA zone that defines the trading day for the daily-loss breaker. */
  timeZone?: string;
  clock?: () => number;
  log?: (msg: string) => void;
}

// ── Volume arithmetic ───────────────────────────────────────────────────────

function stepDecimals(step: number): number {
  const s = step.toString();
  const exp = s.indexOf("e-");
  if (exp >= 0) return parseInt(s.slice(exp + 2), 10);
  const dot = s.indexOf(".");
  return dot >= 0 ? s.length - dot - 1 : 0;
}

export function roundToStep(volume: number, step: number): number {
  if (!(step > 0)) return volume;
  return Number((Math.round(volume / step) * step).toFixed(stepDecimals(step)));
}

/** Round to the lot step, then clamp into the step-aligned [min, max] range. */
export function normalizeVolume(volume: number, spec: SymbolSpec): number {
  const d = stepDecimals(spec.lotStep);
  const lo = Number((Math.ceil(spec.minLot / spec.lotStep - 1e-9) * spec.lotStep).toFixed(d));
  const hi = Number((Math.floor(spec.maxLot / spec.lotStep + 1e-9) * spec.lotStep).toFixed(d));
  const stepped = roundToStep(volume, spec.lotStep);
  return Math.min(hi, Math.max(lo, stepped));
}

export function isOnStep(volume: number, step: number): boolean {
  const ratio = volume / step;
  return Math.abs(ratio - Math.round(ratio)) < 1e-6;
}

function dayKey(ms: number, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(new Date(ms));
}

// ── Risk manager ────────────────────────────────────────────────────────────

export class RiskManager {
  readonly limits: RiskLimits;
  private readonly timeZone: string;
  private readonly clock: () => number;
  private readonly log: (msg: string) => void;

  private day: { key: string; startBalance: number } | null = null;
  private breaker: { kind: BreachKind; day: string } | null = null;

  constructor(opts: RiskManagerOptions) {
    this.limits = opts.limits;
    this.timeZone = opts.timeZone ?? "UTC";
    this.clock = opts.clock ?? Date.now;
    this.log = opts.log ?? (() => {});
  }

  /** Active breaker, if any. */
  get breach(): BreachKind | null {
    return this.breaker?.kind ?? null;
  }

  get dayStartBalance(): number | null {
    return this.day?.startBalance ?? null;
  }

  resetBreaker(): void {
    if (this.breaker) this.log(`[RISK] ${this.breaker.kind} breaker reset manually`);
    this.breaker = null;
  }

  private rollDay(account: AccountSnapshot): string {
    const key = dayKey(this.clock(), this.timeZone);
    if (this.day?.key !== key) {
      if (this.day) this.log(`[RISK] New trading day ${key}, start balance ${account.balance.toFixed(2)}`);
      this.day = { key, startBalance: account.balance };
      if (this.breaker && this.breaker.day !== key) {
        this.log(`[RISK] ${this.breaker.kind} breaker cleared for new day`);
        this.breaker = null;
      }
    }
    return key;
  }

  private evaluateBreakers(account: AccountSnapshot, day: string): void {
    if (this.breaker || !this.day) return;
    const start = this.day.startBalance;
    const dailyLoss = start - account.equity;
    if (dailyLoss > 0 && dailyLoss >= start * this.limits.maxDailyLoss) {
      this.breaker = { kind: "daily_loss", day };
      this.log(`[RISK] Daily loss breaker tripped: loss ${dailyLoss.toFixed(2)} >= ${(start * this.limits.maxDailyLoss).toFixed(2)}`);
      return;
    }
    const drawdown = account.balance - account.equity;
    if (drawdown > 0 && drawdown >= account.balance * this.limits.maxDrawdown) {
      this.breaker = { kind: "drawdown", day };
      this.log(`[RISK] Drawdown breaker tripped: ${drawdown.toFixed(2)} >= ${(account.balance * this.limits.maxDrawdown).toFixed(2)}`);
    }
  }

  checkTradingAllowed(
    account: AccountSnapshot,
    positions: Position[],
    strategyId?: string,
    perStrategyMax?: number
  ): RiskCheck {
    const day = this.rollDay(account);
    this.evaluateBreakers(account, day);

    if (this.breaker) return { ok: false, reason: `${this.breaker.kind} breaker active` };
    if (!account.tradeAllowed) return { ok: false, reason: "account trading disabled" };
    if (positions.length >= this.limits.maxPositions) {
      return { ok: false, reason: `global position cap ${this.limits.maxPositions} reached` };
    }
    if (strategyId !== undefined && perStrategyMax !== undefined) {
      const owned = positions.filter((p) => p.ownerTag === strategyId).length;
      if (owned >= perStrategyMax) {
        return { ok: false, reason: `${strategyId} position cap ${perStrategyMax} reached` };
      }
    }
    return { ok: true };
  }

  tradingAllowed(
    account: AccountSnapshot,
    positions: Position[],
    strategyId?: string,
    perStrategyMax?: number
  ): boolean {
    return this.checkTradingAllowed(account, positions, strategyId, perStrategyMax).ok;
  }

  /**
   * Volume risking `balance × riskFraction` between entry and stop, capped by
   * margin usage and by a multiple of the risk amount, then stepped and
   * clamped. A zero stop distance sizes at the minimum lot.
   */
  positionSize(
    account: AccountSnapshot,
    spec: SymbolSpec,
    entryPrice: number,
    stopPrice: number,
    riskFraction?: number
  ): number {
    const riskAmount = account.balance * (riskFraction ?? this.limits.riskPerTrade);
    const distance = Math.abs(entryPrice - stopPrice);
    if (!(distance > 0) || !(spec.unitValue > 0) || !(riskAmount > 0)) {
      return normalizeVolume(spec.minLot, spec);
    }

    let volume = riskAmount / (distance * spec.unitValue);
    if (spec.marginPerLot > 0) {
      const marginCap = (account.freeMargin * this.limits.marginUsageCap) / spec.marginPerLot;
      volume = Math.min(volume, marginCap);
    }
    volume = Math.min(volume, (riskAmount * this.limits.maxRiskMultiple) / spec.unitValue);
    return normalizeVolume(volume, spec);
  }

  validateTrade(req: TradeRequest): TradeValidation {
    const { account, positions, spec, side, entryPrice, stop, target } = req;
    const errors: string[] = [];
    const warnings: string[] = [];

    const gate = this.checkTradingAllowed(account, positions);
    if (!gate.ok) errors.push(`trading not allowed: ${gate.reason ?? "unknown"}`);
    if (!spec.tradeable) errors.push(`${spec.symbol} is not tradeable`);

    let volume = req.volume;
    if (!Number.isFinite(volume) || volume <= 0) {
      errors.push(`invalid volume ${volume}`);
      volume = spec.minLot;
    }
    if (volume < spec.minLot) {
      warnings.push(`volume ${volume} raised to minimum ${spec.minLot}`);
      volume = spec.minLot;
    } else if (volume > spec.maxLot) {
      warnings.push(`volume ${volume} lowered to maximum ${spec.maxLot}`);
      volume = spec.maxLot;
    }
    if (!isOnStep(volume, spec.lotStep)) {
      const stepped = normalizeVolume(volume, spec);
      warnings.push(`volume ${volume} re-stepped to ${stepped}`);
      volume = stepped;
    }

    const minDistance = spec.minStopDistance * spec.pointSize;
    if (stop !== undefined) {
      if (side === "buy" ? stop >= entryPrice : stop <= entryPrice) {
        errors.push(`stop ${stop} is on the wrong side of entry ${entryPrice}`);
      } else if (Math.abs(entryPrice - stop) < minDistance) {
        warnings.push(`stop distance ${Math.abs(entryPrice - stop)} below venue minimum ${minDistance}`);
      }
    }
    if (target !== undefined) {
      if (side === "buy" ? target <= entryPrice : target >= entryPrice) {
        errors.push(`target ${target} is on the wrong side of entry ${entryPrice}`);
      } else if (Math.abs(target - entryPrice) < minDistance) {
        warnings.push(`target distance ${Math.abs(target - entryPrice)} below venue minimum ${minDistance}`);
      }
    }

    const required = volume * spec.marginPerLot;
    if (required > account.freeMargin) {
      errors.push(`required margin ${required.toFixed(2)} exceeds free margin ${account.freeMargin.toFixed(2)}`);
    }

    return { valid: errors.length === 0, errors, warnings, volume };
  }

  /** Stops that should move: candidate `distance` behind price, only if tighter. */
  planTrailingStops(positions: Position[], distance: number): StopUpdate[] {
    if (!(distance > 0)) return [];
    const updates: StopUpdate[] = [];
    for (const p of positions) {
      const candidate = p.side === "buy" ? p.currentPrice - distance : p.currentPrice + distance;
      const tighter =
        p.stop === null || (p.side === "buy" ? candidate > p.stop : candidate < p.stop);
      if (tighter) {
        updates.push({ ticket: p.ticket, side: p.side, from: p.stop, to: candidate, target: p.target });
      }
    }
    return updates;
  }

  /**
   * Apply the trailing plan through the venue. Rejections are collected;
   * a thrown venue call propagates to the caller.
   */
  async updateTrailingStops(
    venue: Venue,
    positions: Position[],
    distance: number
  ): Promise<TrailingResult> {
    const result: TrailingResult = { updated: [], rejected: [] };
    if (!this.limits.trailingStop) return result;
    for (const update of this.planTrailingStops(positions, distance)) {
      const ack: Ack = await venue.modifyPosition(update.ticket, update.to, update.target ?? undefined);
      if (ack.ok) {
        result.updated.push(update);
      } else {
        result.rejected.push({ update, reason: `${ack.returnCode}: ${ack.reason}` });
      }
    }
    return result;
  }
}
