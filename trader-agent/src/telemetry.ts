/**
 * Per-tick telemetry records and cumulative session counters.
 */

export type TickOutcome = "completed" | "no_data" | "outside_hours" | "abandoned";

export interface TickTelemetry {
  sessionId: string;
  seq: number;
  at: number;
  outcome: TickOutcome;
  durationMs: number;
  bars: number;
  /** Non-none signals produced. */
  signals: number;
  submitted: number;
  /** Validation failures plus broker rejections on submit. */
  failed: number;
  /** Signals stopped by the risk gate. */
  blocked: number;
  exits: number;
  exitFailures: number;
  stopsUpdated: number;
  positionsByStrategy: Record<string, number>;
  error: string | null;
}

export interface StrategyCounters {
  signals: number;
  submitted: number;
  failed: number;
  blocked: number;
  exits: number;
}

export interface SessionStats {
  ticks: number;
  completed: number;
  noData: number;
  outsideHours: number;
  abandoned: number;
  signals: number;
  submitted: number;
  failed: number;
  blocked: number;
  exits: number;
  exitFailures: number;
  stopsUpdated: number;
  byStrategy: Record<string, StrategyCounters>;
}

export function newTick(sessionId: string, seq: number, at: number): TickTelemetry {
  return {
    sessionId,
    seq,
    at,
    outcome: "completed",
    durationMs: 0,
    bars: 0,
    signals: 0,
    submitted: 0,
    failed: 0,
    blocked: 0,
    exits: 0,
    exitFailures: 0,
    stopsUpdated: 0,
    positionsByStrategy: {},
    error: null,
  };
}

export function emptyStats(strategyIds: string[]): SessionStats {
  const byStrategy: Record<string, StrategyCounters> = {};
  for (const id of strategyIds) {
    byStrategy[id] = { signals: 0, submitted: 0, failed: 0, blocked: 0, exits: 0 };
  }
  return {
    ticks: 0,
    completed: 0,
    noData: 0,
    outsideHours: 0,
    abandoned: 0,
    signals: 0,
    submitted: 0,
    failed: 0,
    blocked: 0,
    exits: 0,
    exitFailures: 0,
    stopsUpdated: 0,
    byStrategy,
  };
}

export function accumulate(stats: SessionStats, tick: TickTelemetry): void {
  stats.ticks++;
  if (tick.outcome === "completed") stats.completed++;
  else if (tick.outcome === "no_data") stats.noData++;
  else if (tick.outcome === "outside_hours") stats.outsideHours++;
  else stats.abandoned++;
  stats.signals += tick.signals;
  stats.submitted += tick.submitted;
  stats.failed += tick.failed;
  stats.blocked += tick.blocked;
  stats.exits += tick.exits;
  stats.exitFailures += tick.exitFailures;
  stats.stopsUpdated += tick.stopsUpdated;
}

export function formatStats(stats: SessionStats): string[] {
  const lines = [
    `Ticks: ${stats.ticks} (completed ${stats.completed}, no data ${stats.noData}, outside hours ${stats.outsideHours}, abandoned ${stats.abandoned})`,
    `Signals: ${stats.signals} | Submitted: ${stats.submitted} | Failed: ${stats.failed} | Blocked: ${stats.blocked}`,
    `Exits: ${stats.exits} (failed ${stats.exitFailures}) | Stops trailed: ${stats.stopsUpdated}`,
  ];
  for (const [id, c] of Object.entries(stats.byStrategy)) {
    lines.push(`  ${id}: signals ${c.signals}, submitted ${c.submitted}, failed ${c.failed}, blocked ${c.blocked}, exits ${c.exits}`);
  }
  return lines;
}
