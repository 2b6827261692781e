/**
 * Trading-hours window evaluated in the configured IANA time zone.
 */

export interface TradingHours {
  /** 0 = Sunday … 6 = Saturday */
  days: number[];
  startHour: number;
  /** Inclusive. */
  endHour: number;
  timezone: string;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

export function zonedDayAndHour(now: Date, timeZone: string): { day: number; hour: number } {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "short",
    hour: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);
  const weekday = parts.find((p) => p.type === "weekday")?.value ?? "";
  const hour = Number(parts.find((p) => p.type === "hour")?.value ?? NaN);
  return { day: WEEKDAYS.indexOf(weekday), hour };
}

/**
 * True when `now` falls on an allowed weekday and within [startHour, endHour].
 * A window with startHour > endHour wraps past midnight.
 */
export function isWithinTradingHours(now: Date, hours: TradingHours): boolean {
  const { day, hour } = zonedDayAndHour(now, hours.timezone);
  if (!hours.days.includes(day)) return false;
  if (hours.startHour <= hours.endHour) {
    return hour >= hours.startHour && hour <= hours.endHour;
  }
  return hour >= hours.startHour || hour <= hours.endHour;
}
