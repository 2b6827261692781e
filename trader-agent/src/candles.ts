/**
 * Bar files for replay: CSV (timestamp,open,high,low,close,volume) or a
 * JSON array of { t, o, h, l, c, v }. Numbers may arrive as strings.
 */

import { readFileSync } from "fs";
import { extname } from "path";
import { z } from "zod";
import type { Bar } from "../../src/lib/types";

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

const timestamp = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .min(1)
    .transform((s, ctx) => {
      const n = /^\d+$/.test(s) ? Number(s) : Date.parse(s);
      if (Number.isNaN(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad timestamp "${s}"` });
        return z.NEVER;
      }
      return n;
    }),
]);

const barSchema = z
  .object({ t: timestamp, o: numeric, h: numeric, l: numeric, c: numeric, v: numeric.default(0) })
  .refine((b) => b.h >= Math.max(b.o, b.c) && b.l <= Math.min(b.o, b.c), {
    message: "high/low do not bracket open/close",
  });

export function parseBars(rows: unknown[]): Bar[] {
  const bars = rows.map((row, i) => {
    const r = barSchema.safeParse(row);
    if (!r.success) {
      throw new Error(`Bar ${i}: ${r.error.issues.map((x) => x.message).join("; ")}`);
    }
    return r.data;
  });
  return bars.sort((a, b) => a.t - b.t);
}

const CSV_ALIASES: Record<string, keyof Bar> = {
  t: "t", time: "t", timestamp: "t", date: "t",
  o: "o", open: "o",
  h: "h", high: "h",
  l: "l", low: "l",
  c: "c", close: "c",
  v: "v", volume: "v", tick_volume: "v",
};

export function parseCsv(text: string): Bar[] {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  if (lines.length === 0) return [];
  const header = lines[0].split(",").map((h) => h.trim().toLowerCase());
  const keys = header.map((h) => CSV_ALIASES[h]);
  if (!keys.includes("t") || !keys.includes("c")) {
    throw new Error(`CSV header must name at least time and close columns, got: ${lines[0]}`);
  }
  const rows = lines.slice(1).map((line) => {
    const cells = line.split(",");
    const row: Record<string, string> = {};
    keys.forEach((key, i) => {
      if (key) row[key] = cells[i] ?? "";
    });
    // close-only files: open/high/low default to close
    for (const k of ["o", "h", "l"]) {
      if (row[k] === undefined || row[k] === "") row[k] = row.c;
    }
    return row;
  });
  return parseBars(rows);
}

export function loadBars(path: string): Bar[] {
  const text = readFileSync(path, "utf8");
  if (extname(path).toLowerCase() === ".json") {
    const raw: unknown = JSON.parse(text);
    if (!Array.isArray(raw)) throw new Error(`${path}: expected a JSON array of bars`);
    return parseBars(raw);
  }
  return parseCsv(text);
}
