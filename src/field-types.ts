/**
 * Value types for Polarion custom fields whose wire form is a formatted
 * string (date, time, duration) or a nested document (table).
 */

import { z } from "zod";
import type { TextContent } from "./resource.js";

// ─── Date ──────────────────────────────────────────────────────────────────

/** Calendar date without time zone; wire form `YYYY-MM-DD`. */
export interface DateOnly {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export function parseDateOnly(s: string): DateOnly {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s);
  if (!m) throw new RangeError(`invalid date format: "${s}" (expected YYYY-MM-DD)`);
  const date = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
  const utc = new Date(Date.UTC(date.year, date.month - 1, date.day));
  if (utc.getUTCMonth() !== date.month - 1 || utc.getUTCDate() !== date.day) {
    throw new RangeError(`invalid date: "${s}"`);
  }
  return date;
}

export function formatDateOnly(d: DateOnly): string {
  return `${String(d.year).padStart(4, "0")}-${pad2(d.month)}-${pad2(d.day)}`;
}

/** The UTC calendar date of a timestamp. */
export function toDateOnly(date: Date): DateOnly {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
}

// ─── Time of day ───────────────────────────────────────────────────────────

/** Wall-clock time; wire form `HH:MM:SS`. */
export interface TimeOnly {
  hour: number;
  minute: number;
  second: number;
}

export function timeOnly(hour: number, minute: number, second = 0): TimeOnly {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`invalid hour: ${hour} (must be 0-23)`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new RangeError(`invalid minute: ${minute} (must be 0-59)`);
  }
  if (!Number.isInteger(second) || second < 0 || second > 59) {
    throw new RangeError(`invalid second: ${second} (must be 0-59)`);
  }
  return { hour, minute, second };
}

export function parseTimeOnly(s: string): TimeOnly {
  const m = /^(\d{1,2}):(\d{1,2}):(\d{1,2})$/.exec(s);
  if (!m) throw new RangeError(`invalid time format: "${s}" (expected HH:MM:SS)`);
  return timeOnly(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function formatTimeOnly(t: TimeOnly): string {
  return `${pad2(t.hour)}:${pad2(t.minute)}:${pad2(t.second)}`;
}

// ─── Duration ──────────────────────────────────────────────────────────────

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const UNIT_MS: Readonly<Record<string, number>> = { d: DAY, h: HOUR, m: MINUTE, s: SECOND };

/**
 * Parses Polarion's duration notation, e.g. `"2d 3h 30m"`, into milliseconds.
 * Units: d, h, m, s. Whitespace between number and unit is allowed.
 */
export function parseDuration(s: string): number {
  const matches = [...s.matchAll(/(\d+)\s*([dhms])/g)];
  if (matches.length === 0) throw new RangeError(`invalid duration format: "${s}"`);
  let total = 0;
  for (const [, value, unit] of matches) {
    total += Number(value) * (UNIT_MS[unit] ?? 0);
  }
  return total;
}

/** Milliseconds → `"1d 2h 30m"`; sub-second remainders are dropped, zero is `"0s"`. */
export function formatDuration(ms: number): string {
  let rest = Math.max(0, Math.floor(ms / SECOND)) * SECOND;
  if (rest === 0) return "0s";
  const parts: string[] = [];
  for (const [unit, size] of Object.entries(UNIT_MS)) {
    const n = Math.floor(rest / size);
    if (n > 0) {
      parts.push(`${n}${unit}`);
      rest -= n * size;
    }
  }
  return parts.join(" ");
}

// ─── Table ─────────────────────────────────────────────────────────────────

const textContentSchema = z.object({ type: z.string().default(""), value: z.string().default("") });

export const tableFieldSchema = z.object({
  keys: z.array(z.string()).default([]),
  rows: z.array(z.object({ values: z.array(textContentSchema).default([]) })).default([]),
});

/** Table custom field: column keys plus rows of rich-text cells. */
export type TableField = z.infer<typeof tableFieldSchema>;

export function tableCell(table: TableField, row: number, col: number): TextContent {
  const r = table.rows[row];
  if (!r) throw new RangeError(`row index ${row} out of bounds (table has ${table.rows.length} rows)`);
  const cell = r.values[col];
  if (!cell) throw new RangeError(`column index ${col} out of bounds (row ${row} has ${r.values.length} columns)`);
  return cell;
}

export function tableCellByKey(table: TableField, row: number, key: string): TextContent {
  const col = table.keys.indexOf(key);
  if (col === -1) throw new RangeError(`column key "${key}" not found`);
  return tableCell(table, row, col);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
