// ============================================================================
// Cash Logistics MCP Server — Utilities
// ============================================================================

import { z } from "zod";

const MS_PER_DAY = 86_400_000;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a calendar date (`YYYY-MM-DD`) to a day number since the Unix epoch.
 * Returns null for malformed or impossible dates (e.g. 2025-02-30).
 */
export function toEpochDay(date: string): number | null {
  const m = ISO_DATE_RE.exec(date);
  if (!m) return null;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return Math.round(ms / MS_PER_DAY);
}

export function fromEpochDay(epochDay: number): string {
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

function requireEpochDay(date: string): number {
  const day = toEpochDay(date);
  if (day === null) throw new RangeError(`Not a calendar date: ${date}`);
  return day;
}

export function addDays(date: string, days: number): string {
  return fromEpochDay(requireEpochDay(date) + days);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function diffDays(from: string, to: string): number {
  return requireEpochDay(to) - requireEpochDay(from);
}

/** Weekday with Monday = 0 … Sunday = 6. */
export function weekdayOf(date: string): number {
  // 1970-01-01 was a Thursday (3)
  return (((requireEpochDay(date) + 3) % 7) + 7) % 7;
}

/** Every date from `from` to `to`, both inclusive. */
export function eachDate(from: string, to: string): string[] {
  const start = requireEpochDay(from);
  const end = requireEpochDay(to);
  const out: string[] = [];
  for (let d = start; d <= end; d++) out.push(fromEpochDay(d));
  return out;
}

const ISO_MONTH_RE = /^(\d{4})-(\d{2})$/;

/** First and last calendar date of a `YYYY-MM` month. */
export function monthBounds(month: string): { first: string; last: string } {
  const m = ISO_MONTH_RE.exec(month);
  const index = m ? Number(m[2]) - 1 : -1;
  if (!m || index < 0 || index > 11) throw new RangeError(`Not a calendar month: ${month}`);
  const year = Number(m[1]);
  const first = Math.round(Date.UTC(year, index, 1) / MS_PER_DAY);
  const next = Math.round(Date.UTC(year, index + 1, 1) / MS_PER_DAY);
  return { first: fromEpochDay(first), last: fromEpochDay(next - 1) };
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Zod schema for a calendar date argument.
 */
export const IsoDateSchema = z
  .string()
  .refine((v) => toEpochDay(v) !== null, { message: "expected a calendar date in YYYY-MM-DD form" });

// ─── Geometry ──────────────────────────────────────────────────────────────

const EARTH_RADIUS_KM = 6371;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Great-circle distance between two coordinates, in kilometres.
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

/** Round a currency amount to cents. */
export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/** Round a ratio to `places` decimals (4 by default). */
export function roundRatio(value: number, places = 4): number {
  const scale = 10 ** places;
  return Math.round(value * scale) / scale;
}

/** `76000` → `$76,000.00` */
export function formatUsd(amount: number): string {
  const sign = amount < 0 ? "-" : "";
  const fixed = Math.abs(amount).toFixed(2).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${sign}$${fixed}`;
}
