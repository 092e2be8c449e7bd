import type { IsoDate } from "../types/index.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const WEEKDAYS_EN = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;
export const WEEKDAYS_NO = ["Søndag", "Mandag", "Tirsdag", "Onsdag", "Torsdag", "Fredag", "Lørdag"] as const;

/** Day index (0 = Sunday) for a weekday name in English or Norwegian, or null. */
export function weekdayIndex(name: string): number | null {
  const lower = name.toLowerCase();
  for (const names of [WEEKDAYS_EN, WEEKDAYS_NO]) {
    const idx = names.findIndex((n) => n.toLowerCase() === lower);
    if (idx >= 0) return idx;
  }
  return null;
}

export function isIsoDate(value: string): value is IsoDate {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

function toUtcMs(date: IsoDate): number {
  const [y, m, d] = date.split("-").map(Number);
  return Date.UTC(y, m - 1, d);
}

/** Whole days from `a` to `b` (positive when b is later). */
export function daysBetween(a: IsoDate, b: IsoDate): number {
  return Math.round((toUtcMs(b) - toUtcMs(a)) / MS_PER_DAY);
}

export function weekdayOf(date: IsoDate): number {
  return new Date(toUtcMs(date)).getUTCDay();
}

export function englishWeekday(date: IsoDate): string {
  return WEEKDAYS_EN[weekdayOf(date)];
}

/** Calendar date of a local Date, e.g. today for a default. */
export function toIsoDate(date: Date): IsoDate {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function isWithinRange(date: IsoDate, from?: IsoDate, to?: IsoDate): boolean {
  if (from && date < from) return false;
  if (to && date > to) return false;
  return true;
}

/**
 * Normalize the date notations found in bank exports to ISO:
 * `2026-01-20`, `2026-01-20 14:33:10`, `2026-01-20T14:33:10Z`,
 * `20.01.2026`, `20/01/2026`, `20-01-26`.
 * Day-first order is assumed for the non-ISO forms (European banks).
 */
export function normalizeBankDate(raw: string): IsoDate | null {
  const t = raw.trim();

  const iso = t.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/);
  if (iso) {
    const [, y, m, d] = iso;
    const candidate = `${y}-${m.padStart(2, "0")}-${d.padStart(2, "0")}`;
    return isIsoDate(candidate) ? candidate : null;
  }

  const dmy = t.match(/^(\d{1,2})[./-](\d{1,2})[./-](\d{2,4})$/);
  if (dmy) {
    const [, d, m, y] = dmy;
    const year = y.length === 2 ? `20${y}` : y;
    const candidate = `${year}-${m.padStart(2, "0")}-${d.padStart(2, "0")}`;
    return isIsoDate(candidate) ? candidate : null;
  }

  return null;
}
