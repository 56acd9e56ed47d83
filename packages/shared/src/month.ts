import type { MonthKey } from "./types";

export function isMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

export function monthKey(year: number, month: number): MonthKey {
  return `${year}-${String(month).padStart(2, "0")}`;
}

/** Inverse of `monthKey`; undefined for anything that is not "YYYY-MM". */
export function parseMonthKey(key: string): { year: number; month: number } | undefined {
  const m = /^(\d{4})-(\d{2})$/.exec(key);
  if (!m?.[1] || !m[2]) {
    return undefined;
  }
  const year = Number(m[1]);
  const month = Number(m[2]);
  return isMonth(month) ? { year, month } : undefined;
}

export function nextMonthKey(key: MonthKey): MonthKey | undefined {
  const parsed = parseMonthKey(key);
  if (!parsed) {
    return undefined;
  }
  return parsed.month === 12
    ? monthKey(parsed.year + 1, 1)
    : monthKey(parsed.year, parsed.month + 1);
}
