import { nextMonthKey } from "bb-shared/month";
import type { MonthKey } from "bb-shared/types";
import type { Logger } from "./types";

/** Months with no data between the first and last ingested month. */
export function findMissingMonths(months: MonthKey[]): MonthKey[] {
  const sorted = Array.from(new Set(months)).sort();
  const missing: MonthKey[] = [];
  let prev: MonthKey | undefined;
  for (const curr of sorted) {
    if (prev) {
      let expected = nextMonthKey(prev);
      while (expected && expected < curr) {
        missing.push(expected);
        expected = nextMonthKey(expected);
      }
    }
    prev = curr;
  }
  return missing;
}

export function checkMonthContinuity(months: MonthKey[], log: Logger = console) {
  const missing = findMissingMonths(months);
  if (missing.length > 0) {
    log.warn(`Missing months detected: ${missing.join(", ")}`);
  } else {
    log.log("No missing months detected.");
  }
  return missing;
}
