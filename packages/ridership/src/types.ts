import type { MonthKey, RiderCategory } from "bb-shared/types";

/** A trip reduced to the fields every downstream aggregation uses. */
export type CanonicalTripRow = {
  startTime?: Date;
  endTime?: Date;
  startStationId?: string;
  startStationName?: string;
  endStationId?: string;
  endStationName?: string;
  riderCategory: RiderCategory;
};

export type CanonicalTripSet = {
  month: MonthKey; // the month the archive was fetched for
  rows: CanonicalTripRow[];
};

export type CanonicalField = Exclude<keyof CanonicalTripRow, "riderCategory">;

export type StationSide = "start" | "end";

/** Resolves an archive URL; bytes, or undefined when nothing is published there. */
export type Fetcher = (url: string) => Promise<Buffer | undefined>;

export type JsonWriter = (filePath: string, value: unknown) => Promise<void>;

export type SkipReason = "not-found" | "fetch-failed" | "malformed";

export type MonthOutcome =
  | { kind: "ok"; month: MonthKey; trips: CanonicalTripSet }
  | { kind: "skipped"; month: MonthKey; reason: SkipReason; detail?: string };

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
