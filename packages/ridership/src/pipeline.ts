import { monthKey } from "bb-shared/month";
import type { MonthlyTotal, TopStationsReport } from "bb-shared/types";
import * as _ from "radash";
import { groupCounts, totalRides } from "./aggregate";
import { NoDataFoundError, describeError } from "./errors";
import { archiveUrl } from "./locator";
import { normalizeArchive } from "./normalize";
import { top5 } from "./rank";
import type { CanonicalTripSet, Fetcher, Logger, MonthOutcome } from "./types";

export type SkippedMonth = Extract<MonthOutcome, { kind: "skipped" }>;

export type PipelineOptions = {
  year: number;
  fetcher: Fetcher;
  /** Archive URL for a month; defaults to the public tripdata bucket */
  locate?: (year: number, month: number) => string;
  /** Months fetched at once. 1 processes them strictly in order */
  concurrency?: number;
  log?: Logger;
};

export type PipelineResult = {
  monthlyTotals: MonthlyTotal[];
  topStations: TopStationsReport;
  skipped: SkippedMonth[];
};

async function ingestMonth(
  year: number,
  month: number,
  url: string,
  fetcher: Fetcher,
  log: Logger,
): Promise<MonthOutcome> {
  const key = monthKey(year, month);
  log.log(`Checking: ${url}`);

  const [fetchError, bytes] = await _.tryit(fetcher)(url);
  if (fetchError) {
    const detail = describeError(fetchError);
    log.error(`  -> ${key} fetch failed: ${detail}`);
    return { kind: "skipped", month: key, reason: "fetch-failed", detail };
  }
  if (!bytes) {
    log.log(`  -> ${key} not found`);
    return { kind: "skipped", month: key, reason: "not-found" };
  }
  log.log(`  -> ${key} found (${bytes.length} bytes)`);

  const [parseError, trips] = _.tryit(normalizeArchive)(bytes, { year, month });
  if (!trips) {
    const detail = describeError(parseError);
    log.warn(`  -> ${key} error reading zip: ${detail}`);
    return { kind: "skipped", month: key, reason: "malformed", detail };
  }
  return { kind: "ok", month: key, trips };
}

export function buildTopStationsReport(trips: CanonicalTripSet): TopStationsReport {
  return {
    latest_month: trips.month,
    top5: {
      starts: {
        casual: top5(groupCounts(trips, "start", "casual")),
        member: top5(groupCounts(trips, "start", "member")),
      },
      ends: {
        casual: top5(groupCounts(trips, "end", "casual")),
        member: top5(groupCounts(trips, "end", "member")),
      },
    },
  };
}

/**
 * Fetches and normalizes every month of `year`, then derives the monthly totals and the
 * leaderboard of the latest month. Months that are missing or unreadable are skipped;
 * only a year without a single usable month is an error.
 */
export async function runPipeline({
  year,
  fetcher,
  locate = (y, m) => archiveUrl(y, m),
  concurrency = 1,
  log = console,
}: PipelineOptions): Promise<PipelineResult> {
  // Resolve every URL first so a bad locator fails before any download starts
  const targets = _.list(1, 12).map((month) => ({ month, url: locate(year, month) }));

  const ingest = ({ month, url }: { month: number; url: string }) =>
    ingestMonth(year, month, url, fetcher, log);

  // Totals are folded as months arrive; only the newest month's rows are held
  const monthlyTotals: MonthlyTotal[] = [];
  const skipped: SkippedMonth[] = [];
  const newest: { trips?: CanonicalTripSet } = {};
  const collect = (outcome: MonthOutcome) => {
    if (outcome.kind === "skipped") {
      skipped.push(outcome);
      return;
    }
    monthlyTotals.push({ month: outcome.month, rides: totalRides(outcome.trips) });
    if (!newest.trips || outcome.month > newest.trips.month) {
      newest.trips = outcome.trips;
    }
  };

  if (concurrency > 1) {
    // radash hands out work from the end of the list
    await _.parallel(concurrency, targets, async (target) => collect(await ingest(target)));
  } else {
    for (const target of targets) {
      collect(await ingest(target));
    }
  }

  const latest = newest.trips;
  if (!latest) {
    throw new NoDataFoundError(year);
  }

  return {
    monthlyTotals: _.alphabetical(monthlyTotals, (t) => t.month),
    topStations: buildTopStationsReport(latest),
    skipped: _.alphabetical(skipped, (o) => o.month),
  };
}
