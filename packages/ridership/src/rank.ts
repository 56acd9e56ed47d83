import type { StationCount } from "bb-shared/types";

export const TOP_N = 5;

const compareCodeUnits = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Highest trip counts first. Equal counts are ordered by station id, then station name,
 * so the leaderboard does not depend on the order rows appeared in the source file.
 */
export function compareStationCounts(a: StationCount, b: StationCount): number {
  return (
    b.trips - a.trips ||
    compareCodeUnits(a.station_id, b.station_id) ||
    compareCodeUnits(a.station_name, b.station_name)
  );
}

export function topStations(counts: readonly StationCount[], limit = TOP_N): StationCount[] {
  return counts
    .toSorted(compareStationCounts)
    .slice(0, Math.max(0, limit))
    .map((c) => ({ ...c }));
}

export const top5 = (counts: readonly StationCount[]) => topStations(counts, TOP_N);
