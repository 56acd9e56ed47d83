import type { RankedCategory, StationCount } from "bb-shared/types";
import type { CanonicalTripSet, StationSide } from "./types";

export const UNKNOWN_STATION = "Unknown";

export function totalRides(trips: CanonicalTripSet): number {
  return trips.rows.length;
}

/**
 * Trips per (station id, station name) for one rider category, in first-seen order.
 * Missing ids and names become "Unknown", so all unattributed trips share one bucket.
 */
export function groupCounts(
  trips: CanonicalTripSet,
  side: StationSide,
  category: RankedCategory,
): StationCount[] {
  const groups = new Map<string, StationCount>();

  for (const row of trips.rows) {
    if (row.riderCategory !== category) {
      continue;
    }
    const stationId = (side === "start" ? row.startStationId : row.endStationId) ?? UNKNOWN_STATION;
    const stationName =
      (side === "start" ? row.startStationName : row.endStationName) ?? UNKNOWN_STATION;

    // \u0000 never shows up in CSV text, so the joined key cannot collide
    const key = `${stationId}\u0000${stationName}`;
    const group = groups.get(key);
    if (group) {
      group.trips++;
    } else {
      groups.set(key, { station_id: stationId, station_name: stationName, trips: 1 });
    }
  }

  return Array.from(groups.values());
}
