import type { StationCount } from "bb-shared/types";
import { describe, expect, it } from "vitest";
import { top5, topStations } from "./rank";

const count = (station_id: string, trips: number, station_name = `Station ${station_id}`) => ({
  station_id,
  station_name,
  trips,
});

const sumTrips = (counts: StationCount[]) => counts.reduce((a, c) => a + c.trips, 0);

describe("top5", () => {
  it("returns every group when there are fewer than five", () => {
    expect(top5([count("A", 1), count("B", 4)])).toEqual([count("B", 4), count("A", 1)]);
  });

  it("keeps the five busiest stations", () => {
    const counts = [
      count("A", 3),
      count("B", 9),
      count("C", 1),
      count("D", 7),
      count("E", 2),
      count("F", 8),
      count("G", 5),
    ];
    const top = top5(counts);
    expect(top.map((c) => c.trips)).toEqual([9, 8, 7, 5, 3]);
    expect(sumTrips(top)).toBeLessThanOrEqual(sumTrips(counts));
  });

  it("breaks ties by station id, then name", () => {
    expect(
      top5([count("B", 3), count("C", 5), count("A", 3), count("A", 3, "Annex"), count("D", 1)]),
    ).toEqual([count("C", 5), count("A", 3, "Annex"), count("A", 3), count("B", 3), count("D", 1)]);
  });

  it("does not depend on input order", () => {
    const counts = [count("X", 2), count("Y", 2), count("Z", 2)];
    expect(top5(counts.toReversed())).toEqual(top5(counts));
  });

  it("leaves the input untouched", () => {
    const counts = [count("A", 1), count("B", 2)];
    const top = top5(counts);
    expect(counts.map((c) => c.station_id)).toEqual(["A", "B"]);
    expect(top[0]).toEqual(counts[1]);
    expect(top[0]).not.toBe(counts[1]);
  });

  it("returns nothing for an empty table", () => {
    expect(top5([])).toEqual([]);
  });
});

describe("topStations", () => {
  it("honours a custom limit", () => {
    expect(topStations([count("A", 1), count("B", 2), count("C", 3)], 2)).toEqual([
      count("C", 3),
      count("B", 2),
    ]);
  });
});
