/** Membership classification of a trip after normalization. */
export type RiderCategory = "member" | "casual" | "unknown";

/** Categories that get their own leaderboard. `unknown` rides only count towards totals. */
export type RankedCategory = Exclude<RiderCategory, "unknown">;

/** "YYYY-MM"; string order equals chronological order. */
export type MonthKey = string;

export type StationId = string;
export type StationName = string;

export type StationCount = {
  /** Source station id, or "Unknown" when the trip had none */
  station_id: StationId;
  station_name: StationName;
  trips: number;
};

export type MonthlyTotal = {
  month: MonthKey;
  rides: number;
};

export type CategoryLeaders = Record<RankedCategory, StationCount[]>;

/** Contents of `top_stations_latest.json`. */
export type TopStationsReport = {
  latest_month: MonthKey;
  top5: {
    starts: CategoryLeaders;
    ends: CategoryLeaders;
  };
};
