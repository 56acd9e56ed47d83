import { isMonth } from "bb-shared/month";
import { InvalidMonthError } from "./errors";

export const DEFAULT_BASE_URL = "https://s3.amazonaws.com/tripdata";
export const DEFAULT_PREFIX = "JC"; // Jersey City system

export type LocatorOptions = {
  baseUrl?: string;
  prefix?: string;
};

export function archiveName(year: number, month: number, prefix = DEFAULT_PREFIX): string {
  if (!isMonth(month)) {
    throw new InvalidMonthError(month);
  }
  const ym = `${year}${String(month).padStart(2, "0")}`;
  return `${prefix}-${ym}-citibike-tripdata.csv.zip`;
}

export function archiveUrl(
  year: number,
  month: number,
  { baseUrl = DEFAULT_BASE_URL, prefix = DEFAULT_PREFIX }: LocatorOptions = {},
): string {
  return `${baseUrl.replace(/\/+$/, "")}/${archiveName(year, month, prefix)}`;
}
