import { monthKey } from "bb-shared/month";
import type { RiderCategory } from "bb-shared/types";
import AdmZip from "adm-zip";
import { parse } from "csv-parse/sync";
import { MalformedArchiveError, describeError } from "./errors";
import { parseTimestamp } from "./timestamp";
import type { CanonicalField, CanonicalTripRow, CanonicalTripSet } from "./types";

// Header label (trimmed, lowercased) -> canonical field.
// Current exports use snake_case; 2013-2020 files used "starttime" or "Start Time".
const columnMap: Record<string, CanonicalField> = {
  started_at: "startTime",
  starttime: "startTime",
  "start time": "startTime",
  ended_at: "endTime",
  stoptime: "endTime",
  "stop time": "endTime",
  start_station_id: "startStationId",
  "start station id": "startStationId",
  start_station_name: "startStationName",
  "start station name": "startStationName",
  end_station_id: "endStationId",
  "end station id": "endStationId",
  end_station_name: "endStationName",
  "end station name": "endStationName",
};

const legacyUserTypes: Record<string, RiderCategory> = {
  subscriber: "member",
  customer: "casual",
};

type CategoryStrategy = {
  columns: string[];
  resolve: (raw: string | undefined) => RiderCategory;
};

// Tried in order; the first strategy with a column present in the header is used for the whole file.
const categoryStrategies: CategoryStrategy[] = [
  {
    columns: ["member_casual"],
    resolve: (raw) => {
      const v = raw?.trim().toLowerCase();
      return v === "member" || v === "casual" ? v : "unknown";
    },
  },
  {
    columns: ["usertype", "user type"],
    resolve: (raw) => legacyUserTypes[raw?.trim().toLowerCase() ?? ""] ?? "unknown",
  },
];

export const normalizeLabel = (label: string) => label.replace(/^\uFEFF/, "").trim().toLowerCase();

const cell = (record: string[], index: number | undefined): string | undefined => {
  if (index === undefined) {
    return undefined;
  }
  const v = record[index]?.trim();
  return v ? v : undefined;
};

/**
 * Decodes trip CSV text into canonical rows, keeping rows that started in `year`
 * (or whose start time is missing/unparsable).
 */
export const normalizeCsv = (text: string, year: number): CanonicalTripRow[] => {
  let records: string[][];
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (e) {
    throw new MalformedArchiveError(`Unreadable trip CSV: ${describeError(e)}`, { cause: e });
  }

  const [header, ...body] = records;
  if (!header) {
    return [];
  }

  const labels = header.map(normalizeLabel);
  const fieldIndex: Partial<Record<CanonicalField, number>> = {};
  labels.forEach((label, i) => {
    const field = columnMap[label];
    if (field && fieldIndex[field] === undefined) {
      fieldIndex[field] = i;
    }
  });

  let category: { strategy: CategoryStrategy; index: number } | undefined;
  for (const strategy of categoryStrategies) {
    const index = labels.findIndex((label) => strategy.columns.includes(label));
    if (index !== -1) {
      category = { strategy, index };
      break;
    }
  }

  const rows: CanonicalTripRow[] = [];
  for (const record of body) {
    const row: CanonicalTripRow = {
      startTime: parseTimestamp(cell(record, fieldIndex.startTime)),
      endTime: parseTimestamp(cell(record, fieldIndex.endTime)),
      startStationId: cell(record, fieldIndex.startStationId),
      startStationName: cell(record, fieldIndex.startStationName),
      endStationId: cell(record, fieldIndex.endStationId),
      endStationName: cell(record, fieldIndex.endStationName),
      riderCategory: category ? category.strategy.resolve(record[category.index]) : "unknown",
    };
    // files are occasionally cut at the wrong month boundary
    if (row.startTime && row.startTime.getUTCFullYear() !== year) {
      continue;
    }
    rows.push(row);
  }
  return rows;
};

const isTripTable = (entry: AdmZip.IZipEntry) =>
  !entry.isDirectory &&
  !entry.entryName.startsWith("__MACOSX/") &&
  entry.entryName.toLowerCase().endsWith(".csv");

/** Unpacks a monthly archive and normalizes the first CSV inside it. */
export const normalizeArchive = (
  bytes: Buffer,
  target: { year: number; month: number },
): CanonicalTripSet => {
  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(bytes).getEntries();
  } catch (e) {
    throw new MalformedArchiveError(`Not a readable zip archive: ${describeError(e)}`, {
      cause: e,
    });
  }

  const entry = entries.find(isTripTable);
  if (!entry) {
    throw new MalformedArchiveError("No CSV found in zip");
  }

  let text: string;
  try {
    text = entry.getData().toString("utf8");
  } catch (e) {
    throw new MalformedArchiveError(`Could not inflate ${entry.entryName}: ${describeError(e)}`, {
      cause: e,
    });
  }

  return {
    month: monthKey(target.year, target.month),
    rows: normalizeCsv(text, target.year),
  };
};
