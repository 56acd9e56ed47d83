import fs from "node:fs/promises";
import path from "node:path";
import type { PipelineResult } from "./pipeline";
import type { JsonWriter } from "./types";

export const TOP_STATIONS_FILE = "top_stations_latest.json";
export const monthlyTotalsFile = (year: number) => `monthly_totals_${year}.json`;

export const writeJson: JsonWriter = async (filePath, value) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
};

export type WriteStatus = { path: string; ok: true } | { path: string; ok: false; error: unknown };

/** Writes both artifacts; a failure on one does not stop the other. */
export async function writeReports(
  result: Pick<PipelineResult, "monthlyTotals" | "topStations">,
  { outDir, year, write = writeJson }: { outDir: string; year: number; write?: JsonWriter },
): Promise<WriteStatus[]> {
  const artifacts: [string, unknown][] = [
    [path.join(outDir, monthlyTotalsFile(year)), result.monthlyTotals],
    [path.join(outDir, TOP_STATIONS_FILE), result.topStations],
  ];

  return Promise.all(
    artifacts.map(async ([filePath, value]): Promise<WriteStatus> => {
      try {
        await write(filePath, value);
        return { path: filePath, ok: true };
      } catch (error) {
        return { path: filePath, ok: false, error };
      }
    }),
  );
}
