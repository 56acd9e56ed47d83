import { hideBin } from "yargs/helpers";
import { ConfigError, parseConfig } from "./config";
import { NoDataFoundError, describeError } from "./errors";
import { createHttpFetcher } from "./fetcher";
import { archiveUrl } from "./locator";
import { writeReports } from "./output";
import { runPipeline } from "./pipeline";
import { checkMonthContinuity } from "./validate";

async function main() {
  const config = parseConfig(hideBin(process.argv));
  console.log(`Ingesting ${config.prefix} trip data for ${config.year}`);

  const result = await runPipeline({
    year: config.year,
    fetcher: createHttpFetcher({ timeoutMs: config.timeoutMs }),
    locate: (year, month) =>
      archiveUrl(year, month, { baseUrl: config.baseUrl, prefix: config.prefix }),
    concurrency: config.concurrency,
  });

  console.log(`Months ingested: ${result.monthlyTotals.map((t) => t.month).join(", ")}`);
  const failed = result.skipped.filter((s) => s.reason !== "not-found");
  if (failed.length > 0) {
    console.warn(`Months skipped after errors: ${failed.map((s) => s.month).join(", ")}`);
  }
  checkMonthContinuity(result.monthlyTotals.map((t) => t.month));

  const statuses = await writeReports(result, { outDir: config.outDir, year: config.year });
  for (const status of statuses) {
    if (status.ok) {
      console.log(`Wrote ${status.path}`);
    } else {
      console.error(`Failed to write ${status.path}: ${describeError(status.error)}`);
      process.exitCode = 1;
    }
  }
}

main().catch((e: unknown) => {
  if (e instanceof NoDataFoundError || e instanceof ConfigError) {
    console.error(e.message);
  } else {
    console.error(e);
  }
  process.exitCode = 1;
});
