import path from "node:path";
import yargs from "yargs";
import { DEFAULT_TIMEOUT_MS } from "./fetcher";
import { DEFAULT_BASE_URL, DEFAULT_PREFIX } from "./locator";

// npm runs workspace scripts from the package directory
export const DEFAULT_OUT_DIR = path.join(process.cwd(), "../../docs/data");

export type EtlConfig = {
  year: number;
  prefix: string;
  baseUrl: string;
  outDir: string;
  concurrency: number;
  timeoutMs: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads options from argv, falling back to TRIPDATA_BASE_URL / TRIPDATA_PREFIX
 * and then to defaults. Other TRIPDATA_* variables are not read.
 */
export function parseConfig(args: string[], now = new Date()): EtlConfig {
  const argv = yargs(args)
    .option("year", {
      alias: "y",
      type: "number",
      describe: "Year to ingest",
      default: now.getUTCFullYear(),
    })
    .option("prefix", {
      alias: "p",
      type: "string",
      describe: "System prefix of the archive names (JC = Jersey City)",
      default: process.env.TRIPDATA_PREFIX || DEFAULT_PREFIX,
    })
    .option("base-url", {
      alias: "b",
      type: "string",
      describe: "Bucket URL the monthly archives are published under",
      default: process.env.TRIPDATA_BASE_URL || DEFAULT_BASE_URL,
    })
    .option("out-dir", {
      alias: "o",
      type: "string",
      describe: "Directory for the generated JSON files",
      default: DEFAULT_OUT_DIR,
    })
    .option("concurrency", {
      alias: "c",
      type: "number",
      describe: "Months downloaded in parallel",
      default: 1,
    })
    .option("timeout", {
      alias: "t",
      type: "number",
      describe: "Per-download timeout in milliseconds",
      default: DEFAULT_TIMEOUT_MS,
    })
    .check((a) => {
      if (!Number.isInteger(a.year) || a.year < 1000 || a.year > 9999) {
        throw new ConfigError(`--year must be a four-digit year, got ${a.year}`);
      }
      if (!Number.isInteger(a.concurrency) || a.concurrency < 1 || a.concurrency > 12) {
        throw new ConfigError(`--concurrency must be an integer in 1..12, got ${a.concurrency}`);
      }
      if (!(a.timeout > 0)) {
        throw new ConfigError(`--timeout must be positive, got ${a.timeout}`);
      }
      if (!/^[A-Za-z0-9_-]+$/.test(a.prefix)) {
        throw new ConfigError(`--prefix may only contain letters, digits, _ and -`);
      }
      return true;
    })
    .fail((msg, err) => {
      throw err ?? new ConfigError(msg);
    })
    .strict()
    .help()
    .parseSync();

  return {
    year: argv.year,
    prefix: argv.prefix,
    baseUrl: argv["base-url"],
    outDir: path.resolve(argv["out-dir"]),
    concurrency: argv.concurrency,
    timeoutMs: argv.timeout,
  };
}
