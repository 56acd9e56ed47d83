import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_OUT_DIR, parseConfig } from "./config";

const NOW = new Date("2026-03-01T00:00:00Z");

describe("parseConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("fills in defaults", () => {
    expect(parseConfig([], NOW)).toEqual({
      year: 2026,
      prefix: "JC",
      baseUrl: "https://s3.amazonaws.com/tripdata",
      outDir: path.resolve(DEFAULT_OUT_DIR),
      concurrency: 1,
      timeoutMs: 60_000,
    });
  });

  it("reads command line options", () => {
    const config = parseConfig(
      ["--year", "2025", "--prefix", "NYC", "-c", "4", "--timeout", "5000", "--out-dir", "/tmp/out"],
      NOW,
    );
    expect(config).toEqual({
      year: 2025,
      prefix: "NYC",
      baseUrl: "https://s3.amazonaws.com/tripdata",
      outDir: path.resolve("/tmp/out"),
      concurrency: 4,
      timeoutMs: 5000,
    });
  });

  it("falls back to TRIPDATA_BASE_URL and TRIPDATA_PREFIX", () => {
    vi.stubEnv("TRIPDATA_BASE_URL", "https://mirror.example.test/tripdata");
    vi.stubEnv("TRIPDATA_PREFIX", "NYC");
    const config = parseConfig([], NOW);
    expect(config.baseUrl).toBe("https://mirror.example.test/tripdata");
    expect(config.prefix).toBe("NYC");
  });

  it("ignores unrelated TRIPDATA_* variables", () => {
    vi.stubEnv("TRIPDATA_TOKEN", "test-secret");
    vi.stubEnv("TRIPDATA_YEAR", "1999");
    expect(parseConfig([], NOW).year).toBe(2026);
  });

  it("lets the command line win over the environment", () => {
    vi.stubEnv("TRIPDATA_PREFIX", "NYC");
    expect(parseConfig(["--prefix", "JC"], NOW).prefix).toBe("JC");
  });

  it("rejects out-of-range values", () => {
    expect(() => parseConfig(["--concurrency", "0"], NOW)).toThrow(
      "--concurrency must be an integer in 1..12, got 0",
    );
    expect(() => parseConfig(["--year", "25"], NOW)).toThrow(
      "--year must be a four-digit year, got 25",
    );
    expect(() => parseConfig(["--timeout=-1"], NOW)).toThrow("--timeout must be positive, got -1");
    expect(() => parseConfig(["--prefix", "../x"], NOW)).toThrow("--prefix may only contain");
  });

  it("rejects unknown options", () => {
    expect(() => parseConfig(["--bogus"], NOW)).toThrow("Unknown argument: bogus");
  });
});
