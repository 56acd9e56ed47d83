import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchUnavailableError } from "./errors";
import { createHttpFetcher } from "./fetcher";

const ARCHIVE_URL = "https://tripdata.example.test/JC-202501-citibike-tripdata.csv.zip";

describe("createHttpFetcher", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the body of a 200 response", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("PK-archive-bytes", {
        status: 200,
        headers: { "Content-Type": "application/octet-stream" },
      }),
    );
    const bytes = await createHttpFetcher()(ARCHIVE_URL);
    expect(bytes?.toString("utf8")).toBe("PK-archive-bytes");
  });

  it.each([403, 404, 500])("treats status %i as not published", async (status) => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("<Error/>", { status }));
    await expect(createHttpFetcher()(ARCHIVE_URL)).resolves.toBeUndefined();
  });

  it("wraps transport errors", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));
    const pending = createHttpFetcher()(ARCHIVE_URL);
    await expect(pending).rejects.toBeInstanceOf(FetchUnavailableError);
    await expect(pending).rejects.toMatchObject({ url: ARCHIVE_URL });
  });

  it("sends a user agent and a timeout signal", async () => {
    const spy = vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("", { status: 404 }));
    await createHttpFetcher({ userAgent: "test-agent", timeoutMs: 1000 })(ARCHIVE_URL);
    expect(spy).toHaveBeenCalledWith(
      ARCHIVE_URL,
      expect.objectContaining({
        headers: expect.objectContaining({ "User-Agent": "test-agent" }),
        signal: expect.any(AbortSignal),
      }),
    );
  });
});
