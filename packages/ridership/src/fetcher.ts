import { FetchUnavailableError } from "./errors";
import type { Fetcher } from "./types";

export const DEFAULT_TIMEOUT_MS = 60_000;

export type HttpFetcherOptions = {
  timeoutMs?: number;
  userAgent?: string;
};

export function createHttpFetcher({
  timeoutMs = DEFAULT_TIMEOUT_MS,
  userAgent = "bikeshare-board-etl",
}: HttpFetcherOptions = {}): Fetcher {
  return async (url) => {
    const headers: Record<string, string> = {
      "User-Agent": userAgent,
      Accept: "application/zip, application/octet-stream, */*",
    };

    let res: Response;
    try {
      res = await fetch(url, { headers, signal: AbortSignal.timeout(timeoutMs) });
    } catch (e) {
      throw new FetchUnavailableError(url, { cause: e });
    }

    // S3 answers 403 (or 404) for objects that were never uploaded
    if (res.status !== 200) {
      await res.body?.cancel();
      return undefined;
    }

    // Content-Type is not checked: some buckets serve zips as application/octet-stream
    try {
      return Buffer.from(await res.arrayBuffer());
    } catch (e) {
      throw new FetchUnavailableError(url, { cause: e });
    }
  };
}
