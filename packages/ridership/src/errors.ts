export class InvalidMonthError extends Error {
  constructor(readonly month: number) {
    super(`Month must be an integer in 1..12, got ${month}`);
    this.name = "InvalidMonthError";
  }
}

/** Transport-level failure (timeout, connection reset, unreadable body). */
export class FetchUnavailableError extends Error {
  constructor(
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not fetch ${url}`, options);
    this.name = "FetchUnavailableError";
  }
}

export class MalformedArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedArchiveError";
  }
}

export class NoDataFoundError extends Error {
  constructor(readonly year: number) {
    super(`No ${year} monthly files found.`);
    this.name = "NoDataFoundError";
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) {
    return e.cause instanceof Error ? `${e.message} (${e.cause.message})` : e.message;
  }
  return String(e);
}
