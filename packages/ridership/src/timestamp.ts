// 2025-01-03 08:15:02.123, 2025-01-03T08:15:02Z, 2025-01-03 08:15:02-05:00, 2025-01-03 08:15:02+00
const isoRe =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
// legacy exports: 1/1/2015 0:01 or 10/31/2016 23:59:58
const usRe = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  // "+05" carries no minutes
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4) || 0));
}

function utc(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  ms: number,
): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
  // Date.UTC rolls 2025-02-30 over into March; treat that as unparsable
  return d.getUTCDate() === day ? d : undefined;
}

/**
 * Parses a trip timestamp. Values without a zone are taken as UTC.
 * Returns undefined instead of throwing for anything unrecognized.
 */
export function parseTimestamp(raw: string | undefined): Date | undefined {
  const s = raw?.trim();
  if (!s) {
    return undefined;
  }

  const iso = isoRe.exec(s);
  if (iso) {
    const [, y, mo, d, h, mi, sec, frac, zone] = iso;
    const ms = frac ? Number(frac.padEnd(3, "0").slice(0, 3)) : 0;
    const wall = utc(
      Number(y),
      Number(mo),
      Number(d),
      Number(h ?? 0),
      Number(mi ?? 0),
      Number(sec ?? 0),
      ms,
    );
    return wall && new Date(wall.getTime() - offsetMinutes(zone) * 60_000);
  }

  const us = usRe.exec(s);
  if (us) {
    const [, mo, d, y, h, mi, sec] = us;
    return utc(
      Number(y),
      Number(mo),
      Number(d),
      Number(h ?? 0),
      Number(mi ?? 0),
      Number(sec ?? 0),
      0,
    );
  }

  return undefined;
}
