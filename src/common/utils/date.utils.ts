const MS_PER_DAY = 86_400_000;

// YYYY-MM-DD, optionally followed by a time part which is ignored
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

/**
 * Parses an ISO calendar date into a UTC day number (days since 1970-01-01).
 * Returns null for anything that is not a real calendar date.
 */
export function parseEpochDay(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const timestamp = Date.UTC(year, month - 1, day);
  const date = new Date(timestamp);

  // Date.UTC rolls 2024-02-31 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return timestamp / MS_PER_DAY;
}

export function formatEpochDay(epochDay: number): string {
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

export function todayEpochDay(now: Date = new Date()): number {
  return Math.floor(now.getTime() / MS_PER_DAY);
}

/**
 * Reference day for date arithmetic: the given ISO date, or today (UTC) when
 * none is given. A given date that does not parse throws.
 */
export function resolveAsOfDay(asOfDate: string | undefined, now: Date = new Date()): number {
  if (asOfDate === undefined) {
    return todayEpochDay(now);
  }
  const asOfDay = parseEpochDay(asOfDate);
  if (asOfDay === null) {
    throw new RangeError(`as_of_date "${asOfDate}" is not an ISO date (YYYY-MM-DD)`);
  }
  return asOfDay;
}
