const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-](\d{2}):(\d{2}))$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse an RFC 3339 timestamp such as `2026-05-07T12:00:00Z` or
 * `2026-05-07T14:00:00.5+02:00`. Returns null for anything else, including
 * calendar-invalid dates that `Date` would silently roll over.
 */
export function parseRfc3339(value?: string | null): Date | null {
  if (!value) return null;
  const m = RFC3339.exec(value);
  if (!m) return null;

  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  if (m[9] !== undefined && (Number(m[9]) > 23 || Number(m[10]) > 59)) return null;

  const t = Date.parse(value);
  return Number.isFinite(t) ? new Date(t) : null;
}

/**
 * Latest of the given timestamps, ignoring ones that do not parse.
 */
export function latestTimestamp(values: Iterable<string | null | undefined>): Date | null {
  let latest: Date | null = null;
  for (const v of values) {
    const t = parseRfc3339(v);
    if (t && (!latest || t.getTime() > latest.getTime())) latest = t;
  }
  return latest;
}
