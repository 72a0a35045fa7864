/**
 * UTC date helpers.
 *
 * Buckets are half-open `[start, end)` ranges of ISO-8601 UTC
 * timestamps; fact dates are `YYYY-MM-DD` strings.
 */

const DAY_MS = 86_400_000;
const DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

/** Normalize an ISO string or epoch-millis value to a UTC ISO string, or null. */
export function toIsoUtc(value: unknown): string | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return new Date(value).toISOString();
  }
  if (typeof value !== 'string' || value.trim() === '') return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return toIsoUtc(Number(trimmed));
  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/** Extract a `YYYY-MM-DD` date from a date string, a timestamp or epoch millis. */
export function toFactDate(value: unknown): string | null {
  if (typeof value === 'string') {
    const match = DATE_PREFIX.exec(value.trim());
    if (match && !Number.isNaN(Date.parse(`${match[1]}T00:00:00Z`))) return match[1];
  }
  const iso = toIsoUtc(value);
  return iso ? iso.slice(0, 10) : null;
}

export function dayStart(date: string): string {
  return `${date}T00:00:00.000Z`;
}

export function addDays(date: string, days: number): string {
  return new Date(Date.parse(dayStart(date)) + days * DAY_MS).toISOString().slice(0, 10);
}

/** Half-open bucket covering one UTC day. */
export function dayBucket(date: string): { start: string; end: string } {
  return { start: dayStart(date), end: dayStart(addDays(date, 1)) };
}

/**
 * The fact date of a bucket: the UTC day containing its last instant.
 * A daily bucket maps to its own day; a delta spanning midnight maps to
 * the day it closes.
 */
export function factDateOf(bucketEnd: string): string {
  return new Date(Date.parse(bucketEnd) - 1).toISOString().slice(0, 10);
}

/** Dates `[start, end)` in order. */
export function datesBetween(start: string, end: string): string[] {
  const out: string[] = [];
  for (let d = start; d < end; d = addDays(d, 1)) out.push(d);
  return out;
}

export function laterOf(a: string, b: string): string {
  return Date.parse(a) >= Date.parse(b) ? a : b;
}
