// ─── UTC helpers ────────────────────────────────────────────────────────────

const DAY_MS = 86_400_000;

/**
 * Format a UTC timestamp (ms) as HH:MM:SS string.
 */
export function formatUTCTime(ms: number): string {
  const d = new Date(ms);
  const h = String(d.getUTCHours()).padStart(2, '0');
  const m = String(d.getUTCMinutes()).padStart(2, '0');
  const s = String(d.getUTCSeconds()).padStart(2, '0');
  return `${h}:${m}:${s}`;
}

/**
 * Format a UTC timestamp (ms) as YYYY-MM-DD string.
 */
export function formatUTCDate(ms: number): string {
  const d = new Date(ms);
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/**
 * Format a UTC timestamp (ms) as a full date+time string.
 */
export function formatUTCDateTime(ms: number): string {
  return `${formatUTCDate(ms)} ${formatUTCTime(ms)} UTC`;
}

/**
 * Format a range for log lines, e.g. `2023-11-14 22:00:00 UTC → 22:30:00`.
 */
export function formatUTCRange(start: number, end: number): string {
  const sameDay = formatUTCDate(start) === formatUTCDate(end);
  return `${formatUTCDateTime(start)} → ${sameDay ? formatUTCTime(end) : formatUTCDateTime(end)}`;
}

/**
 * Get the date portion as a Date object set to UTC midnight.
 */
export function toUTCMidnight(ms: number): Date {
  const d = new Date(ms);
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

/**
 * Every UTC day touched by [start, end], as midnight Dates. Empty when
 * end < start.
 */
export function utcDaysBetween(start: number, end: number): Date[] {
  const days: Date[] = [];
  const last = toUTCMidnight(end).getTime();
  for (let t = toUTCMidnight(start).getTime(); t <= last; t += DAY_MS) {
    days.push(new Date(t));
  }
  return days;
}

/**
 * Parse a compact `YYYYMMDD-HHMMSS` stamp (as used in chunk names) to UTC ms.
 */
export function parseCompactUTC(stamp: string): number | null {
  const match = stamp.match(/^(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})$/);
  if (!match) return null;
  const [, year, month, day, hour, min, sec] = match;
  return Date.UTC(+year, +month - 1, +day, +hour, +min, +sec);
}
