/**
 * Calendar-date helpers. Due dates travel as yyyy-MM-dd strings end to end,
 * so lexicographic comparison is date comparison and no timezone is involved.
 */

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 86_400_000;

/** Format a Date's local calendar day as yyyy-MM-dd */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Today's local date as yyyy-MM-dd. Read fresh on every call. */
export function todayISO(now?: Date): string {
  return formatDate(now ?? new Date());
}

function toUtcMs(date: string): number | null {
  const m = ISO_DATE_RE.exec(date);
  if (!m) return null;

  const [, y = '', mo = '', d = ''] = m;
  const year = parseInt(y, 10);
  const month = parseInt(mo, 10) - 1;
  const day = parseInt(d, 10);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const check = new Date(0);
  check.setUTCFullYear(year, month, day);
  const ms = check.getTime();

  // Reject rollovers like 2026-02-30 -> 2026-03-02
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month || check.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

/**
 * Parse an exact yyyy-MM-dd calendar date.
 * Returns null for anything else, including impossible dates.
 */
export function parseDueDate(input: string | null | undefined): string | null {
  if (input == null) return null;
  return toUtcMs(input) != null ? input : null;
}

/** Add days to a yyyy-MM-dd date (returns a new yyyy-MM-dd) */
export function addDays(date: string, n: number): string {
  const ms = toUtcMs(date);
  if (ms == null) throw new RangeError(`Invalid date: ${date}`);
  return new Date(ms + n * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Signed whole days from `from` to `to`. Positive = `to` is later. */
export function daysBetween(from: string, to: string): number {
  const a = toUtcMs(from);
  const b = toUtcMs(to);
  if (a == null) throw new RangeError(`Invalid date: ${from}`);
  if (b == null) throw new RangeError(`Invalid date: ${to}`);
  return Math.round((b - a) / MS_PER_DAY);
}
