// ==========================
// Version 3 — src/utils/dateKey.ts
// - Date keys are "YYYY-MM-DD" calendar dates (no time, no zone)
// - Parsing is strict: two-digit month/day, real calendar dates only
// - Day arithmetic runs in UTC so DST never shifts a key
// ==========================
import { DateTime } from "luxon";

export const DATE_KEY_FORMAT = "yyyy-MM-dd";

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Parses a date key; null for anything that isn't a real YYYY-MM-DD date */
export function parseDateKey(input: string): DateTime | null {
  const s = input.trim();
  if (!DATE_KEY_RE.test(s)) return null;

  const dt = DateTime.fromFormat(s, DATE_KEY_FORMAT, { zone: "utc" });
  return dt.isValid ? dt : null;
}

/** Trimmed, canonical key or null */
export function normalizeDateKey(input: string): string | null {
  const dt = parseDateKey(input);
  return dt ? dateKeyFromDateTime(dt) : null;
}

export function dateKeyFromDateTime(dt: DateTime): string {
  return dt.toFormat(DATE_KEY_FORMAT);
}

/** YYYY-MM-DD in local time for today */
export function todayKey(now: DateTime = DateTime.local()): string {
  return dateKeyFromDateTime(now);
}

// ==========================
// End of Version 3 — src/utils/dateKey.ts
// ==========================
