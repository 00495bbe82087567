// ==========================
// Version 2 — src/utils/streak.ts
// - longestStreak(): best run of consecutive calendar days (order/duplicates don't matter)
// - currentStreak(): run ending on `today`
// - Throws HabitError("invalid-input") on a date that isn't YYYY-MM-DD
// ==========================
import type { DateTime } from "luxon";
import { HabitError } from "../types/result";
import { dateKeyFromDateTime, parseDateKey, todayKey } from "./dateKey";

/** Parse + dedupe + sort ASC */
function uniqueDaysAsc(dates: readonly string[]): DateTime[] {
  const byKey = new Map<string, DateTime>();

  for (const raw of dates) {
    const dt = parseDateKey(raw);
    if (!dt) throw new HabitError("invalid-input", `Invalid date: ${raw}`);
    byKey.set(dateKeyFromDateTime(dt), dt);
  }

  return [...byKey.values()].sort((a, b) => a.toMillis() - b.toMillis());
}

function parseKeyOrThrow(key: string): DateTime {
  const dt = parseDateKey(key);
  if (!dt) throw new HabitError("invalid-input", `Invalid date: ${key}`);
  return dt;
}

function isNextDay(prev: DateTime, cur: DateTime): boolean {
  return cur.diff(prev, "days").days === 1;
}

export function longestStreak(dates: readonly string[]): number {
  const days = uniqueDaysAsc(dates);

  let best = 0;
  let run = 0;
  let prev: DateTime | null = null;

  for (const day of days) {
    run = prev && isNextDay(prev, day) ? run + 1 : 1;
    if (run > best) best = run;
    prev = day;
  }

  return best;
}

/** Consecutive logged days walking back from `today` (0 if today isn't logged) */
export function currentStreak(dates: readonly string[], today: string = todayKey()): number {
  const keys = new Set(uniqueDaysAsc(dates).map(dateKeyFromDateTime));

  let cursor = parseKeyOrThrow(today);
  let run = 0;
  while (keys.has(dateKeyFromDateTime(cursor))) {
    run++;
    cursor = cursor.minus({ days: 1 });
  }

  return run;
}

// ==========================
// End of Version 2 — src/utils/streak.ts
// ==========================
