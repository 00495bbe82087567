// ==========================
// Version 5 — src/db/habits.ts
// - Habit CRUD on the local SQLite file
// - Names are trimmed before validation + storage; unique across habits
// - Returns Result<T> (invalid-input / already-exists / not-found) instead of throwing
// - Deleting a habit cascades to its records (FK ON DELETE CASCADE)
// ==========================
import type { Habit, HabitRow } from "../types/habit";
import { habitFromRow } from "../types/habit";
import { fail, ok, type Result } from "../types/result";
import { createLogger } from "../utils/log";
import { isUniqueViolation, withSession, type HabitsDb } from "./client";

const { log } = createLogger("store");

function cleanName(name: string): string | null {
  const trimmed = name.trim();
  return trimmed ? trimmed : null;
}

function selectById(db: HabitsDb, id: number): HabitRow | undefined {
  return db.prepare<[number], HabitRow>("SELECT id, name FROM habits WHERE id = ?").get(id);
}

export function createHabit(db: HabitsDb, name: string): Result<Habit> {
  const clean = cleanName(name);
  if (!clean) return fail("invalid-input", "Habit cannot be empty");

  try {
    const row = withSession(db, () =>
      db
        .prepare<[string], HabitRow>("INSERT INTO habits (name) VALUES (?) RETURNING id, name")
        .get(clean)
    );
    if (!row) throw new Error("INSERT ... RETURNING produced no row");

    log("createHabit", row);
    return ok(habitFromRow(row));
  } catch (e) {
    if (isUniqueViolation(e)) return fail("already-exists", "Habit already exists");
    throw e;
  }
}

export function findHabitByName(db: HabitsDb, name: string): Result<Habit> {
  const row = withSession(db, () =>
    db.prepare<[string], HabitRow>("SELECT id, name FROM habits WHERE name = ?").get(name.trim())
  );
  return row ? ok(habitFromRow(row)) : fail("not-found", "Habit not found");
}

export function findHabitById(db: HabitsDb, id: number): Result<Habit> {
  const row = withSession(db, () => selectById(db, id));
  return row ? ok(habitFromRow(row)) : fail("not-found", "Habit not found");
}

/** All habits, A→Z */
export function listHabits(db: HabitsDb): Habit[] {
  const rows = withSession(db, () =>
    db.prepare<[], HabitRow>("SELECT id, name FROM habits ORDER BY name").all()
  );
  return rows.map(habitFromRow);
}

export function renameHabit(db: HabitsDb, id: number, name: string): Result<Habit> {
  const clean = cleanName(name);
  if (!clean) return fail("invalid-input", "Habit cannot be empty");

  try {
    const row = withSession(db, () =>
      db
        .prepare<[string, number], HabitRow>(
          "UPDATE habits SET name = ? WHERE id = ? RETURNING id, name"
        )
        .get(clean, id)
    );
    if (!row) return fail("not-found", "Habit not found");

    log("renameHabit", row);
    return ok(habitFromRow(row));
  } catch (e) {
    if (isUniqueViolation(e)) return fail("already-exists", "Habit already exists");
    throw e;
  }
}

export function deleteHabit(db: HabitsDb, id: number): Result<Habit> {
  const row = withSession(db, () =>
    db.prepare<[number], HabitRow>("DELETE FROM habits WHERE id = ? RETURNING id, name").get(id)
  );
  if (!row) return fail("not-found", "Habit not found");

  log("deleteHabit", row);
  return ok(habitFromRow(row));
}

// ==========================
// End of Version 5 — src/db/habits.ts
// ==========================
