// ==========================
// Version 3 — src/db/records.ts
// - Per-habit day records: records(habit_id, date) with UNIQUE (habit_id, date)
// - Dates are trimmed + validated as YYYY-MM-DD before they reach SQLite
// - A record for a missing habit is not-found (FK), never an orphan row
// ==========================
import type { HabitRecord, RecordRow } from "../types/habit";
import { recordFromRow } from "../types/habit";
import { fail, ok, type Result } from "../types/result";
import { normalizeDateKey } from "../utils/dateKey";
import { createLogger } from "../utils/log";
import { isForeignKeyViolation, isUniqueViolation, withSession, type HabitsDb } from "./client";

const { log } = createLogger("store");

const RECORD_COLUMNS = "id, habit_id, date";

function cleanDate(date: string): Result<string> {
  if (!date.trim()) return fail("invalid-input", "Date cannot be empty");

  const key = normalizeDateKey(date);
  return key ? ok(key) : fail("invalid-input", "Invalid date format! Please use the format YYYY-MM-DD");
}

function habitExists(db: HabitsDb, habitId: number): boolean {
  return db.prepare<[number], { id: number }>("SELECT id FROM habits WHERE id = ?").get(habitId) !== undefined;
}

export function createRecord(db: HabitsDb, habitId: number, date: string): Result<HabitRecord> {
  const day = cleanDate(date);
  if (!day.ok) return day;

  try {
    const row = withSession(db, () =>
      db
        .prepare<[number, string], RecordRow>(
          `INSERT INTO records (habit_id, date) VALUES (?, ?) RETURNING ${RECORD_COLUMNS}`
        )
        .get(habitId, day.value)
    );
    if (!row) throw new Error("INSERT ... RETURNING produced no row");

    log("createRecord", row);
    return ok(recordFromRow(row));
  } catch (e) {
    if (isUniqueViolation(e)) return fail("already-exists", "Record already exists");
    if (isForeignKeyViolation(e)) return fail("not-found", "Habit not found");
    throw e;
  }
}

/** Records for one habit, newest first */
export function listRecords(db: HabitsDb, habitId: number): Result<HabitRecord[]> {
  const rows = withSession(db, () => {
    if (!habitExists(db, habitId)) return null;
    return db
      .prepare<[number], RecordRow>(
        `SELECT ${RECORD_COLUMNS} FROM records WHERE habit_id = ? ORDER BY date DESC`
      )
      .all(habitId);
  });

  return rows ? ok(rows.map(recordFromRow)) : fail("not-found", "Habit not found");
}

export function findRecordByDate(db: HabitsDb, habitId: number, date: string): Result<HabitRecord> {
  const day = cleanDate(date);
  if (!day.ok) return day;

  const row = withSession(db, () =>
    db
      .prepare<[number, string], RecordRow>(
        `SELECT ${RECORD_COLUMNS} FROM records WHERE habit_id = ? AND date = ?`
      )
      .get(habitId, day.value)
  );
  return row ? ok(recordFromRow(row)) : fail("not-found", "Record not found");
}

export function findRecordById(db: HabitsDb, id: number): Result<HabitRecord> {
  const row = withSession(db, () =>
    db.prepare<[number], RecordRow>(`SELECT ${RECORD_COLUMNS} FROM records WHERE id = ?`).get(id)
  );
  return row ? ok(recordFromRow(row)) : fail("not-found", "Record not found");
}

export function updateRecord(db: HabitsDb, id: number, date: string): Result<HabitRecord> {
  const day = cleanDate(date);
  if (!day.ok) return day;

  try {
    const row = withSession(db, () =>
      db
        .prepare<[string, number], RecordRow>(
          `UPDATE records SET date = ? WHERE id = ? RETURNING ${RECORD_COLUMNS}`
        )
        .get(day.value, id)
    );
    if (!row) return fail("not-found", "Record not found");

    log("updateRecord", row);
    return ok(recordFromRow(row));
  } catch (e) {
    if (isUniqueViolation(e)) return fail("already-exists", "Record already exists");
    throw e;
  }
}

export function deleteRecord(db: HabitsDb, id: number): Result<HabitRecord> {
  const row = withSession(db, () =>
    db.prepare<[number], RecordRow>(`DELETE FROM records WHERE id = ? RETURNING ${RECORD_COLUMNS}`).get(id)
  );
  if (!row) return fail("not-found", "Record not found");

  log("deleteRecord", row);
  return ok(recordFromRow(row));
}

// ==========================
// End of Version 3 — src/db/records.ts
// ==========================
