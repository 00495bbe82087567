// ==========================
// Version 2 — src/db/client.ts
// - Opens the SQLite file once at startup (better-sqlite3)
// - foreign_keys ON so record rows cascade with their habit
// - Schema is created here, exactly once per handle
// - withSession(): one transaction per store call, rollback on throw
// ==========================
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { createLogger } from "../utils/log";

export type HabitsDb = Database.Database;

const { log } = createLogger("db");

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS habits (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  habit_id INTEGER NOT NULL,
  date DATE NOT NULL,
  FOREIGN KEY (habit_id)
    REFERENCES habits (id)
    ON DELETE CASCADE,
  UNIQUE (habit_id, date)
);
`;

export function openDatabase(file: string): HabitsDb {
  if (file !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }

  const db = new Database(file);
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);

  log("opened", { file });
  return db;
}

export function closeDatabase(db: HabitsDb) {
  if (!db.open) return;
  db.close();
  log("closed");
}

/** Runs fn inside its own transaction; any throw rolls everything back */
export function withSession<T>(db: HabitsDb, fn: () => T): T {
  return db.transaction(fn)();
}

/** SQLite error code (e.g. SQLITE_CONSTRAINT_UNIQUE) when `e` came from the driver */
export function sqliteCode(e: unknown): string | null {
  if (!(e instanceof Error) || !("code" in e)) return null;
  return typeof e.code === "string" ? e.code : null;
}

export function isUniqueViolation(e: unknown): boolean {
  const code = sqliteCode(e);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}

export function isForeignKeyViolation(e: unknown): boolean {
  return sqliteCode(e) === "SQLITE_CONSTRAINT_FOREIGNKEY";
}

// ==========================
// End of Version 2 — src/db/client.ts
// ==========================
