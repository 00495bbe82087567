// ==========================
// Version 1 — src/types/habit.ts
// - Habit + HabitRecord value shapes handed out by the store
// - Row shapes as they come back from SQLite (snake_case)
// ==========================

export type Habit = {
  id: number;
  name: string;
};

export type HabitRecord = {
  id: number;
  habitId: number;
  // "YYYY-MM-DD"
  date: string;
};

export type HabitRow = {
  id: number;
  name: string;
};

export type RecordRow = {
  id: number;
  habit_id: number;
  date: string;
};

export function habitFromRow(row: HabitRow): Habit {
  return { id: row.id, name: row.name };
}

export function recordFromRow(row: RecordRow): HabitRecord {
  return { id: row.id, habitId: row.habit_id, date: row.date };
}

// ==========================
// End of Version 1 — src/types/habit.ts
// ==========================
