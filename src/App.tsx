// ==========================
// Version 6 — src/App.tsx
// - Screen controller: one loop over an explicit Screen union (no screen calls another)
// - Every screen renders a page, reads keys through the pager / live filter / prompt,
//   calls the store, shows a notice, and returns the next Screen
// - Store results are branched on by error code (invalid-input / already-exists / not-found)
// ==========================
import type { HabitsDb } from "./db/client";
import { createHabit, deleteHabit, findHabitById, findHabitByName, listHabits, renameHabit } from "./db/habits";
import { createRecord, deleteRecord, findRecordByDate, listRecords, updateRecord } from "./db/records";
import { runLiveFilter } from "./navigation/liveFilter";
import { runPager } from "./navigation/pager";
import { acknowledge, runTextPrompt } from "./navigation/prompt";
import ListPage from "./pages/ListPage";
import MenuPage from "./pages/MenuPage";
import NoticePage from "./pages/NoticePage";
import PromptPage from "./pages/PromptPage";
import SearchPage from "./pages/SearchPage";
import type { KeySource } from "./terminal/keys";
import type { Ui } from "./terminal/inkUi";
import type { Habit, HabitRecord } from "./types/habit";
import type { HabitError } from "./types/result";
import { todayKey } from "./utils/dateKey";
import { createLogger } from "./utils/log";
import { currentStreak, longestStreak } from "./utils/streak";

const { log } = createLogger("app");

export type Screen =
  | { name: "home" }
  | { name: "add-habit" }
  | { name: "browse-habits" }
  | { name: "search-habits" }
  | { name: "habit"; habit: Habit }
  | { name: "log-today"; habit: Habit }
  | { name: "rename-habit"; habit: Habit }
  | { name: "delete-habit"; habit: Habit }
  | { name: "add-record"; habit: Habit }
  | { name: "browse-records"; habit: Habit }
  | { name: "record"; habit: Habit; record: HabitRecord }
  | { name: "edit-record"; habit: Habit; record: HabitRecord }
  | { name: "delete-record"; habit: Habit; record: HabitRecord }
  | { name: "exit" };

export type AppDeps = {
  db: HabitsDb;
  keys: KeySource;
  ui: Ui;
  pageSize: number;
  today?: () => string;
};

type MenuOption<K extends string> = { key: K; label: string };

const HOME: Screen = { name: "home" };
const BROWSE_HABITS: Screen = { name: "browse-habits" };

// ---------------------
// Building blocks
// ---------------------

async function notice(deps: AppDeps, title: string, message: string): Promise<void> {
  deps.ui.show(<NoticePage title={title} message={message} />);
  await acknowledge(deps.keys);
}

function errorText(error: HabitError): string {
  return `Error: ${error.message}`;
}

/** Fixed menu; null when the user backs out with escape */
async function menu<K extends string>(
  deps: AppDeps,
  title: string,
  options: MenuOption<K>[],
  lines?: string[]
): Promise<K | null> {
  const outcome = await runPager({
    items: options,
    keys: deps.keys,
    // all options on one page, so up/down simply wrap
    pageSize: options.length,
    render: (view) =>
      deps.ui.show(
        <MenuPage title={title} lines={lines} options={view.visible.map((o) => o.label)} selected={view.selected} />
      ),
  });

  return outcome.kind === "selected" ? outcome.item.key : null;
}

async function prompt(deps: AppDeps, title: string, label: string, initial?: string): Promise<string | null> {
  const outcome = await runTextPrompt({
    keys: deps.keys,
    initial,
    render: (value) => deps.ui.show(<PromptPage title={title} label={label} value={value} />),
  });

  return outcome.kind === "submitted" ? outcome.value : null;
}

async function confirm(deps: AppDeps, title: string, question: string): Promise<boolean> {
  const answer = await menu(
    deps,
    title,
    [
      { key: "no", label: "No" },
      { key: "yes", label: "Yes" },
    ],
    [question]
  );
  return answer === "yes";
}

function today(deps: AppDeps): string {
  return deps.today ? deps.today() : todayKey();
}

// ---------------------
// Screens
// ---------------------

async function home(deps: AppDeps): Promise<Screen> {
  const choice = await menu(deps, "🏡 Habit Tracker", [
    { key: "add", label: "Add a new habit" },
    { key: "browse", label: "View habits" },
    { key: "search", label: "Search habits" },
    { key: "exit", label: "Exit" },
  ]);

  switch (choice) {
    case "add":
      return { name: "add-habit" };
    case "browse":
      return BROWSE_HABITS;
    case "search":
      return { name: "search-habits" };
    default:
      return { name: "exit" };
  }
}

async function addHabit(deps: AppDeps): Promise<Screen> {
  const title = "📝 Add a new habit";
  const name = await prompt(deps, title, "Enter a new habit:");
  if (name === null) return HOME;

  const created = createHabit(deps.db, name);
  if (created.ok) {
    await notice(deps, title, "Habit added successfully");
    return { name: "habit", habit: created.value };
  }

  if (created.error.code === "already-exists") {
    await notice(deps, title, "Habit already exists!");
    const existing = findHabitByName(deps.db, name);
    if (existing.ok) return { name: "habit", habit: existing.value };

    await notice(deps, title, errorText(existing.error));
    return HOME;
  }

  await notice(deps, title, errorText(created.error));
  return { name: "add-habit" };
}

async function browseHabits(deps: AppDeps): Promise<Screen> {
  const title = "📋 My Habits";
  const outcome = await runPager({
    items: listHabits(deps.db),
    keys: deps.keys,
    pageSize: deps.pageSize,
    render: (view) =>
      deps.ui.show(<ListPage title={title} view={{ ...view, visible: view.visible.map((h) => h.name) }} />),
  });

  if (outcome.kind === "empty") {
    await notice(deps, title, "No habits found!");
    return HOME;
  }
  return outcome.kind === "selected" ? { name: "habit", habit: outcome.item } : HOME;
}

async function searchHabits(deps: AppDeps): Promise<Screen> {
  const title = "🔎 Search habits";
  const habits = listHabits(deps.db);

  if (habits.length === 0) {
    await notice(deps, title, "No habits found!");
    return HOME;
  }

  const outcome = await runLiveFilter({
    candidates: habits,
    label: (h) => h.name,
    keys: deps.keys,
    render: (view) =>
      deps.ui.show(
        <SearchPage title={title} label="Habit" view={{ ...view, matches: view.matches.map((h) => h.name) }} />
      ),
  });

  return outcome.kind === "selected" ? { name: "habit", habit: outcome.item } : HOME;
}

async function habitMenu(deps: AppDeps, stale: Habit): Promise<Screen> {
  // re-read: the habit may have been renamed or deleted since it was picked
  const found = findHabitById(deps.db, stale.id);
  if (!found.ok) {
    await notice(deps, `📋 Habit: ${stale.name}`, errorText(found.error));
    return BROWSE_HABITS;
  }
  const records = listRecords(deps.db, stale.id);
  if (!records.ok) {
    await notice(deps, `📋 Habit: ${stale.name}`, errorText(records.error));
    return BROWSE_HABITS;
  }

  const habit = found.value;
  const dates = records.value.map((r) => r.date);

  const choice = await menu(
    deps,
    `📋 Habit: ${habit.name}`,
    [
      { key: "log", label: "Log today" },
      { key: "add", label: "Add a new record" },
      { key: "records", label: "View records" },
      { key: "rename", label: "Rename habit" },
      { key: "delete", label: "Delete habit" },
      { key: "back", label: "Back" },
    ],
    [`Longest streak: ${longestStreak(dates)} days`, `Current streak: ${currentStreak(dates, today(deps))} days`]
  );

  switch (choice) {
    case "log":
      return { name: "log-today", habit };
    case "add":
      return { name: "add-record", habit };
    case "records":
      return { name: "browse-records", habit };
    case "rename":
      return { name: "rename-habit", habit };
    case "delete":
      return { name: "delete-habit", habit };
    default:
      return BROWSE_HABITS;
  }
}

async function logToday(deps: AppDeps, habit: Habit): Promise<Screen> {
  const title = `📝 Log today: ${habit.name}`;
  const date = today(deps);
  const created = createRecord(deps.db, habit.id, date);

  if (created.ok) {
    await notice(deps, title, `Logged ${date}`);
    return { name: "habit", habit };
  }

  switch (created.error.code) {
    case "already-exists":
      await notice(deps, title, `Already logged ${date}`);
      return { name: "habit", habit };
    case "not-found":
      await notice(deps, title, errorText(created.error));
      return BROWSE_HABITS;
    default:
      await notice(deps, title, errorText(created.error));
      return { name: "habit", habit };
  }
}

async function renameHabitScreen(deps: AppDeps, habit: Habit): Promise<Screen> {
  const title = `📋 Update Habit: ${habit.name}`;
  const name = await prompt(deps, title, "Enter the new name of the habit:", habit.name);
  if (name === null) return { name: "habit", habit };

  const renamed = renameHabit(deps.db, habit.id, name);
  if (renamed.ok) {
    await notice(deps, title, "Habit updated successfully");
    return { name: "habit", habit: renamed.value };
  }

  switch (renamed.error.code) {
    case "already-exists":
      await notice(deps, title, "Habit already exists!");
      return { name: "habit", habit };
    case "invalid-input":
      await notice(deps, title, errorText(renamed.error));
      return { name: "rename-habit", habit };
    default:
      await notice(deps, title, errorText(renamed.error));
      return BROWSE_HABITS;
  }
}

async function deleteHabitScreen(deps: AppDeps, habit: Habit): Promise<Screen> {
  const title = `📋 Delete Habit: ${habit.name}`;
  const sure = await confirm(deps, title, "Delete this habit and all its records?");
  if (!sure) return { name: "habit", habit };

  const deleted = deleteHabit(deps.db, habit.id);
  await notice(deps, title, deleted.ok ? "Habit deleted successfully" : errorText(deleted.error));
  return BROWSE_HABITS;
}

async function addRecord(deps: AppDeps, habit: Habit): Promise<Screen> {
  const title = `📝 Add a new record: ${habit.name}`;
  const date = await prompt(deps, title, "Enter the date of the record (YYYY-MM-DD):", today(deps));
  if (date === null) return { name: "habit", habit };

  const created = createRecord(deps.db, habit.id, date);
  if (created.ok) {
    await notice(deps, title, "Record added successfully");
    return { name: "record", habit, record: created.value };
  }

  switch (created.error.code) {
    case "already-exists": {
      await notice(deps, title, "Record already exists!");
      const existing = findRecordByDate(deps.db, habit.id, date);
      if (existing.ok) return { name: "record", habit, record: existing.value };

      await notice(deps, title, errorText(existing.error));
      return { name: "habit", habit };
    }
    case "invalid-input":
      await notice(deps, title, errorText(created.error));
      return { name: "add-record", habit };
    default:
      await notice(deps, title, errorText(created.error));
      return BROWSE_HABITS;
  }
}

async function browseRecords(deps: AppDeps, habit: Habit): Promise<Screen> {
  const title = `📋 Records: ${habit.name}`;
  const records = listRecords(deps.db, habit.id);
  if (!records.ok) {
    await notice(deps, title, errorText(records.error));
    return BROWSE_HABITS;
  }

  const outcome = await runPager({
    items: records.value,
    keys: deps.keys,
    pageSize: deps.pageSize,
    render: (view) =>
      deps.ui.show(<ListPage title={title} view={{ ...view, visible: view.visible.map((r) => r.date) }} />),
  });

  if (outcome.kind === "empty") {
    await notice(deps, title, "No records found!");
    return { name: "habit", habit };
  }
  return outcome.kind === "selected" ? { name: "record", habit, record: outcome.item } : { name: "habit", habit };
}

async function recordMenu(deps: AppDeps, habit: Habit, record: HabitRecord): Promise<Screen> {
  const choice = await menu(deps, `📋 Record: ${habit.name} - ${record.date}`, [
    { key: "edit", label: "Update record" },
    { key: "delete", label: "Delete record" },
    { key: "back", label: "Back" },
  ]);

  switch (choice) {
    case "edit":
      return { name: "edit-record", habit, record };
    case "delete":
      return { name: "delete-record", habit, record };
    default:
      return { name: "browse-records", habit };
  }
}

async function editRecord(deps: AppDeps, habit: Habit, record: HabitRecord): Promise<Screen> {
  const title = `📋 Update Record: ${habit.name} - ${record.date}`;
  const date = await prompt(deps, title, "Enter the new date of the record (YYYY-MM-DD):", record.date);
  if (date === null) return { name: "record", habit, record };

  const updated = updateRecord(deps.db, record.id, date);
  if (updated.ok) {
    await notice(deps, title, "Record updated successfully");
    return { name: "record", habit, record: updated.value };
  }

  switch (updated.error.code) {
    case "already-exists":
      await notice(deps, title, "Record already exists!");
      return { name: "record", habit, record };
    case "invalid-input":
      await notice(deps, title, errorText(updated.error));
      return { name: "edit-record", habit, record };
    default:
      await notice(deps, title, errorText(updated.error));
      return { name: "browse-records", habit };
  }
}

async function deleteRecordScreen(deps: AppDeps, habit: Habit, record: HabitRecord): Promise<Screen> {
  const title = `📋 Delete Record: ${habit.name} - ${record.date}`;
  const sure = await confirm(deps, title, "Delete this record?");
  if (!sure) return { name: "record", habit, record };

  const deleted = deleteRecord(deps.db, record.id);
  await notice(deps, title, deleted.ok ? "Record deleted successfully" : errorText(deleted.error));
  return { name: "browse-records", habit };
}

// ---------------------
// Loop
// ---------------------

export function step(deps: AppDeps, screen: Screen): Promise<Screen> {
  switch (screen.name) {
    case "home":
      return home(deps);
    case "add-habit":
      return addHabit(deps);
    case "browse-habits":
      return browseHabits(deps);
    case "search-habits":
      return searchHabits(deps);
    case "habit":
      return habitMenu(deps, screen.habit);
    case "log-today":
      return logToday(deps, screen.habit);
    case "rename-habit":
      return renameHabitScreen(deps, screen.habit);
    case "delete-habit":
      return deleteHabitScreen(deps, screen.habit);
    case "add-record":
      return addRecord(deps, screen.habit);
    case "browse-records":
      return browseRecords(deps, screen.habit);
    case "record":
      return recordMenu(deps, screen.habit, screen.record);
    case "edit-record":
      return editRecord(deps, screen.habit, screen.record);
    case "delete-record":
      return deleteRecordScreen(deps, screen.habit, screen.record);
    case "exit":
      return Promise.resolve(screen);
  }
}

/** Runs until the user exits from the home screen */
export async function runApp(deps: AppDeps, start: Screen = HOME): Promise<void> {
  let screen = start;
  while (screen.name !== "exit") {
    log("screen", screen.name);
    screen = await step(deps, screen);
  }
  log("exit");
}

// ==========================
// End of Version 6 — src/App.tsx
// ==========================
