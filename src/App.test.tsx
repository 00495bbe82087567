import type { ReactElement } from "react";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runApp, type AppDeps, type Screen } from "./App";
import { closeDatabase, openDatabase, type HabitsDb } from "./db/client";
import { createHabit, listHabits } from "./db/habits";
import { createRecord, listRecords } from "./db/records";
import MenuPage, { type MenuPageProps } from "./pages/MenuPage";
import NoticePage, { type NoticePageProps } from "./pages/NoticePage";
import PromptPage, { type PromptPageProps } from "./pages/PromptPage";
import SearchPage, { type SearchPageProps } from "./pages/SearchPage";
import { Keys, type KeyEvent } from "./terminal/keys";
import type { Habit } from "./types/habit";
import { repeat, scriptedKeys, typed, type ScriptedKeys } from "./test-helpers";

const TODAY = "2025-01-03";

function framesOf<P>(frames: ReactElement[], component: (props: P) => ReactElement): P[] {
  return frames.filter((f) => f.type === component).map((f) => f.props);
}

describe("runApp", () => {
  let db: HabitsDb;
  let frames: ReactElement[];
  let keys: ScriptedKeys;

  beforeEach(() => {
    db = openDatabase(":memory:");
    frames = [];
  });

  afterEach(() => {
    closeDatabase(db);
  });

  async function run(events: KeyEvent[], start?: Screen) {
    keys = scriptedKeys(events);
    const deps: AppDeps = {
      db,
      keys,
      ui: { show: (view) => frames.push(view), close: () => undefined },
      pageSize: 5,
      today: () => TODAY,
    };
    await runApp(deps, start);
  }

  function seedHabit(name: string): Habit {
    const created = createHabit(db, name);
    if (!created.ok) throw created.error;
    return created.value;
  }

  const notices = () => framesOf<NoticePageProps>(frames, NoticePage).map((p) => p.message);
  const menus = (title: string) => framesOf<MenuPageProps>(frames, MenuPage).filter((p) => p.title === title);

  it("creates a habit from typed keys and exits from home", async () => {
    await run([
      Keys.enter, // Add a new habit
      ...typed("Running"),
      Keys.enter,
      Keys.enter, // notice
      Keys.escape, // habit → habits list
      Keys.escape, // habits list → home
      Keys.up, // wraps to Exit
      Keys.enter,
    ]);

    expect(listHabits(db).map((h) => h.name)).toEqual(["Running"]);
    expect(notices()).toEqual(["Habit added successfully"]);
    expect(menus("📋 Habit: Running")).toHaveLength(1);
    expect(keys.remaining()).toBe(0);
  });

  it("opens the existing habit when the name is taken", async () => {
    seedHabit("Running");

    await run([Keys.enter, ...typed("  Running "), Keys.enter, Keys.enter, Keys.escape, Keys.escape, Keys.escape]);

    expect(notices()).toEqual(["Habit already exists!"]);
    expect(menus("📋 Habit: Running")).toHaveLength(1);
    expect(listHabits(db)).toHaveLength(1);
    expect(keys.remaining()).toBe(0);
  });

  it("logs today and shows both streaks", async () => {
    const habit = seedHabit("Running");
    createRecord(db, habit.id, "2025-01-01");
    createRecord(db, habit.id, "2025-01-02");

    await run([Keys.enter, Keys.enter, Keys.escape, Keys.escape, Keys.escape], { name: "habit", habit });

    expect(notices()).toEqual(["Logged 2025-01-03"]);
    expect(menus("📋 Habit: Running").map((p) => p.lines)).toEqual([
      ["Longest streak: 2 days", "Current streak: 0 days"],
      ["Longest streak: 3 days", "Current streak: 3 days"],
    ]);
    expect(keys.remaining()).toBe(0);
  });

  it("reports a second log of the same day", async () => {
    const habit = seedHabit("Running");
    createRecord(db, habit.id, TODAY);

    await run([Keys.enter, Keys.enter, Keys.escape, Keys.escape, Keys.escape], { name: "habit", habit });

    expect(notices()).toEqual(["Already logged 2025-01-03"]);
    const records = listRecords(db, habit.id);
    expect(records.ok && records.value.length).toBe(1);
  });

  it("deletes a habit and its records after confirmation", async () => {
    const habit = seedHabit("Running");
    createRecord(db, habit.id, "2025-01-01");

    await run(
      [
        ...repeat(Keys.down, 4), // Delete habit
        Keys.enter,
        Keys.down, // Yes
        Keys.enter,
        Keys.enter, // deleted notice
        Keys.enter, // empty list notice
        Keys.escape,
      ],
      { name: "habit", habit }
    );

    expect(notices()).toEqual(["Habit deleted successfully", "No habits found!"]);
    expect(listHabits(db)).toEqual([]);
    const records = listRecords(db, habit.id);
    expect(records.ok).toBe(false);
    expect(keys.remaining()).toBe(0);
  });

  it("keeps the habit when the confirmation is declined", async () => {
    const habit = seedHabit("Running");

    await run([...repeat(Keys.down, 4), Keys.enter, Keys.enter, Keys.escape, Keys.escape, Keys.escape], {
      name: "habit",
      habit,
    });

    expect(notices()).toEqual([]);
    expect(listHabits(db).map((h) => h.name)).toEqual(["Running"]);
    expect(menus("📋 Habit: Running")).toHaveLength(2);
  });

  it("re-prompts after an invalid date", async () => {
    const habit = seedHabit("Running");

    await run(
      [
        Keys.down, // Add a new record
        Keys.enter,
        ...repeat(Keys.backspace, 10),
        ...typed("2025-02-30"),
        Keys.enter,
        Keys.enter, // error notice
        Keys.enter, // accept prefilled today
        Keys.enter, // added notice
        Keys.escape, // record → records
        Keys.escape, // records → habit
        Keys.escape,
        Keys.escape,
        Keys.escape,
      ],
      { name: "habit", habit }
    );

    expect(notices()).toEqual([
      "Error: Invalid date format! Please use the format YYYY-MM-DD",
      "Record added successfully",
    ]);
    const prompts = framesOf<PromptPageProps>(frames, PromptPage);
    expect(prompts[0].value).toBe(TODAY);
    expect(prompts[prompts.length - 1].value).toBe(TODAY);
    const records = listRecords(db, habit.id);
    expect(records.ok && records.value.map((r) => r.date)).toEqual([TODAY]);
    expect(keys.remaining()).toBe(0);
  });

  it("renames a habit from a prefilled prompt", async () => {
    const habit = seedHabit("Running");

    await run(
      [
        ...repeat(Keys.down, 3), // Rename habit
        Keys.enter,
        ...repeat(Keys.backspace, 7),
        ...typed("Jogging"),
        Keys.enter,
        Keys.enter,
        Keys.escape,
        Keys.escape,
        Keys.escape,
      ],
      { name: "habit", habit }
    );

    expect(notices()).toEqual(["Habit updated successfully"]);
    expect(menus("📋 Habit: Jogging")).toHaveLength(1);
    expect(listHabits(db)).toEqual([{ id: habit.id, name: "Jogging" }]);
  });

  it("searches habits by substring", async () => {
    seedHabit("Morning run");
    seedHabit("Night reading");
    seedHabit("Late night walk");

    await run([
      Keys.down,
      Keys.down, // Search habits
      Keys.enter,
      ...typed("night"),
      Keys.down,
      Keys.enter,
      Keys.escape,
      Keys.escape,
      Keys.escape,
    ]);

    const last = framesOf<SearchPageProps>(frames, SearchPage).at(-1);
    expect(last?.view).toEqual({ query: "night", matches: ["Late night walk", "Night reading"], selected: 1 });
    expect(menus("📋 Habit: Night reading")).toHaveLength(1);
    expect(keys.remaining()).toBe(0);
  });

  it("tells the user when there is nothing to search", async () => {
    await run([Keys.down, Keys.down, Keys.enter, Keys.enter, Keys.escape]);

    expect(notices()).toEqual(["No habits found!"]);
    expect(keys.remaining()).toBe(0);
  });

  it("stops when the key source fails", async () => {
    await expect(run([Keys.enter])).rejects.toThrow("scripted keys exhausted");
  });
});
