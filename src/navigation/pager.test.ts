import { describe, expect, it } from "vitest";
import { Keys } from "../terminal/keys";
import { repeat, scriptedKeys } from "../test-helpers";
import type { KeyEvent } from "../terminal/keys";
import {
  countPages,
  INITIAL_PAGER,
  pageSlice,
  runPager,
  stepPager,
  type PagerState,
  type PagerView,
} from "./pager";

const twelve = Array.from({ length: 12 }, (_, i) => `item-${i}`);

function press(events: KeyEvent[], total = 12, pageSize = 5): PagerState {
  let state = INITIAL_PAGER;
  for (const e of events) {
    const step = stepPager(state, e, total, pageSize);
    if (step.kind !== "move") throw new Error(`unexpected ${step.kind}`);
    state = step.state;
  }
  return state;
}

describe("pager math", () => {
  it("counts pages and slices the last short page", () => {
    expect(countPages(12, 5)).toBe(3);
    expect(countPages(10, 5)).toBe(2);
    expect(countPages(0, 5)).toBe(0);
    expect(pageSlice(twelve, 2, 5)).toEqual(["item-10", "item-11"]);
  });

  it("rejects a non-positive page size", () => {
    expect(() => countPages(3, 0)).toThrow(RangeError);
  });
});

describe("stepPager", () => {
  it("moves down within a page", () => {
    expect(press([Keys.down, Keys.down])).toEqual({ page: 0, index: 2 });
  });

  it("rolls onto the next page after the last row", () => {
    expect(press(repeat(Keys.down, 5))).toEqual({ page: 1, index: 0 });
  });

  it("wraps from the last page back to the first", () => {
    // 5 + 5 + 2 rows
    expect(press(repeat(Keys.down, 12))).toEqual({ page: 0, index: 0 });
    expect(press(repeat(Keys.down, 11))).toEqual({ page: 2, index: 1 });
  });

  it("wraps up from the first row to the last page's last row", () => {
    expect(press([Keys.up])).toEqual({ page: 2, index: 1 });
    expect(press([Keys.up, Keys.up, Keys.up])).toEqual({ page: 1, index: 4 });
  });

  it("ignores other keys", () => {
    expect(press([Keys.char("x"), Keys.backspace, Keys.ignored])).toEqual(INITIAL_PAGER);
  });

  it("selects on enter and cancels on escape", () => {
    expect(stepPager({ page: 1, index: 3 }, Keys.enter, 12, 5)).toEqual({
      kind: "select",
      state: { page: 1, index: 3 },
    });
    expect(stepPager(INITIAL_PAGER, Keys.escape, 12, 5)).toEqual({ kind: "cancel" });
  });

  it("stays in bounds on a single short page", () => {
    expect(press([Keys.down, Keys.down, Keys.down], 2, 5)).toEqual({ page: 0, index: 1 });
    expect(press([Keys.up], 2, 5)).toEqual({ page: 0, index: 1 });
  });
});

describe("runPager", () => {
  it("returns the item under the cursor", async () => {
    const keys = scriptedKeys([...repeat(Keys.down, 6), Keys.enter]);
    const views: PagerView<string>[] = [];

    const outcome = await runPager({ items: twelve, keys, render: (v) => views.push(v) });

    expect(outcome).toEqual({ kind: "selected", item: "item-6", index: 6 });
    expect(views).toHaveLength(7);
    expect(views[6]).toEqual({
      page: 1,
      pageCount: 3,
      visible: ["item-5", "item-6", "item-7", "item-8", "item-9"],
      selected: 1,
    });
  });

  it("cancels on escape", async () => {
    const outcome = await runPager({ items: twelve, keys: scriptedKeys([Keys.down, Keys.escape]), render: () => {} });
    expect(outcome).toEqual({ kind: "cancelled" });
  });

  it("reports an empty list without reading keys", async () => {
    const keys = scriptedKeys([Keys.enter]);
    let renders = 0;

    const outcome = await runPager({ items: [], keys, render: () => renders++ });

    expect(outcome).toEqual({ kind: "empty" });
    expect(renders).toBe(0);
    expect(keys.remaining()).toBe(1);
  });

  it("honours a custom page size", async () => {
    const keys = scriptedKeys([Keys.up, Keys.enter]);
    const outcome = await runPager({ items: twelve, keys, render: () => {}, pageSize: 4 });
    expect(outcome).toEqual({ kind: "selected", item: "item-11", index: 11 });
  });
});
