// ==========================
// Version 3 — src/navigation/pager.ts
// - Paginated, wrap-around selection over a fixed list
// - State is { page, index } with index relative to the current page
// - stepPager() is pure; runPager() drives it from a KeySource
// ==========================
import type { KeyEvent, KeySource } from "../terminal/keys";

export const DEFAULT_PAGE_SIZE = 5;

export type PagerState = {
  page: number;
  index: number;
};

export type PagerStep =
  | { kind: "move"; state: PagerState }
  | { kind: "select"; state: PagerState }
  | { kind: "cancel" };

export type PagerView<T> = {
  page: number;
  pageCount: number;
  visible: T[];
  selected: number;
};

export type SelectOutcome<T> =
  | { kind: "selected"; item: T; index: number }
  | { kind: "cancelled" }
  | { kind: "empty" };

export const INITIAL_PAGER: PagerState = { page: 0, index: 0 };

function assertPageSize(pageSize: number) {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
}

export function countPages(total: number, pageSize: number): number {
  assertPageSize(pageSize);
  return Math.ceil(total / pageSize);
}

/** Items on `page` (the last page may be short) */
export function pageSlice<T>(items: readonly T[], page: number, pageSize: number): T[] {
  const start = page * pageSize;
  return items.slice(start, start + pageSize);
}

function pageLength(total: number, page: number, pageSize: number): number {
  return Math.max(0, Math.min(pageSize, total - page * pageSize));
}

/** Absolute position in the item list */
export function absoluteIndex(state: PagerState, pageSize: number): number {
  return state.page * pageSize + state.index;
}

export function stepPager(state: PagerState, event: KeyEvent, total: number, pageSize: number): PagerStep {
  const pages = countPages(total, pageSize);
  if (pages === 0) return event.type === "escape" ? { kind: "cancel" } : { kind: "move", state };

  switch (event.type) {
    case "down": {
      const index = state.index + 1;
      if (index < pageLength(total, state.page, pageSize)) {
        return { kind: "move", state: { page: state.page, index } };
      }
      return { kind: "move", state: { page: (state.page + 1) % pages, index: 0 } };
    }

    case "up": {
      const index = state.index - 1;
      if (index >= 0) return { kind: "move", state: { page: state.page, index } };

      const page = (state.page - 1 + pages) % pages;
      return { kind: "move", state: { page, index: pageLength(total, page, pageSize) - 1 } };
    }

    case "enter":
      return { kind: "select", state };

    case "escape":
      return { kind: "cancel" };

    default:
      return { kind: "move", state };
  }
}

export function pagerView<T>(items: readonly T[], state: PagerState, pageSize: number): PagerView<T> {
  return {
    page: state.page,
    pageCount: countPages(items.length, pageSize),
    visible: pageSlice(items, state.page, pageSize),
    selected: state.index,
  };
}

/**
 * Reads keys until the user picks an item or backs out.
 * Empty lists come back as { kind: "empty" } without rendering or reading.
 */
export async function runPager<T>(args: {
  items: readonly T[];
  keys: KeySource;
  render: (view: PagerView<T>) => void;
  pageSize?: number;
}): Promise<SelectOutcome<T>> {
  const { items, keys, render } = args;
  const pageSize = args.pageSize ?? DEFAULT_PAGE_SIZE;
  assertPageSize(pageSize);

  if (items.length === 0) return { kind: "empty" };

  let state = INITIAL_PAGER;
  for (;;) {
    render(pagerView(items, state, pageSize));

    const step = stepPager(state, await keys.next(), items.length, pageSize);
    if (step.kind === "cancel") return { kind: "cancelled" };

    if (step.kind === "select") {
      const index = absoluteIndex(step.state, pageSize);
      return { kind: "selected", item: items[index], index };
    }

    state = step.state;
  }
}

// ==========================
// End of Version 3 — src/navigation/pager.ts
// ==========================
