// ==========================
// Version 2 — src/navigation/liveFilter.ts
// - Type-to-filter selector: case-insensitive substring match, original order kept
// - Only the first `limit` matches are offered; up/down wrap inside that subset
// - editQuery() is shared with the text prompt
// ==========================
import type { KeyEvent, KeySource } from "../terminal/keys";

export const DEFAULT_MATCH_LIMIT = 5;

export type FilterState = {
  query: string;
  index: number;
};

export type FilterStep =
  | { kind: "move"; state: FilterState }
  | { kind: "select"; index: number }
  | { kind: "cancel" };

export type FilterView<T> = {
  query: string;
  matches: T[];
  selected: number;
};

export type FilterOutcome<T> = { kind: "selected"; item: T } | { kind: "cancelled" };

export const INITIAL_FILTER: FilterState = { query: "", index: 0 };

/** New query for a character/backspace, null for any other key */
export function editQuery(query: string, event: KeyEvent): string | null {
  if (event.type === "character") return query + event.char;
  if (event.type === "backspace") return Array.from(query).slice(0, -1).join("");
  return null;
}

export function filterMatches<T>(
  candidates: readonly T[],
  query: string,
  label: (item: T) => string,
  limit: number = DEFAULT_MATCH_LIMIT
): T[] {
  const needle = query.toLowerCase();
  const out: T[] = [];

  for (const item of candidates) {
    if (out.length >= limit) break;
    if (label(item).toLowerCase().includes(needle)) out.push(item);
  }

  return out;
}

/** `shown` is how many matches are on screen right now */
export function stepFilter(state: FilterState, event: KeyEvent, shown: number): FilterStep {
  const query = editQuery(state.query, event);
  if (query !== null) return { kind: "move", state: { query, index: 0 } };

  switch (event.type) {
    case "down":
      if (shown === 0) return { kind: "move", state };
      return { kind: "move", state: { query: state.query, index: (state.index + 1) % shown } };

    case "up":
      if (shown === 0) return { kind: "move", state };
      return { kind: "move", state: { query: state.query, index: (state.index - 1 + shown) % shown } };

    case "enter":
      return shown === 0 ? { kind: "move", state } : { kind: "select", index: state.index };

    case "escape":
      return { kind: "cancel" };

    default:
      return { kind: "move", state };
  }
}

export async function runLiveFilter<T>(args: {
  candidates: readonly T[];
  label: (item: T) => string;
  keys: KeySource;
  render: (view: FilterView<T>) => void;
  limit?: number;
}): Promise<FilterOutcome<T>> {
  const { candidates, label, keys, render } = args;
  const limit = args.limit ?? DEFAULT_MATCH_LIMIT;

  let state = INITIAL_FILTER;
  for (;;) {
    const matches = filterMatches(candidates, state.query, label, limit);
    // a stale index (list shrank) snaps back to the top
    if (state.index >= matches.length) state = { query: state.query, index: 0 };

    render({ query: state.query, matches, selected: state.index });

    const step = stepFilter(state, await keys.next(), matches.length);
    if (step.kind === "cancel") return { kind: "cancelled" };
    if (step.kind === "select") return { kind: "selected", item: matches[step.index] };

    state = step.state;
  }
}

// ==========================
// End of Version 2 — src/navigation/liveFilter.ts
// ==========================
