// ==========================
// Version 1 — src/navigation/prompt.ts
// - Single-line text prompt on the raw key loop (enter submits, escape cancels)
// - acknowledge(): "Press Enter to continue"
// ==========================
import type { KeySource } from "../terminal/keys";
import { editQuery } from "./liveFilter";

export type PromptOutcome = { kind: "submitted"; value: string } | { kind: "cancelled" };

export async function runTextPrompt(args: {
  keys: KeySource;
  render: (value: string) => void;
  initial?: string;
}): Promise<PromptOutcome> {
  const { keys, render } = args;
  let value = args.initial ?? "";

  for (;;) {
    render(value);

    const event = await keys.next();
    if (event.type === "enter") return { kind: "submitted", value };
    if (event.type === "escape") return { kind: "cancelled" };

    value = editQuery(value, event) ?? value;
  }
}

/** Waits for enter or escape */
export async function acknowledge(keys: KeySource): Promise<void> {
  for (;;) {
    const event = await keys.next();
    if (event.type === "enter" || event.type === "escape") return;
  }
}

// ==========================
// End of Version 1 — src/navigation/prompt.ts
// ==========================
