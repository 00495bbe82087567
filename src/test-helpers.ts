import type { KeyEvent, KeySource } from "./terminal/keys";
import { decodeKeys } from "./terminal/keys";

export type ScriptedKeys = KeySource & { remaining: () => number };

/** Replays a fixed list of keys; running past the end fails the test instead of hanging */
export function scriptedKeys(events: KeyEvent[]): ScriptedKeys {
  const queue = events.slice();
  return {
    async next() {
      const event = queue.shift();
      if (!event) throw new Error("scripted keys exhausted");
      return event;
    },
    remaining: () => queue.length,
  };
}

/** Keys for typing `text` */
export function typed(text: string): KeyEvent[] {
  return decodeKeys(text);
}

export function repeat(event: KeyEvent, times: number): KeyEvent[] {
  return Array.from({ length: times }, () => event);
}
