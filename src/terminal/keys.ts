// ==========================
// Version 2 — src/terminal/keys.ts
// - KeyEvent: the only thing screens ever see of the keyboard
// - decodeKeys(): one raw chunk → events
//   * ESC [ A/B → up/down, ESC [ C/D → ignored, longer CSI consumed whole
//   * ESC O A/B (application cursor mode) → up/down
//   * ESC alone (or ESC + anything else) → escape
// ==========================

export type KeyEvent =
  | { type: "character"; char: string }
  | { type: "backspace" }
  | { type: "enter" }
  | { type: "escape" }
  | { type: "up" }
  | { type: "down" }
  | { type: "ignored" }
  | { type: "interrupt" };

export type KeySource = {
  next(): Promise<KeyEvent>;
};

const ESC = "\x1b";
const CTRL_C = "\x03";
const BACKSPACE = "\x7f";
const CTRL_H = "\b";

type SimpleKeyType = Exclude<KeyEvent["type"], "character">;

function key(type: SimpleKeyType): KeyEvent {
  return { type };
}

export const Keys = {
  up: key("up"),
  down: key("down"),
  enter: key("enter"),
  escape: key("escape"),
  backspace: key("backspace"),
  ignored: key("ignored"),
  interrupt: key("interrupt"),
  char: (char: string): KeyEvent => ({ type: "character", char }),
};

function arrow(final: string | undefined): KeyEvent {
  if (final === "A") return Keys.up;
  if (final === "B") return Keys.down;
  return Keys.ignored;
}

function isControl(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code < 0x20 || code === 0x7f;
}

/**
 * CSI: ESC [ <params 0x30–0x3F>* <intermediates 0x20–0x2F>* <final 0x40–0x7E>.
 * Returns the index just past the sequence and its final byte.
 */
function readCsi(chars: string[], start: number): { end: number; final: string | undefined } {
  let i = start;
  while (i < chars.length) {
    const code = chars[i].codePointAt(0) ?? 0;
    if (code >= 0x40 && code <= 0x7e) return { end: i + 1, final: chars[i] };
    if (code < 0x20 || code > 0x3f) break;
    i++;
  }
  return { end: i, final: undefined };
}

export function decodeKeys(chunk: string): KeyEvent[] {
  const chars = Array.from(chunk);
  const out: KeyEvent[] = [];

  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];

    if (ch === ESC) {
      const follower = chars[i + 1];

      if (follower === "[") {
        const { end, final } = readCsi(chars, i + 2);
        // bare "ESC [" at the end of a chunk: treat like alt+[
        out.push(final === undefined && end === i + 2 ? Keys.escape : arrow(final));
        i = end;
        continue;
      }

      if (follower === "O" && chars[i + 2] !== undefined) {
        out.push(arrow(chars[i + 2]));
        i += 3;
        continue;
      }

      out.push(Keys.escape);
      i += follower === undefined ? 1 : 2;
      continue;
    }

    if (ch === "\r" || ch === "\n") {
      out.push(Keys.enter);
      i += ch === "\r" && chars[i + 1] === "\n" ? 2 : 1;
      continue;
    }

    if (ch === BACKSPACE || ch === CTRL_H) out.push(Keys.backspace);
    else if (ch === CTRL_C) out.push(Keys.interrupt);
    else if (isControl(ch)) out.push(Keys.ignored);
    else out.push(Keys.char(ch));

    i++;
  }

  return out;
}

// ==========================
// End of Version 2 — src/terminal/keys.ts
// ==========================
