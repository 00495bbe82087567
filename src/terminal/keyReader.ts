// ==========================
// Version 3 — src/terminal/keyReader.ts
// - Blocking-style key reads on stdin, one chunk at a time
// - Raw mode only for the duration of a read; previous mode restored in finally
// - Ctrl-C → InterruptError, end of input → InputClosedError (also when EOF came with the last chunk)
// - Input decoded as one UTF-8 stream
// ==========================
import { decodeKeys, type KeyEvent, type KeySource } from "./keys";

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  readableEnded?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export class InterruptError extends Error {
  constructor() {
    super("Interrupted");
    this.name = "InterruptError";
  }
}

export class InputClosedError extends Error {
  constructor() {
    super("Input closed");
    this.name = "InputClosedError";
  }
}

/** Runs fn with the input in raw mode; the prior mode comes back however fn ends */
export async function withRawMode<T>(input: KeyInput, fn: () => Promise<T>): Promise<T> {
  if (!input.isTTY || !input.setRawMode) return fn();

  const wasRaw = input.isRaw === true;
  input.setRawMode(true);
  try {
    return await fn();
  } finally {
    input.setRawMode(wasRaw);
  }
}

/** Resolves with the next chunk the input delivers */
export function readChunk(input: KeyInput): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    // "end" may already have fired while nobody was listening
    if (input.readableEnded) {
      reject(new InputClosedError());
      return;
    }

    const cleanup = () => {
      input.removeListener("data", onData);
      input.removeListener("end", onEnd);
      input.removeListener("error", onError);
      input.pause();
    };
    const onData = (chunk: Buffer | string) => {
      cleanup();
      resolve(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
    };
    const onEnd = () => {
      cleanup();
      reject(new InputClosedError());
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    input.on("data", onData);
    input.on("end", onEnd);
    input.on("error", onError);
    input.resume();
  });
}

export class KeyReader implements KeySource {
  private pending: KeyEvent[] = [];

  constructor(private readonly input: KeyInput) {
    // multi-byte characters can straddle chunks
    input.setEncoding("utf8");
  }

  async next(): Promise<KeyEvent> {
    for (;;) {
      const event = this.pending.shift();
      if (event) {
        if (event.type === "interrupt") {
          this.pending = [];
          throw new InterruptError();
        }
        return event;
      }

      const chunk = await withRawMode(this.input, () => readChunk(this.input));
      this.pending = decodeKeys(chunk);
    }
  }
}

// ==========================
// End of Version 3 — src/terminal/keyReader.ts
// ==========================
