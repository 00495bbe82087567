// ==========================
// Version 1 — src/utils/log.ts
// - Tagged console logging: "[store] ...", "[app] ..."
// - log/warn only when debug is on; errors always go out
// ==========================

let DEBUG = false;

export function setDebug(enabled: boolean) {
  DEBUG = enabled;
}

export type Logger = {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    log(...args) {
      if (!DEBUG) return;
      console.log(prefix, ...args);
    },
    warn(...args) {
      if (!DEBUG) return;
      console.warn(prefix, ...args);
    },
    error(...args) {
      console.error(prefix, ...args);
    },
  };
}

// ==========================
// End of Version 1 — src/utils/log.ts
// ==========================
