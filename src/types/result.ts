// ==========================
// Version 1 — src/types/result.ts
// - Error codes the store reports as data instead of throwing
// - Result<T> helpers: ok() / fail()
// ==========================

export type HabitErrorCode = "invalid-input" | "already-exists" | "not-found";

export class HabitError extends Error {
  readonly code: HabitErrorCode;

  constructor(code: HabitErrorCode, message: string) {
    super(message);
    this.name = "HabitError";
    this.code = code;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: HabitError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(code: HabitErrorCode, message: string): Result<T> {
  return { ok: false, error: new HabitError(code, message) };
}

// ==========================
// End of Version 1 — src/types/result.ts
// ==========================
