// ==========================
// Version 1 — src/config.ts
// - Reads config from the environment (HABITS_*)
// - Validates with zod so a bad value fails at startup, not mid-session
// ==========================
import { z } from "zod";
import { DEFAULT_PAGE_SIZE } from "./navigation/pager";

const flag = z
  .enum(["0", "1", "true", "false"])
  .optional()
  .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  HABITS_DB_PATH: z.string().trim().min(1).default("habits.db"),
  HABITS_PAGE_SIZE: z.coerce.number().int().min(1).max(20).default(DEFAULT_PAGE_SIZE),
  HABITS_DEBUG: flag,
});

export type AppConfig = {
  dbPath: string;
  pageSize: number;
  debug: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration\n  ${lines.join("\n  ")}`);
  }

  return {
    dbPath: parsed.data.HABITS_DB_PATH,
    pageSize: parsed.data.HABITS_PAGE_SIZE,
    debug: parsed.data.HABITS_DEBUG,
  };
}

// ==========================
// End of Version 1 — src/config.ts
// ==========================
