//----------------------------------//
//   Version 1 - vitest.config.ts   //
// - React plugin for the Ink views //
// - Node environment (no DOM)      //
//----------------------------------//
import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  test: {
    environment: "node",
    include: ["src/**/*.test.{ts,tsx}"],
    // native addon (better-sqlite3)
    pool: "forks",
  },
});

//----------------------------------//
// End of Version 1 - vitest.config.ts //
//----------------------------------//
