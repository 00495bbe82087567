// ==========================
// Version 5 — src/main.ts
// - Terminal entry point: config → database → Ink UI → key reader → screen loop
// - Always unmounts the UI and closes the database, however the loop ends
// - Exit codes: 0 normal / closed input, 130 Ctrl-C, 1 failure
// ==========================
import { runApp } from "./App";
import { ConfigError, loadConfig, type AppConfig } from "./config";
import { closeDatabase, openDatabase } from "./db/client";
import { createInkUi } from "./terminal/inkUi";
import { InputClosedError, InterruptError, KeyReader } from "./terminal/keyReader";
import { createLogger, setDebug } from "./utils/log";

const log = createLogger("main");

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      log.error(e.message);
      return 1;
    }
    throw e;
  }

  setDebug(config.debug);
  log.log("config", config);

  const db = openDatabase(config.dbPath);
  const ui = createInkUi();

  try {
    await runApp({ db, ui, keys: new KeyReader(process.stdin), pageSize: config.pageSize });
    return 0;
  } catch (e) {
    if (e instanceof InterruptError) return 130;
    if (e instanceof InputClosedError) return 0;
    throw e;
  } finally {
    ui.close();
    closeDatabase(db);
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    log.error("fatal", err);
    process.exit(1);
  }
);

// ==========================
// End of Version 5 — src/main.ts
// ==========================
