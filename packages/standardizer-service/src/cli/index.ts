import "dotenv/config";
import { loadConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { StandardizationService, createSnapshotStore } from "../service.js";
import { createProgram } from "./program.js";

// Diagnostics go to stderr, results to stdout
const stderrLogger = {
  info: (message: string) => console.error(message),
  warn: (message: string) => console.error(message),
  error: (message: string, error?: unknown) => console.error(message, ...(error === undefined ? [] : [error])),
};

const program = createProgram({
  openService: () => {
    const config = loadConfig();
    return new StandardizationService({
      store: createSnapshotStore(config.store),
      matchThreshold: config.matchThreshold,
      autoAddThreshold: config.autoAddThreshold,
      autoSave: config.autoSave,
      logger: stderrLogger,
    });
  },
  write: (text) => console.log(text),
});

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
