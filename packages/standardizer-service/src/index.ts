// src/index.ts
import dotenv from "dotenv";
import { loadConfig } from "./config.js";
import { startServer } from "./server.js";
import { StandardizationService, createSnapshotStore } from "./service.js";

// Load environment variables from .env file FIRST
dotenv.config();

const main = async () => {
  const config = loadConfig();
  const service = new StandardizationService({
    store: createSnapshotStore(config.store),
    matchThreshold: config.matchThreshold,
    autoAddThreshold: config.autoAddThreshold,
    autoSave: config.autoSave,
  });
  await service.load();
  await startServer(service, config.port);
};

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
