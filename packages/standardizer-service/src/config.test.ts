import { describe, it, expect } from "vitest";
import { isConfigurationError } from "@team-standardizer/matcher";
import { loadConfig } from "./config.js";

function configError(env: NodeJS.ProcessEnv) {
  try {
    loadConfig(env);
  } catch (error) {
    if (isConfigurationError(error)) return error;
    throw error;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      matchThreshold: 0.75,
      autoAddThreshold: 0.7,
      autoSave: true,
      store: { kind: "file", path: "teams.json", backupOnSave: true },
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "  ", TEAMS_FILE: "" }).port).toBe(3000);
  });

  it("reads every variable", () => {
    const config = loadConfig({
      PORT: "8080",
      MATCHING_THRESHOLD: "0.8",
      AUTO_ADD_THRESHOLD: "0.6",
      SNAPSHOT_STORE: "sqlite",
      DB_PATH: "data/teams.db",
      AUTO_SAVE: "FALSE",
    });
    expect(config).toEqual({
      port: 8080,
      matchThreshold: 0.8,
      autoAddThreshold: 0.6,
      autoSave: false,
      store: { kind: "sqlite", path: "data/teams.db" },
    });
  });

  it("turns off backups", () => {
    expect(loadConfig({ BACKUP_ON_SAVE: "no", TEAMS_FILE: "registry.json" }).store).toEqual({
      kind: "file",
      path: "registry.json",
      backupOnSave: false,
    });
  });

  it("requires DB_PATH for the sqlite store", () => {
    const error = configError({ SNAPSHOT_STORE: "sqlite" });
    expect(error.code).toBe("INVALID_ENV");
    expect(error.message).toBe(
      "Invalid environment configuration: DB_PATH: DB_PATH is required when SNAPSHOT_STORE is sqlite",
    );
  });

  it("rejects out-of-range and malformed values", () => {
    const error = configError({ MATCHING_THRESHOLD: "1.5", AUTO_SAVE: "maybe" });
    expect(error.code).toBe("INVALID_ENV");
    expect(error.message).toContain("MATCHING_THRESHOLD:");
    expect(error.message).toContain("AUTO_SAVE:");
  });
});
