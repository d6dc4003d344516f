import { z } from "zod";
import { ConfigurationError, DEFAULT_AUTO_ADD_THRESHOLD, DEFAULT_MATCH_THRESHOLD } from "@team-standardizer/matcher";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const threshold = z.coerce.number().min(0).max(1);

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    MATCHING_THRESHOLD: threshold.default(DEFAULT_MATCH_THRESHOLD),
    AUTO_ADD_THRESHOLD: threshold.default(DEFAULT_AUTO_ADD_THRESHOLD),
    SNAPSHOT_STORE: z.enum(["file", "sqlite"]).default("file"),
    TEAMS_FILE: z.string().min(1).default("teams.json"),
    DB_PATH: z.string().min(1).optional(),
    BACKUP_ON_SAVE: booleanFlag.default("true"),
    AUTO_SAVE: booleanFlag.default("true"),
  })
  .superRefine((env, ctx) => {
    if (env.SNAPSHOT_STORE === "sqlite" && !env.DB_PATH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DB_PATH"],
        message: "DB_PATH is required when SNAPSHOT_STORE is sqlite",
      });
    }
  });

export type SnapshotStoreConfig =
  | { kind: "file"; path: string; backupOnSave: boolean }
  | { kind: "sqlite"; path: string };

export interface ServiceConfig {
  port: number;
  matchThreshold: number;
  autoAddThreshold: number;
  autoSave: boolean;
  store: SnapshotStoreConfig;
}

/**
 * Reads the service configuration from environment variables. Blank values
 * count as unset. Call `dotenv.config()` first to pick up a `.env` file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError({
      code: "INVALID_ENV",
      message: `Invalid environment configuration: ${issues.join("; ")}`,
      cause: result.error,
    });
  }

  const parsed = result.data;
  const store: SnapshotStoreConfig =
    parsed.SNAPSHOT_STORE === "sqlite" && parsed.DB_PATH
      ? { kind: "sqlite", path: parsed.DB_PATH }
      : { kind: "file", path: parsed.TEAMS_FILE, backupOnSave: parsed.BACKUP_ON_SAVE };

  return {
    port: parsed.PORT,
    matchThreshold: parsed.MATCHING_THRESHOLD,
    autoAddThreshold: parsed.AUTO_ADD_THRESHOLD,
    autoSave: parsed.AUTO_SAVE,
    store,
  };
}
