import { z } from "zod";
import type { SnapshotRecord } from "@team-standardizer/shared";
import { PersistenceError } from "./errors.js";

export interface SaveReceipt {
  location: string;
  count: number;
  backupPath?: string;
}

/** Where the registry snapshot lives between runs. */
export interface SnapshotStore {
  readonly location: string;
  /** Resolves to null when no snapshot has been saved yet. */
  load(): Promise<SnapshotRecord[] | null>;
  save(records: readonly SnapshotRecord[]): Promise<SaveReceipt>;
  close?(): void;
}

const snapshotSchema = z.array(
  z.object({
    sport: z.string(),
    canonical_team_name: z.string(),
  }),
);

export function parseSnapshot(data: unknown, location: string): SnapshotRecord[] {
  const result = snapshotSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? ` at [${issue.path.join(".")}]: ${issue.message}` : "";
    throw new PersistenceError({
      code: "SNAPSHOT_INVALID",
      message: `Snapshot at ${location} is not a list of {sport, canonical_team_name} records${where}`,
      cause: result.error,
    });
  }
  return result.data.map(({ sport, canonical_team_name }) => ({ sport, canonical_team_name }));
}
