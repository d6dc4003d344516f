import fs from "node:fs/promises";
import path from "node:path";
import type { SnapshotRecord } from "@team-standardizer/shared";
import { PersistenceError, errorMessage } from "./errors.js";
import { parseSnapshot, type SaveReceipt, type SnapshotStore } from "./snapshot-store.js";

export interface FileSnapshotStoreOptions {
  backupOnSave?: boolean;
  now?: () => Date;
}

const pad = (value: number) => String(value).padStart(2, "0");

/** `YYYYMMDD_HHMMSS` in local time. */
export function backupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Keeps the snapshot as a pretty-printed JSON array. Before overwriting, the
 * previous file is copied to `<file>.backup_YYYYMMDD_HHMMSS` unless backups
 * are turned off.
 */
export class FileSnapshotStore implements SnapshotStore {
  readonly location: string;
  private readonly backupOnSave: boolean;
  private readonly now: () => Date;

  constructor(filePath: string, options: FileSnapshotStoreOptions = {}) {
    this.location = path.resolve(filePath);
    this.backupOnSave = options.backupOnSave ?? true;
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<SnapshotRecord[] | null> {
    let data: string;
    try {
      data = await fs.readFile(this.location, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new PersistenceError({
        code: "SNAPSHOT_UNREADABLE",
        message: `Cannot read snapshot ${this.location}: ${errorMessage(error)}`,
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new PersistenceError({
        code: "SNAPSHOT_INVALID",
        message: `Snapshot ${this.location} is not valid JSON: ${errorMessage(error)}`,
        cause: error,
      });
    }
    return parseSnapshot(parsed, this.location);
  }

  async save(records: readonly SnapshotRecord[]): Promise<SaveReceipt> {
    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      const backupPath = this.backupOnSave ? await this.backup() : undefined;
      await fs.writeFile(this.location, `${JSON.stringify(records, null, 2)}\n`, "utf8");
      const receipt: SaveReceipt = { location: this.location, count: records.length };
      if (backupPath) receipt.backupPath = backupPath;
      return receipt;
    } catch (error) {
      throw new PersistenceError({
        code: "SNAPSHOT_UNWRITABLE",
        message: `Cannot write snapshot ${this.location}: ${errorMessage(error)}`,
        cause: error,
      });
    }
  }

  private async backup(): Promise<string | undefined> {
    const backupPath = `${this.location}.backup_${backupTimestamp(this.now())}`;
    try {
      await fs.copyFile(this.location, backupPath);
      return backupPath;
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }
}
