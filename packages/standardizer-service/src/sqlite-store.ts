import Database from "better-sqlite3";
import type { SnapshotRecord } from "@team-standardizer/shared";
import { PersistenceError, errorMessage } from "./errors.js";
import { parseSnapshot, type SaveReceipt, type SnapshotStore } from "./snapshot-store.js";

/**
 * Keeps the ordered snapshot in a single table. A save replaces every row in
 * one transaction, so readers see either the old or the new snapshot.
 */
export class SqliteSnapshotStore implements SnapshotStore {
  readonly location: string;
  private db: Database.Database;

  constructor(dbPath: string) {
    this.location = dbPath;
    try {
      this.db = new Database(dbPath);
      this.initializeTables();
    } catch (error) {
      throw new PersistenceError({
        code: "SNAPSHOT_UNREADABLE",
        message: `Failed to initialize database at ${dbPath}: ${errorMessage(error)}`,
        cause: error,
      });
    }
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS canonical_teams (
        position INTEGER PRIMARY KEY,
        sport TEXT NOT NULL,
        canonical_team_name TEXT NOT NULL
      )
    `);

    // Presence of the single row marks that a snapshot has been saved, even an empty one.
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshot_meta (
        id INTEGER PRIMARY KEY CHECK(id = 1),
        record_count INTEGER NOT NULL,
        saved_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);
  }

  async load(): Promise<SnapshotRecord[] | null> {
    let rows: unknown[];
    try {
      const meta = this.db.prepare("SELECT record_count FROM snapshot_meta WHERE id = 1").get();
      if (meta === undefined) return null;
      rows = this.db.prepare("SELECT sport, canonical_team_name FROM canonical_teams ORDER BY position").all();
    } catch (error) {
      throw new PersistenceError({
        code: "SNAPSHOT_UNREADABLE",
        message: `Cannot read snapshot from ${this.location}: ${errorMessage(error)}`,
        cause: error,
      });
    }
    return parseSnapshot(rows, this.location);
  }

  async save(records: readonly SnapshotRecord[]): Promise<SaveReceipt> {
    const replace = this.db.transaction((snapshot: readonly SnapshotRecord[]) => {
      this.db.prepare("DELETE FROM canonical_teams").run();
      const insert = this.db.prepare(
        "INSERT INTO canonical_teams (position, sport, canonical_team_name) VALUES (?, ?, ?)",
      );
      snapshot.forEach((record, position) => insert.run(position, record.sport, record.canonical_team_name));
      this.db
        .prepare(
          `INSERT INTO snapshot_meta (id, record_count) VALUES (1, ?)
           ON CONFLICT(id) DO UPDATE SET record_count = excluded.record_count, saved_at = datetime('now')`,
        )
        .run(snapshot.length);
    });

    try {
      replace(records);
    } catch (error) {
      throw new PersistenceError({
        code: "SNAPSHOT_UNWRITABLE",
        message: `Cannot write snapshot to ${this.location}: ${errorMessage(error)}`,
        cause: error,
      });
    }
    return { location: this.location, count: records.length };
  }

  close() {
    this.db.close();
  }
}
