import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { isPersistenceError } from "./errors.js";
import { FileSnapshotStore, backupTimestamp } from "./file-store.js";

const records = [
  { sport: "basketball", canonical_team_name: "Kauno Zalgiris" },
  { sport: "soccer", canonical_team_name: "Barcelona" },
];

async function persistenceErrorCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    if (isPersistenceError(error)) return error.code;
    throw error;
  }
  return undefined;
}

describe("backupTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(backupTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe("20240105_070809");
  });
});

describe("FileSnapshotStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "team-standardizer-"));
    file = path.join(dir, "teams.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads null when the file does not exist", async () => {
    expect(await new FileSnapshotStore(file).load()).toBeNull();
  });

  it("writes pretty-printed JSON and reads it back in order", async () => {
    const store = new FileSnapshotStore(file);
    const receipt = await store.save(records);

    expect(receipt).toEqual({ location: file, count: 2 });
    expect(await fs.readFile(file, "utf8")).toBe(`${JSON.stringify(records, null, 2)}\n`);
    expect(await store.load()).toEqual(records);
  });

  it("creates missing directories", async () => {
    const nested = path.join(dir, "data", "teams.json");
    await new FileSnapshotStore(nested).save(records);
    expect(await new FileSnapshotStore(nested).load()).toEqual(records);
  });

  it("backs up the previous file before overwriting", async () => {
    const store = new FileSnapshotStore(file, { now: () => new Date(2024, 11, 31, 23, 59, 58) });
    await store.save(records.slice(0, 1));
    const receipt = await store.save(records);

    const backupPath = `${file}.backup_20241231_235958`;
    expect(receipt.backupPath).toBe(backupPath);
    expect(JSON.parse(await fs.readFile(backupPath, "utf8"))).toEqual(records.slice(0, 1));
    expect(await store.load()).toEqual(records);
  });

  it("skips the backup when turned off", async () => {
    const store = new FileSnapshotStore(file, { backupOnSave: false });
    await store.save(records);
    await store.save(records);
    expect(await fs.readdir(dir)).toEqual(["teams.json"]);
  });

  it("rejects files that are not JSON", async () => {
    await fs.writeFile(file, "{not json", "utf8");
    expect(await persistenceErrorCode(new FileSnapshotStore(file).load())).toBe("SNAPSHOT_INVALID");
  });

  it("rejects records of the wrong shape", async () => {
    await fs.writeFile(file, JSON.stringify([{ sport: "soccer", name: "Barcelona" }]), "utf8");
    expect(await persistenceErrorCode(new FileSnapshotStore(file).load())).toBe("SNAPSHOT_INVALID");
  });

  it("reports unreadable and unwritable locations", async () => {
    expect(await persistenceErrorCode(new FileSnapshotStore(dir).load())).toBe("SNAPSHOT_UNREADABLE");
    expect(await persistenceErrorCode(new FileSnapshotStore(dir, { backupOnSave: false }).save(records))).toBe(
      "SNAPSHOT_UNWRITABLE",
    );
  });
});
