import type { SnapshotRecord } from "@team-standardizer/shared";
import { normalizeKeyPart } from "./team-name-utils.js";

export interface CanonicalEntry {
  category: string;
  name: string;
}

export function toSnapshotRecord(entry: CanonicalEntry): SnapshotRecord {
  return { sport: entry.category, canonical_team_name: entry.name };
}

export function fromSnapshotRecord(record: SnapshotRecord): CanonicalEntry {
  return { category: record.sport, name: record.canonical_team_name };
}

/**
 * Ordered category/name store. The per-category index is a cache derived from
 * the entry list and is rebuilt whenever the list is replaced.
 */
export class Registry {
  private entryList: CanonicalEntry[] = [];
  private index = new Map<string, string[]>();

  constructor(snapshot: readonly SnapshotRecord[] = []) {
    this.load(snapshot);
  }

  get size(): number {
    return this.entryList.length;
  }

  get entries(): readonly CanonicalEntry[] {
    return this.entryList;
  }

  load(snapshot: readonly SnapshotRecord[]): void {
    this.entryList = snapshot.map(fromSnapshotRecord);
    this.rebuildIndex();
  }

  lookup(category: string): readonly string[] {
    return this.index.get(normalizeKeyPart(category)) ?? [];
  }

  categories(): string[] {
    return [...this.index.keys()];
  }

  /** Stored name of the entry equal to `name` ignoring case and spacing, if any. */
  findExact(category: string, name: string): string | undefined {
    const key = normalizeKeyPart(name);
    if (!key) return undefined;
    return this.lookup(category).find((candidate) => normalizeKeyPart(candidate) === key);
  }

  /** Appends unconditionally; duplicate checks belong to the caller. */
  add(category: string, name: string): CanonicalEntry {
    const entry: CanonicalEntry = { category: normalizeKeyPart(category), name };
    this.entryList.push(entry);
    this.indexEntry(entry);
    return entry;
  }

  toSnapshot(): SnapshotRecord[] {
    return this.entryList.map(toSnapshotRecord);
  }

  private rebuildIndex(): void {
    this.index = new Map();
    for (const entry of this.entryList) {
      this.indexEntry(entry);
    }
  }

  private indexEntry(entry: CanonicalEntry): void {
    const key = normalizeKeyPart(entry.category);
    const names = this.index.get(key);
    if (names) names.push(entry.name);
    else this.index.set(key, [entry.name]);
  }
}

/** Entries created during this process lifetime, for reporting what changed. */
export class SessionLog {
  private added: CanonicalEntry[] = [];

  get size(): number {
    return this.added.length;
  }

  record(entry: CanonicalEntry): void {
    this.added.push({ ...entry });
  }

  entries(): CanonicalEntry[] {
    return this.added.map((entry) => ({ ...entry }));
  }

  reset(): void {
    this.added = [];
  }
}
