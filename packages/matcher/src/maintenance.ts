import type { SnapshotRecord } from "@team-standardizer/shared";
import { normalize, type Normalizer } from "./normalizer.js";
import { isBlank, makeEntryKey, normalizeKeyPart } from "./team-name-utils.js";

export interface CleanOptions {
  dropEmpty?: boolean;
  dedupe?: boolean;
  /** Also drop entries whose normalized form equals an earlier entry's in the same category. */
  mergeNormalized?: boolean;
  normalizer?: Normalizer;
}

export interface MergedRecord {
  record: SnapshotRecord;
  keptName: string;
}

export interface CleanReport {
  records: SnapshotRecord[];
  removedEmpty: SnapshotRecord[];
  removedDuplicates: SnapshotRecord[];
  mergedNormalized: MergedRecord[];
}

/**
 * Offline cleanup of a registry snapshot. The first occurrence of every
 * entry is kept and the relative order of kept records is preserved.
 */
export function cleanSnapshot(records: readonly SnapshotRecord[], options: CleanOptions = {}): CleanReport {
  const { dropEmpty = true, dedupe = true, mergeNormalized = false, normalizer = normalize } = options;
  const report: CleanReport = { records: [], removedEmpty: [], removedDuplicates: [], mergedNormalized: [] };
  const seenKeys = new Set<string>();
  const seenNormalized = new Map<string, string>();

  for (const record of records) {
    if (dropEmpty && isBlank(record.canonical_team_name)) {
      report.removedEmpty.push(record);
      continue;
    }

    const key = makeEntryKey(record.sport, record.canonical_team_name);
    if (dedupe && seenKeys.has(key)) {
      report.removedDuplicates.push(record);
      continue;
    }

    if (mergeNormalized) {
      const normalized = normalizer(record.canonical_team_name);
      const normalizedKey = `${normalizeKeyPart(record.sport)}::${normalized}`;
      const kept = normalized ? seenNormalized.get(normalizedKey) : undefined;
      if (kept !== undefined) {
        report.mergedNormalized.push({ record, keptName: kept });
        continue;
      }
      if (normalized) seenNormalized.set(normalizedKey, record.canonical_team_name);
    }

    seenKeys.add(key);
    report.records.push(record);
  }

  return report;
}
