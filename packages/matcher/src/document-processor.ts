import type { JsonObject, JsonScalar, JsonValue, ProcessingSummary } from "@team-standardizer/shared";
import { toWireDecision, wireDecisionToJson } from "./decision.js";
import type { CanonicalEntry } from "./registry.js";
import type { TeamStandardizer } from "./standardizer.js";
import { isBlank } from "./team-name-utils.js";

export type DocumentNode =
  | { kind: "mapping"; value: JsonObject }
  | { kind: "sequence"; value: JsonValue[] }
  | { kind: "scalar"; value: JsonScalar };

export function classify(value: JsonValue): DocumentNode {
  if (Array.isArray(value)) return { kind: "sequence", value };
  if (value !== null && typeof value === "object") return { kind: "mapping", value };
  return { kind: "scalar", value };
}

export interface DocumentFields {
  /** Keys holding team names, visited in this order within each mapping. */
  nameKeys: readonly string[];
  /** Keys holding the category, first non-blank string wins. */
  categoryKeys: readonly string[];
  defaultCategory: string;
  diagnosticSuffix: string;
  summaryKey: string;
}

export const DEFAULT_DOCUMENT_FIELDS: DocumentFields = {
  nameKeys: ["home_team", "away_team", "team_name", "team", "participant"],
  categoryKeys: ["sport", "sport_key", "category"],
  defaultCategory: "unknown",
  diagnosticSuffix: "_standardization",
  summaryKey: "_processing_summary",
};

export interface ProcessOptions {
  /** Category used for every field, ignoring the document's own category keys. */
  categoryOverride?: string;
  autoAdd?: boolean;
}

export interface ProcessResult {
  document: JsonValue;
  summary: ProcessingSummary;
  added: CanonicalEntry[];
}

/** Own properties only; `"__proto__"` in parsed JSON is an ordinary key. */
function ownValue(mapping: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(mapping, key) ? mapping[key] : undefined;
}

function deepCopy(value: JsonValue): JsonValue {
  const node = classify(value);
  switch (node.kind) {
    case "sequence":
      return node.value.map(deepCopy);
    case "mapping": {
      const copy: JsonObject = {};
      for (const [key, child] of Object.entries(node.value)) {
        Object.defineProperty(copy, key, {
          value: deepCopy(child),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return copy;
    }
    case "scalar":
      return node.value;
  }
}

/**
 * Rewrites the team-name fields of a deep copy of an arbitrary JSON document.
 * Traversal is depth-first and pre-order, and the registry is consulted
 * per field, so a name added early in the document is a candidate for the
 * fields that follow it.
 */
export class DocumentProcessor {
  private readonly fields: DocumentFields;

  constructor(
    private readonly standardizer: TeamStandardizer,
    fields: Partial<DocumentFields> = {},
  ) {
    this.fields = { ...DEFAULT_DOCUMENT_FIELDS, ...fields };
  }

  process(document: JsonValue, options: ProcessOptions = {}): ProcessResult {
    const copy = deepCopy(document);
    const summary: ProcessingSummary = { teams_processed: 0, changes_made: false, new_teams_added: 0 };
    const addedBefore = this.standardizer.sessionLog.size;
    const override = isBlank(options.categoryOverride) ? undefined : options.categoryOverride;

    const visit = (value: JsonValue, inheritedCategory: string): void => {
      const node = classify(value);
      if (node.kind === "sequence") {
        for (const item of node.value) visit(item, inheritedCategory);
        return;
      }
      if (node.kind === "scalar") return;

      const mapping = node.value;
      const category = override ?? this.resolveCategory(mapping) ?? inheritedCategory;
      const diagnosticKeys = new Set<string>();

      for (const key of this.fields.nameKeys) {
        const original = ownValue(mapping, key);
        if (typeof original !== "string" || isBlank(original)) continue;

        const { name, decision } = this.standardizer.standardize(original, category, { autoAdd: options.autoAdd });
        summary.teams_processed++;
        if (name !== original) {
          mapping[key] = name;
          summary.changes_made = true;
        }

        const diagnosticKey = `${key}${this.fields.diagnosticSuffix}`;
        mapping[diagnosticKey] = {
          original,
          standardized: name,
          details: wireDecisionToJson(toWireDecision(decision)),
        };
        diagnosticKeys.add(diagnosticKey);
      }

      for (const [key, child] of Object.entries(mapping)) {
        if (diagnosticKeys.has(key)) continue;
        visit(child, category);
      }
    };

    visit(copy, this.fields.defaultCategory);
    const added = this.standardizer.sessionLog.entries().slice(addedBefore);
    summary.new_teams_added = added.length;

    const root = classify(copy);
    if (root.kind === "mapping") {
      root.value[this.fields.summaryKey] = {
        teams_processed: summary.teams_processed,
        changes_made: summary.changes_made,
        new_teams_added: summary.new_teams_added,
      };
    }
    return { document: copy, summary, added };
  }

  private resolveCategory(mapping: JsonObject): string | undefined {
    for (const key of this.fields.categoryKeys) {
      const value = ownValue(mapping, key);
      if (typeof value === "string" && !isBlank(value)) return value;
    }
    return undefined;
  }
}
