import Fuse from "fuse.js";
import { normalize, type Normalizer } from "@team-standardizer/matcher";

export interface TeamSearchResult {
  name: string;
  /** 100 = perfect match, 0 = no match. */
  relevance: number;
}

interface SearchableName {
  name: string;
  normalized: string;
}

/**
 * Free-text lookup over one category's canonical names, for people browsing
 * the registry. Standardization itself never goes through this path.
 */
export function searchTeams(names: readonly string[], query: string, normalizer: Normalizer = normalize): TeamSearchResult[] {
  if (names.length === 0 || !query.trim()) {
    return [];
  }

  const searchable: SearchableName[] = names.map((name) => ({ name, normalized: normalizer(name) }));

  const fuse = new Fuse(searchable, {
    keys: [
      { name: "name", weight: 1.0 },
      // Normalized form ignores punctuation and noise tokens such as "FC"
      { name: "normalized", weight: 0.8 },
    ],
    threshold: 0.3,
    includeScore: true,
    minMatchCharLength: 1,
    ignoreLocation: true,
  });

  const results = fuse.search(query).map((result) => ({
    name: result.item.name,
    // Fuse scores 0 for a perfect match and 1 for none
    relevance: Math.round((1 - (result.score ?? 1)) * 100),
  }));

  return results.sort((a, b) => b.relevance - a.relevance);
}
