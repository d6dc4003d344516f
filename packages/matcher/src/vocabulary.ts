export interface NormalizerVocabulary {
  /** Whole-word substitutions applied in order, before any token is stripped. */
  abbreviations: ReadonlyArray<readonly [abbreviation: string, expansion: string]>;
  /** Club, team and association qualifiers that carry no identity. */
  organizationTokens: readonly string[];
  stopWords: readonly string[];
}

export const DEFAULT_ABBREVIATIONS: NormalizerVocabulary["abbreviations"] = [
  ["la", "los angeles"],
  ["n.y.", "new york"],
  ["ny", "new york"],
  ["s.f.", "san francisco"],
  ["sf", "san francisco"],
  ["d.c.", "washington"],
  ["dc", "washington"],
  ["l.a.", "los angeles"],
  ["chi", "chicago"],
  ["phila", "philadelphia"],
  ["n.o.", "new orleans"],
  ["no", "new orleans"],
  ["s.a.", "san antonio"],
  ["sa", "san antonio"],
  ["utd", "united"],
  ["fc", ""],
  ["sc", ""],
  ["ac", ""],
  ["bc", ""],
  ["ht", "heat"],
  ["mn", "minnesota"],
  ["man.", "manchester"],
];

export const DEFAULT_ORGANIZATION_TOKENS = [
  "fc",
  "cf",
  "sc",
  "ac",
  "bc",
  "fk",
  "kk",
  "club",
  "team",
  "basketball",
  "football",
] as const;

export const DEFAULT_STOP_WORDS = ["real", "de", "del", "la", "le", "the", "of", "and"] as const;

export const DEFAULT_VOCABULARY: NormalizerVocabulary = {
  abbreviations: DEFAULT_ABBREVIATIONS,
  organizationTokens: DEFAULT_ORGANIZATION_TOKENS,
  stopWords: DEFAULT_STOP_WORDS,
};
