import { DEFAULT_VOCABULARY, type NormalizerVocabulary } from "./vocabulary.js";

export type Normalizer = (raw: string) => string;

// A word is a maximal run of letters, combining marks and digits.
const WORD_CHAR = "[\\p{L}\\p{M}\\p{N}]";
const NOT_WORD_CHAR = /[^\p{L}\p{M}\p{N}\s]/gu;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wholeWord(pattern: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})(?:${pattern})(?!${WORD_CHAR})`, "giu");
}

function alternation(words: readonly string[]): RegExp | null {
  const parts = words.filter((word) => word.length > 0).map(escapeRegExp);
  return parts.length > 0 ? wholeWord(parts.join("|")) : null;
}

/**
 * Builds a normalizer over the given vocabulary. Steps run in a fixed order:
 * lowercase and trim, expand abbreviations, strip organization tokens and
 * stop-words, turn punctuation into spaces, collapse whitespace.
 */
export function createNormalizer(vocabulary: NormalizerVocabulary = DEFAULT_VOCABULARY): Normalizer {
  const abbreviations = vocabulary.abbreviations
    .filter(([abbreviation]) => abbreviation.length > 0)
    .map(([abbreviation, expansion]) => ({ pattern: wholeWord(escapeRegExp(abbreviation)), expansion }));
  const organizationTokens = alternation(vocabulary.organizationTokens);
  const stopWords = alternation(vocabulary.stopWords);

  return (raw: string): string => {
    let text = String(raw ?? "").toLowerCase().trim();
    if (!text) return "";

    for (const { pattern, expansion } of abbreviations) {
      text = text.replace(pattern, expansion);
    }
    if (organizationTokens) text = text.replace(organizationTokens, "");
    if (stopWords) text = text.replace(stopWords, "");

    return text.replace(NOT_WORD_CHAR, " ").replace(/\s+/g, " ").trim();
  };
}

export const normalize: Normalizer = createNormalizer();
