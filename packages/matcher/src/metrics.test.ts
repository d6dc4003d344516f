import { describe, it, expect } from "vitest";
import {
  editDistanceRatio,
  jaroSimilarity,
  levenshteinDistance,
  matchingCharacters,
  ngramJaccard,
  ngrams,
  sequenceMatchRatio,
  tokenSetRatio,
  tokenSortRatio,
  type SimilarityMetric,
} from "./metrics.js";

const ALL_METRICS: Array<[string, SimilarityMetric]> = [
  ["editDistanceRatio", editDistanceRatio],
  ["jaroSimilarity", jaroSimilarity],
  ["ngramJaccard", (a, b) => ngramJaccard(a, b)],
  ["tokenSortRatio", tokenSortRatio],
  ["tokenSetRatio", tokenSetRatio],
  ["sequenceMatchRatio", sequenceMatchRatio],
];

const PAIRS: Array<[string, string]> = [
  ["zalgiris kaunas", "kauno zalgiris"],
  ["dixon", "dicksonx"],
  ["los angeles lakers", "lakers"],
  ["brand new", "kauno zalgiris"],
  ["a", "ab"],
  ["são paulo", "sao paulo"],
];

describe("levenshteinDistance", () => {
  it("counts unit-cost edits", () => {
    expect(levenshteinDistance("kitten", "sitting")).toBe(3);
    expect(levenshteinDistance("", "abc")).toBe(3);
    expect(levenshteinDistance("abc", "")).toBe(3);
    expect(levenshteinDistance("same", "same")).toBe(0);
  });

  it("treats astral characters as single code points", () => {
    expect(levenshteinDistance("🏀 club", "⚽ club")).toBe(1);
  });
});

describe("editDistanceRatio", () => {
  it("scales distance by the longer string", () => {
    expect(editDistanceRatio("kitten", "sitting")).toBeCloseTo(4 / 7, 10);
  });

  it("is 1 for two empty strings", () => {
    expect(editDistanceRatio("", "")).toBe(1);
  });
});

describe("jaroSimilarity", () => {
  it("matches the classic reference values", () => {
    expect(jaroSimilarity("martha", "marhta")).toBeCloseTo(0.944444, 6);
    expect(jaroSimilarity("dixon", "dicksonx")).toBeCloseTo(0.766667, 6);
  });

  it("is 0 with an empty side or no common characters", () => {
    expect(jaroSimilarity("", "abc")).toBe(0);
    expect(jaroSimilarity("abc", "")).toBe(0);
    expect(jaroSimilarity("abc", "xyz")).toBe(0);
  });
});

describe("ngrams and ngramJaccard", () => {
  it("builds overlapping bigrams", () => {
    expect([...ngrams("lakers")]).toEqual(["la", "ak", "ke", "er", "rs"]);
  });

  it("degenerates to the string itself when shorter than n", () => {
    expect([...ngrams("a")]).toEqual(["a"]);
    expect(ngramJaccard("a", "a")).toBe(1);
  });

  it("divides shared grams by all grams", () => {
    expect(ngramJaccard("night", "nacht")).toBeCloseTo(1 / 7, 10);
    expect(ngramJaccard("ab", "ba")).toBe(0);
  });

  it("handles empty strings", () => {
    expect(ngramJaccard("", "")).toBe(1);
    expect(ngramJaccard("", "abc")).toBe(0);
  });
});

describe("token ratios", () => {
  it("ignores word order in the token-sort ratio", () => {
    expect(tokenSortRatio("zalgiris kaunas", "kaunas zalgiris")).toBe(1);
  });

  it("scores a strict token subset as identical in the token-set ratio", () => {
    expect(tokenSetRatio("los angeles lakers", "lakers")).toBe(1);
    expect(tokenSetRatio("madrid", "madrid real")).toBe(1);
  });

  it("takes the best of the intersection and full-set comparisons", () => {
    expect(tokenSetRatio("kaunas zalgiris", "kauno zalgiris")).toBeCloseTo(13 / 15, 10);
  });
});

describe("sequenceMatchRatio", () => {
  it("uses the longest matching blocks", () => {
    expect(matchingCharacters("abcd", "bcde")).toBe(3);
    expect(sequenceMatchRatio("abcd", "bcde")).toBe(0.75);
    expect(sequenceMatchRatio("kaunas zalgiris", "kauno zalgiris")).toBeCloseTo(26 / 29, 10);
  });

  it("is 1 for two empty strings", () => {
    expect(sequenceMatchRatio("", "")).toBe(1);
  });
});

describe("metric properties", () => {
  for (const [name, metric] of ALL_METRICS) {
    it(`${name} is symmetric and bounded`, () => {
      for (const [a, b] of PAIRS) {
        const forward = metric(a, b);
        expect(metric(b, a)).toBe(forward);
        expect(forward).toBeGreaterThanOrEqual(0);
        expect(forward).toBeLessThanOrEqual(1);
      }
    });

    it(`${name} scores identical non-empty strings as 1`, () => {
      for (const [a] of PAIRS) {
        expect(metric(a, a)).toBe(1);
      }
    });
  }
});
