import { describe, it, expect } from "vitest";
import { FuzzyMatcher } from "./fuzzy-matcher.js";

const fixed = (score: number) => new FuzzyMatcher({ metrics: [{ name: "fixed", metric: () => score, weight: 1 }] });

describe("FuzzyMatcher.similarity", () => {
  const matcher = new FuzzyMatcher();

  it("is 1 for names equal ignoring case and spacing", () => {
    expect(matcher.similarity("  chicago   BULLS", "Chicago Bulls")).toBe(1);
  });

  it("is 1 when the normalized forms coincide", () => {
    expect(matcher.similarity("Chicago Bulls", "Chicago Bulls Club")).toBe(1);
    expect(matcher.similarity("Los Angeles Lakers", "LA Lakers")).toBe(1);
  });

  it("is 0 when a side normalizes to nothing", () => {
    expect(matcher.similarity("Team", "Boston Celtics")).toBe(0);
    expect(matcher.similarity("", "Boston Celtics")).toBe(0);
  });

  it("blends the metric scores", () => {
    expect(matcher.similarity("Kaunas Zalgiris", "Kauno Zalgiris")).toBeCloseTo(0.861864, 6);
    expect(matcher.similarity("Totally Unrelated Club", "Barcelona")).toBeCloseTo(0.21879, 5);
  });

  it("is symmetric", () => {
    expect(matcher.similarity("Boston Celtics", "Celtics Boston")).toBe(
      matcher.similarity("Celtics Boston", "Boston Celtics"),
    );
  });
});

describe("FuzzyMatcher.explain", () => {
  it("reports the normalized inputs and each metric", () => {
    const matcher = new FuzzyMatcher();
    const breakdown = matcher.explain("Kaunas Zalgiris", "Kauno Zalgiris");
    expect(breakdown.normalizedQuery).toBe("kaunas zalgiris");
    expect(breakdown.normalizedCandidate).toBe("kauno zalgiris");
    expect(matcher.metricNames).toEqual([
      "editDistance",
      "jaro",
      "bigramJaccard",
      "tokenSort",
      "tokenSet",
      "sequenceMatch",
    ]);
    expect(Object.keys(breakdown.metrics)).toEqual(matcher.metricNames);
    expect(breakdown.metrics.tokenSort).toBeCloseTo(13 / 15, 10);
    expect(breakdown.metrics.bigramJaccard).toBe(0.6875);
    expect(breakdown.score).toBeCloseTo(0.861864, 6);
  });
});

describe("FuzzyMatcher.bestMatch", () => {
  const matcher = new FuzzyMatcher();

  it("returns undefined for an empty query or no candidates", () => {
    expect(matcher.bestMatch("", ["Boston Celtics"], 0)).toBeUndefined();
    expect(matcher.bestMatch("Boston Celtics", [], 0)).toBeUndefined();
  });

  it("picks the highest score above the threshold", () => {
    const match = matcher.bestMatch("Boston Celtics", ["Celtics Boston", "Boston Celtic", "Chicago Bulls"], 0.75);
    expect(match?.candidate).toBe("Boston Celtic");
    expect(match?.score).toBeCloseTo(0.934778, 6);
  });

  it("includes a score equal to the threshold", () => {
    expect(fixed(0.75).bestMatch("alpha", ["beta"], 0.75)).toEqual({ candidate: "beta", score: 0.75 });
    expect(fixed(0.74).bestMatch("alpha", ["beta"], 0.75)).toBeUndefined();
  });

  it("keeps the first candidate on a tie", () => {
    expect(fixed(0.9).bestMatch("alpha", ["beta", "gamma", "delta"], 0.5)?.candidate).toBe("beta");
  });

  it("reports the nearest candidate with a zero threshold", () => {
    const match = matcher.bestMatch("Totally Unrelated Club", ["Barcelona"], 0);
    expect(match?.candidate).toBe("Barcelona");
    expect(match?.score).toBeCloseTo(0.21879, 5);
  });
});
