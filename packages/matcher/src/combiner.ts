import { ConfigurationError } from "./errors.js";
import {
  editDistanceRatio,
  jaroSimilarity,
  ngramJaccard,
  sequenceMatchRatio,
  tokenSetRatio,
  tokenSortRatio,
  type SimilarityMetric,
} from "./metrics.js";

export interface WeightedMetric {
  name: string;
  metric: SimilarityMetric;
  weight: number;
}

const WEIGHT_SUM_TOLERANCE = 1e-6;

// Word reordering ("Kaunas Zalgiris" / "Zalgiris Kaunas") is common in feeds,
// character scrambling is not, so the token-based metrics carry most weight.
export const DEFAULT_METRICS: readonly WeightedMetric[] = [
  { name: "editDistance", metric: editDistanceRatio, weight: 0.05 },
  { name: "jaro", metric: jaroSimilarity, weight: 0.1 },
  { name: "bigramJaccard", metric: (a, b) => ngramJaccard(a, b, 2), weight: 0.05 },
  { name: "tokenSort", metric: tokenSortRatio, weight: 0.4 },
  { name: "tokenSet", metric: tokenSetRatio, weight: 0.35 },
  { name: "sequenceMatch", metric: sequenceMatchRatio, weight: 0.05 },
];

export class ScoreCombiner {
  private readonly weights: readonly number[];

  constructor(weights: readonly number[]) {
    if (weights.length === 0) {
      throw new ConfigurationError({ code: "INVALID_WEIGHTS", message: "At least one metric weight is required" });
    }
    const invalid = weights.find((weight) => !Number.isFinite(weight) || weight < 0 || weight > 1);
    if (invalid !== undefined) {
      throw new ConfigurationError({
        code: "INVALID_WEIGHTS",
        message: `Metric weights must lie in [0, 1], got ${invalid}`,
      });
    }
    const sum = weights.reduce((total, weight) => total + weight, 0);
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      throw new ConfigurationError({
        code: "INVALID_WEIGHTS",
        message: `Metric weights must sum to 1.0, got ${sum.toFixed(6)}`,
      });
    }
    this.weights = [...weights];
  }

  get size(): number {
    return this.weights.length;
  }

  /** Weighted sum of the scores, clamped to [0, 1]. Scores are paired with weights by position. */
  combine(scores: readonly number[]): number {
    const weighted = this.weights.reduce((total, weight, i) => total + weight * (scores[i] ?? 0), 0);
    return Math.min(1, Math.max(0, weighted));
  }
}
