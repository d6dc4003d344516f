import { DEFAULT_METRICS, ScoreCombiner, type WeightedMetric } from "./combiner.js";
import { normalize, type Normalizer } from "./normalizer.js";
import { normalizeKeyPart } from "./team-name-utils.js";

export interface FuzzyMatcherOptions {
  normalizer?: Normalizer;
  metrics?: readonly WeightedMetric[];
}

export interface MatchCandidate {
  candidate: string;
  score: number;
}

export interface ScoreBreakdown {
  query: string;
  candidate: string;
  normalizedQuery: string;
  normalizedCandidate: string;
  metrics: Record<string, number>;
  score: number;
}

interface PreparedQuery {
  key: string;
  normalized: string;
}

/**
 * Scores names against each other with a weighted blend of string metrics and
 * picks the best candidate above a threshold. Holds no per-candidate state:
 * candidates are normalized again on every call.
 */
export class FuzzyMatcher {
  private readonly normalizer: Normalizer;
  private readonly metrics: readonly WeightedMetric[];
  private readonly combiner: ScoreCombiner;

  constructor(options: FuzzyMatcherOptions = {}) {
    this.normalizer = options.normalizer ?? normalize;
    this.metrics = options.metrics ?? DEFAULT_METRICS;
    this.combiner = new ScoreCombiner(this.metrics.map((m) => m.weight));
  }

  get metricNames(): string[] {
    return this.metrics.map((m) => m.name);
  }

  normalize(raw: string): string {
    return this.normalizer(raw);
  }

  similarity(query: string, candidate: string): number {
    return this.score(this.prepare(query), candidate);
  }

  explain(query: string, candidate: string): ScoreBreakdown {
    const normalizedQuery = this.normalizer(query);
    const normalizedCandidate = this.normalizer(candidate);
    const metrics: Record<string, number> = {};
    for (const { name, metric } of this.metrics) {
      metrics[name] = metric(normalizedQuery, normalizedCandidate);
    }
    return {
      query,
      candidate,
      normalizedQuery,
      normalizedCandidate,
      metrics,
      score: this.similarity(query, candidate),
    };
  }

  /**
   * Returns the highest-scoring candidate at or above `threshold`. Ties keep the
   * candidate seen first.
   */
  bestMatch(query: string, candidates: readonly string[], threshold: number): MatchCandidate | undefined {
    if (!query || candidates.length === 0) return undefined;

    const prepared = this.prepare(query);
    let best: MatchCandidate | undefined;
    for (const candidate of candidates) {
      const score = this.score(prepared, candidate);
      if (score < threshold) continue;
      if (!best || score > best.score) {
        best = { candidate, score };
      }
    }
    return best;
  }

  private prepare(query: string): PreparedQuery {
    return { key: normalizeKeyPart(query), normalized: this.normalizer(query) };
  }

  private score(query: PreparedQuery, candidate: string): number {
    if (query.key && query.key === normalizeKeyPart(candidate)) return 1;

    const normalizedCandidate = this.normalizer(candidate);
    if (!query.normalized || !normalizedCandidate) return 0;
    if (query.normalized === normalizedCandidate) return 1;

    const scores = this.metrics.map(({ metric }) => metric(query.normalized, normalizedCandidate));
    return this.combiner.combine(scores);
  }
}
