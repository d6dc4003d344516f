import { Status, type JsonObject, type WireMatchDecision } from "@team-standardizer/shared";

export type MatchDecision =
  | { status: typeof Status.Empty; score: 0 }
  | { status: typeof Status.ExactMatch; score: 1; matchedName: string }
  | { status: typeof Status.FuzzyMatch; score: number; matchedName: string }
  | {
      status: typeof Status.AutoAdded;
      score: number;
      bestExistingScore: number;
      bestExistingName: string | null;
    }
  | {
      status: typeof Status.NoMatchNoAdd;
      score: number;
      bestExistingScore: number;
      bestExistingName: string | null;
      autoAddThreshold: number;
    };

export interface StandardizationResult {
  name: string;
  decision: MatchDecision;
}

export function toWireDecision(decision: MatchDecision): WireMatchDecision {
  switch (decision.status) {
    case Status.Empty:
      return { status: decision.status, score: decision.score };
    case Status.ExactMatch:
    case Status.FuzzyMatch:
      return { status: decision.status, score: decision.score, matched_name: decision.matchedName };
    case Status.AutoAdded:
      return {
        status: decision.status,
        score: decision.score,
        best_existing_score: decision.bestExistingScore,
        best_existing_name: decision.bestExistingName,
      };
    case Status.NoMatchNoAdd:
      return {
        status: decision.status,
        score: decision.score,
        best_existing_score: decision.bestExistingScore,
        best_existing_name: decision.bestExistingName,
        auto_add_threshold: decision.autoAddThreshold,
      };
  }
}

export function wireDecisionToJson(details: WireMatchDecision): JsonObject {
  const json: JsonObject = { status: details.status, score: details.score };
  if (details.matched_name !== undefined) json.matched_name = details.matched_name;
  if (details.best_existing_score !== undefined) json.best_existing_score = details.best_existing_score;
  if (details.best_existing_name !== undefined) json.best_existing_name = details.best_existing_name;
  if (details.auto_add_threshold !== undefined) json.auto_add_threshold = details.auto_add_threshold;
  return json;
}
