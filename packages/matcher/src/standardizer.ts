import { Status, type RegistryStatistics, type ThresholdSettings } from "@team-standardizer/shared";
import type { MatchDecision, StandardizationResult } from "./decision.js";
import { ConfigurationError } from "./errors.js";
import { FuzzyMatcher } from "./fuzzy-matcher.js";
import { Registry, SessionLog, type CanonicalEntry } from "./registry.js";
import { isBlank, normalizeKeyPart } from "./team-name-utils.js";

export const DEFAULT_MATCH_THRESHOLD = 0.75;
export const DEFAULT_AUTO_ADD_THRESHOLD = 0.7;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface StandardizerOptions extends Partial<ThresholdSettings> {
  matcher?: FuzzyMatcher;
  logger?: Logger;
}

export interface StandardizeOptions {
  autoAdd?: boolean;
}

export interface AddTeamOptions {
  /** Add even when a similar (but not identical) name already exists. */
  force?: boolean;
}

export type AddTeamResult =
  | { added: true; entry: CanonicalEntry }
  | { added: false; reason: "empty" }
  | { added: false; reason: "duplicate"; existing: string }
  | { added: false; reason: "similar"; existing: string; score: number };

/**
 * Both thresholds must lie in [0, 1] and the auto-add threshold may not exceed
 * the matching threshold; names scoring between the two are neither matched
 * nor added.
 */
export function validateThresholds({ matchThreshold, autoAddThreshold }: ThresholdSettings): ThresholdSettings {
  for (const [label, value] of [
    ["Matching threshold", matchThreshold],
    ["Auto-add threshold", autoAddThreshold],
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError({
        code: "INVALID_THRESHOLD",
        message: `${label} must be between 0 and 1, got ${value}`,
      });
    }
  }
  if (autoAddThreshold > matchThreshold) {
    throw new ConfigurationError({
      code: "THRESHOLD_ORDER",
      message: `Auto-add threshold (${autoAddThreshold}) must not exceed matching threshold (${matchThreshold})`,
    });
  }
  return { matchThreshold, autoAddThreshold };
}

const formatScore = (score: number) => score.toFixed(3);

export class TeamStandardizer {
  readonly registry: Registry;
  readonly sessionLog = new SessionLog();
  readonly matcher: FuzzyMatcher;
  private readonly logger: Logger;
  private settings: ThresholdSettings;

  constructor(registry: Registry = new Registry(), options: StandardizerOptions = {}) {
    this.registry = registry;
    this.matcher = options.matcher ?? new FuzzyMatcher();
    this.logger = options.logger ?? console;
    this.settings = validateThresholds({
      matchThreshold: options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD,
      autoAddThreshold: options.autoAddThreshold ?? DEFAULT_AUTO_ADD_THRESHOLD,
    });
  }

  get thresholds(): ThresholdSettings {
    return { ...this.settings };
  }

  updateThresholds(updates: Partial<ThresholdSettings>): ThresholdSettings {
    this.settings = validateThresholds({ ...this.settings, ...updates });
    this.logger.info(
      `Updated thresholds - match: ${this.settings.matchThreshold.toFixed(2)}, auto-add: ${this.settings.autoAddThreshold.toFixed(2)}`,
    );
    return this.thresholds;
  }

  standardize(rawName: string, category: string, options: StandardizeOptions = {}): StandardizationResult {
    const autoAdd = options.autoAdd ?? true;
    if (isBlank(rawName)) {
      return { name: "", decision: { status: Status.Empty, score: 0 } };
    }

    const name = rawName.trim();
    const exact = this.registry.findExact(category, name);
    if (exact !== undefined) {
      return { name: exact, decision: { status: Status.ExactMatch, score: 1, matchedName: exact } };
    }

    const candidates = this.registry.lookup(category);
    const match = this.matcher.bestMatch(name, candidates, this.settings.matchThreshold);
    if (match) {
      this.logger.info(`Fuzzy matched '${name}' -> '${match.candidate}' (score: ${formatScore(match.score)})`);
      return {
        name: match.candidate,
        decision: { status: Status.FuzzyMatch, score: match.score, matchedName: match.candidate },
      };
    }

    const nearest = this.matcher.bestMatch(name, candidates, 0);
    const bestExistingScore = nearest?.score ?? 0;
    // A candidate that shares nothing with the name is not "nearest"
    const bestExistingName = nearest && nearest.score > 0 ? nearest.candidate : null;

    if (autoAdd && bestExistingScore < this.settings.autoAddThreshold) {
      const entry = this.registry.add(category, name);
      this.sessionLog.record(entry);
      this.logger.info(
        `Auto-added new team: ${entry.category}/${entry.name} (best existing similarity: ${formatScore(bestExistingScore)})`,
      );
      return {
        name,
        decision: { status: Status.AutoAdded, score: bestExistingScore, bestExistingScore, bestExistingName },
      };
    }

    if (autoAdd) {
      this.logger.info(
        `No auto-add for '${name}' (best similarity: ${formatScore(bestExistingScore)} >= threshold: ${this.settings.autoAddThreshold})`,
      );
    }
    return {
      name,
      decision: {
        status: Status.NoMatchNoAdd,
        score: bestExistingScore,
        bestExistingScore,
        bestExistingName,
        autoAddThreshold: this.settings.autoAddThreshold,
      },
    };
  }

  addTeam(rawName: string, category: string, options: AddTeamOptions = {}): AddTeamResult {
    if (isBlank(rawName)) {
      this.logger.error("Team name cannot be empty");
      return { added: false, reason: "empty" };
    }

    const name = rawName.trim();
    const existing = this.registry.findExact(category, name);
    if (existing !== undefined) {
      this.logger.warn(`Team '${name}' already exists in ${normalizeKeyPart(category)}`);
      return { added: false, reason: "duplicate", existing };
    }

    if (!options.force) {
      const similar = this.matcher.bestMatch(name, this.registry.lookup(category), this.settings.matchThreshold);
      if (similar) {
        this.logger.warn(`Similar team exists: '${similar.candidate}' (similarity: ${formatScore(similar.score)})`);
        return { added: false, reason: "similar", existing: similar.candidate, score: similar.score };
      }
    }

    const entry = this.registry.add(category, name);
    this.sessionLog.record(entry);
    this.logger.info(`Manually added team: ${entry.category}/${entry.name}`);
    return { added: true, entry };
  }

  statistics(): RegistryStatistics {
    const sports: Record<string, number> = {};
    let emptyNames = 0;
    for (const entry of this.registry.entries) {
      if (isBlank(entry.name)) {
        emptyNames++;
        continue;
      }
      const key = normalizeKeyPart(entry.category) || "unknown";
      sports[key] = (sports[key] ?? 0) + 1;
    }
    return {
      totalTeams: this.registry.size,
      sports,
      emptyNames,
      newlyAddedThisSession: this.sessionLog.size,
      configuration: this.thresholds,
    };
  }
}
