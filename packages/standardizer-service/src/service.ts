import {
  DocumentProcessor,
  Registry,
  TeamStandardizer,
  type AddTeamResult,
  type CanonicalEntry,
  type Logger,
  type ProcessResult,
  type StandardizationResult,
} from "@team-standardizer/matcher";
import type { JsonValue, RegistryStatistics, ThresholdSettings } from "@team-standardizer/shared";
import type { SnapshotStoreConfig } from "./config.js";
import { FileSnapshotStore } from "./file-store.js";
import { searchTeams, type TeamSearchResult } from "./search.js";
import type { SaveReceipt, SnapshotStore } from "./snapshot-store.js";
import { SqliteSnapshotStore } from "./sqlite-store.js";

export function createSnapshotStore(config: SnapshotStoreConfig): SnapshotStore {
  switch (config.kind) {
    case "file":
      return new FileSnapshotStore(config.path, { backupOnSave: config.backupOnSave });
    case "sqlite":
      return new SqliteSnapshotStore(config.path);
  }
}

export interface ServiceOptions extends Partial<ThresholdSettings> {
  store: SnapshotStore;
  autoSave?: boolean;
  logger?: Logger;
}

export interface ProcessRequest {
  sport?: string;
  autoAdd?: boolean;
  autoSave?: boolean;
}

export interface ProcessOutcome extends ProcessResult {
  saved: SaveReceipt | null;
}

export interface AddOutcome {
  result: AddTeamResult;
  saved: SaveReceipt | null;
}

/**
 * Owns the registry and its persistence for one process. Engine calls are
 * synchronous; only loading and saving wait on the store.
 */
export class StandardizationService {
  readonly standardizer: TeamStandardizer;
  readonly store: SnapshotStore;
  private readonly processor: DocumentProcessor;
  readonly autoSave: boolean;
  private readonly logger: Logger;

  constructor(options: ServiceOptions) {
    this.store = options.store;
    this.autoSave = options.autoSave ?? true;
    this.logger = options.logger ?? console;
    this.standardizer = new TeamStandardizer(new Registry(), {
      matchThreshold: options.matchThreshold,
      autoAddThreshold: options.autoAddThreshold,
      logger: this.logger,
    });
    this.processor = new DocumentProcessor(this.standardizer);
  }

  /** Replaces the registry with the stored snapshot. A missing snapshot starts an empty registry. */
  async load(): Promise<number> {
    const records = await this.store.load();
    if (records === null) {
      this.logger.warn(`No snapshot at ${this.store.location}, starting with an empty registry`);
    }
    this.standardizer.registry.load(records ?? []);
    this.logger.info(`Loaded ${this.standardizer.registry.size} teams from ${this.store.location}`);
    return this.standardizer.registry.size;
  }

  async save(): Promise<SaveReceipt> {
    const receipt = await this.store.save(this.standardizer.registry.toSnapshot());
    this.logger.info(
      `Saved ${receipt.count} teams to ${receipt.location}${receipt.backupPath ? ` (backup: ${receipt.backupPath})` : ""}`,
    );
    return receipt;
  }

  standardize(name: string, sport: string, autoAdd = true): StandardizationResult {
    return this.standardizer.standardize(name, sport, { autoAdd });
  }

  /** Rewrites a document and saves the registry when the call changed a field or added a team. */
  async process(document: JsonValue, request: ProcessRequest = {}): Promise<ProcessOutcome> {
    const result = this.processor.process(document, { categoryOverride: request.sport, autoAdd: request.autoAdd });
    const shouldSave =
      (request.autoSave ?? this.autoSave) && (result.summary.changes_made || result.summary.new_teams_added > 0);
    const saved = shouldSave ? await this.save() : null;
    return { ...result, saved };
  }

  async addTeam(name: string, sport: string, force = false): Promise<AddOutcome> {
    const result = this.standardizer.addTeam(name, sport, { force });
    const saved = result.added && this.autoSave ? await this.save() : null;
    return { result, saved };
  }

  /** Canonical names per category, sorted. */
  teamsByCategory(): Record<string, string[]> {
    const registry = this.standardizer.registry;
    const teams: Record<string, string[]> = {};
    for (const category of [...registry.categories()].sort()) {
      teams[category] = this.teamsFor(category);
    }
    return teams;
  }

  teamsFor(sport: string): string[] {
    return [...this.standardizer.registry.lookup(sport)].sort((a, b) => a.localeCompare(b));
  }

  search(sport: string, query: string): TeamSearchResult[] {
    return searchTeams(this.standardizer.registry.lookup(sport), query, (raw) => this.standardizer.matcher.normalize(raw));
  }

  newlyAdded(): CanonicalEntry[] {
    return this.standardizer.sessionLog.entries();
  }

  clearNewlyAdded(): number {
    const cleared = this.standardizer.sessionLog.size;
    this.standardizer.sessionLog.reset();
    return cleared;
  }

  statistics(): RegistryStatistics {
    return this.standardizer.statistics();
  }

  updateThresholds(updates: Partial<ThresholdSettings>): ThresholdSettings {
    return this.standardizer.updateThresholds(updates);
  }

  close(): void {
    this.store.close?.();
  }
}
