export type MatchStatus = "exact_match" | "fuzzy_match" | "auto_added" | "no_match_no_add" | "empty";

export const Status = {
	Empty: "empty",
	ExactMatch: "exact_match",
	FuzzyMatch: "fuzzy_match",
	AutoAdded: "auto_added",
	NoMatchNoAdd: "no_match_no_add",
} as const satisfies Record<string, MatchStatus>;

// One record of the persisted registry. Field names are fixed by existing data files.
export interface SnapshotRecord {
	sport: string;
	canonical_team_name: string;
}

// snake_case form of a match decision, as embedded in processed documents and API replies
export interface WireMatchDecision {
	status: MatchStatus;
	score: number;
	matched_name?: string;
	best_existing_score?: number;
	best_existing_name?: string | null;
	auto_add_threshold?: number;
}

export interface ProcessingSummary {
	teams_processed: number;
	changes_made: boolean;
	new_teams_added: number;
}

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface ThresholdSettings {
	matchThreshold: number;
	autoAddThreshold: number;
}

export interface RegistryStatistics {
	totalTeams: number;
	sports: Record<string, number>;
	emptyNames: number;
	newlyAddedThisSession: number;
	configuration: ThresholdSettings;
}

export interface ApiResponse<T> {
	success: boolean;
	data?: T;
	error?: string;
	message?: string;
}
