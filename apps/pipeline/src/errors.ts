import type { MatchId } from "@crease/shared-types";

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Match file is unreadable or lacks its `info` / `innings` sections
 */
export class MalformedRecordError extends Error {
	public readonly code = "MALFORMED_RECORD";
	public readonly matchId: MatchId;
	public readonly issues: string[];

	constructor(message: string, matchId: MatchId, issues: string[] = []) {
		super(message);
		this.name = "MalformedRecordError";
		this.matchId = matchId;
		this.issues = issues;
	}
}

/**
 * Match id the record source does not know about
 */
export class RecordNotFoundError extends Error {
	public readonly code = "NOT_FOUND";
	public readonly matchId: MatchId;

	constructor(message: string, matchId: MatchId) {
		super(message);
		this.name = "RecordNotFoundError";
		this.matchId = matchId;
	}
}

export class ConfigError extends Error {
	public readonly code = "INVALID_CONFIG";

	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Raised only when the whole batch is empty: no match discovered,
 * or no row produced across all matches.
 */
export class EmptyBatchError extends Error {
	public readonly code: "EMPTY_INPUT" | "EMPTY_OUTPUT";

	constructor(message: string, code: "EMPTY_INPUT" | "EMPTY_OUTPUT") {
		super(message);
		this.name = "EmptyBatchError";
		this.code = code;
	}
}

export const isMatchError = (
	error: unknown,
): error is MalformedRecordError | RecordNotFoundError =>
	error instanceof MalformedRecordError || error instanceof RecordNotFoundError;
