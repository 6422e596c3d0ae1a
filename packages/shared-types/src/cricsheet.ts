/**
 * Ball-by-ball match record types
 *
 * Shape of one match file: `info` metadata plus ordered innings,
 * each holding ordered overs of deliveries.
 */

export type ExtraKind = "wides" | "noballs" | "byes" | "legbyes" | "penalty";

export type DeliveryExtras = Partial<Record<ExtraKind, number>>;

export type WicketKind =
	| "bowled"
	| "caught"
	| "caught and bowled"
	| "lbw"
	| "stumped"
	| "hit wicket"
	| "run out"
	| "retired hurt"
	| "retired out"
	| "retired not out"
	| "obstructing the field"
	| "handled the ball"
	| "hit the ball twice"
	| "timed out";

export interface Fielder {
	name?: string;
	substitute?: boolean;
}

export interface WicketEvent {
	kind: string;
	player_out: string;
	fielders?: Fielder[];
}

export interface DeliveryRuns {
	batter: number;
	extras: number;
	total: number;
	non_boundary?: boolean;
}

export interface Delivery {
	batter?: string;
	bowler?: string;
	non_striker?: string;
	runs?: Partial<DeliveryRuns>;
	extras?: DeliveryExtras;
	wickets?: WicketEvent[];
}

export interface Over {
	over?: number;
	deliveries?: Delivery[];
}

export interface Innings {
	team?: string;
	overs?: Over[];
}

export interface MatchOutcome {
	winner?: string;
	result?: string;
	method?: string;
	by?: {
		runs?: number;
		wickets?: number;
		innings?: number;
	};
}

export interface MatchInfo {
	dates?: string[];
	event?: {
		name?: string;
		match_number?: number;
		stage?: string;
	};
	teams?: string[];
	venue?: string;
	city?: string;
	gender?: string;
	match_type?: string;
	overs?: number;
	toss?: {
		winner?: string;
		decision?: string;
	};
	outcome?: MatchOutcome;
	player_of_match?: string[];
}

export interface MatchRecord {
	meta?: {
		data_version?: string;
		created?: string;
		revision?: number;
	};
	info: MatchInfo;
	innings: Innings[];
}

/** Identifier of one match file (its base name without extension). */
export type MatchId = string;

/**
 * Wicket kinds credited to the bowler.
 * Run-outs, retirements and the rarer field offences are not.
 */
export const BOWLER_CREDITED_WICKETS: ReadonlySet<string> = new Set<WicketKind>([
	"bowled",
	"caught",
	"caught and bowled",
	"lbw",
	"stumped",
	"hit wicket",
]);

export const isBowlerCreditedWicket = (kind: string): boolean =>
	BOWLER_CREDITED_WICKETS.has(kind);

/**
 * Format a result margin as "<n> runs" / "<n> wickets".
 * Returns null when the outcome carries no margin (tie, no result).
 */
export function formatResultMargin(outcome?: MatchOutcome): string | null {
	const by = outcome?.by;
	if (!by) return null;
	if (typeof by.runs === "number") {
		return by.innings ? `innings and ${by.runs} runs` : `${by.runs} runs`;
	}
	if (typeof by.wickets === "number") return `${by.wickets} wickets`;
	return null;
}
