/**
 * Pipeline Types
 *
 * Row shapes produced by the aggregation stage (player-innings rows,
 * innings summaries, delivery records) and consumed by the feature stage.
 */

import type { MatchId } from "@crease/shared-types";

// ============================================================================
// DELIVERIES
// ============================================================================

/**
 * Outcome of classifying one delivery
 */
export interface ClassifiedDelivery {
	/** False when the delivery carries a wide or no-ball */
	isValidBall: boolean;
	extras: Record<string, number>;
	/** Sum of all extras on the delivery */
	extrasRuns: number;
	batterRuns: number;
	totalRuns: number;
	/** total − byes − legbyes */
	bowlerRuns: number;
}

/** 0/1 indicator as written to the feature table */
export type Flag = 0 | 1;

/**
 * One delivery flattened with its position inside the innings
 */
export interface DeliveryRecord {
	matchId: MatchId;
	innings: number;
	inningsTeam: string;
	/** Over index as recorded (0-based) */
	over: number;
	/** 1-based position of the delivery inside its over record */
	ballInOver: number;
	/** 1-based position of the delivery inside the innings */
	sequence: number;
	batter: string | null;
	bowler: string | null;
	nonStriker: string | null;
	batterRuns: number;
	extrasRuns: number;
	totalRuns: number;
	bowlerRuns: number;
	isValidBall: Flag;
	wicketFlag: Flag;
	bowlerWicketFlag: Flag;
	wicketKind: string | null;
	playerOut: string | null;
}

// ============================================================================
// PLAYER INNINGS
// ============================================================================

/**
 * Batting + bowling accumulator for one player in one innings
 */
export interface PlayerInningsStat {
	player: string;
	runs: number;
	ballsFaced: number;
	fours: number;
	sixes: number;
	dismissal: string | null;
	outBy: string | null;
	runsConceded: number;
	ballsBowled: number;
	wickets: number;
	extrasConceded: number;
}

/**
 * Metadata shared by every row of a match
 */
export interface MatchMetadata {
	matchId: MatchId;
	date: string | null;
	eventName: string;
	matchNumber: number | null;
	team1: string;
	team2: string;
	venue: string;
	city: string;
	tossWinner: string;
	tossDecision: string;
	resultWinner: string;
	resultBy: string | null;
	playerOfMatch: string;
}

/**
 * One player's batting and bowling record for one innings
 */
export interface FlatRow extends MatchMetadata {
	innings: number;
	inningsTeam: string;
	player: string;
	batRuns: number;
	batBallsFaced: number;
	batFours: number;
	batSixes: number;
	batDismissal: string | null;
	batOutBy: string | null;
	bowlRunsConceded: number;
	bowlBallsBowled: number;
	bowlWickets: number;
	bowlExtras: number;
	strikeRate: number;
	economy: number;
	batBoundaryRate: number;
	batIsOut: Flag;
	bowlOvers: number;
	/** Balls per wicket; null when no wicket was taken */
	bowlStrikeRate: number | null;
	isHomeTeam: Flag;
	tossWon: Flag;
}

/**
 * Team totals for one innings
 */
export interface InningsSummary {
	matchId: MatchId;
	innings: number;
	team: string;
	totalScore: number;
	wicketsLost: number;
	runsFromBat: number;
	extras: number;
	oversBowled: number;
	legalBalls: number;
}

/**
 * Everything one match contributes to the batch
 */
export interface MatchAssembly {
	matchId: MatchId;
	rows: FlatRow[];
	innings: InningsSummary[];
	deliveries: DeliveryRecord[];
}

// ============================================================================
// FEATURES
// ============================================================================

export type MatchPhase = "powerplay" | "middle" | "death";

export interface BattingRollingFeatures {
	rollingRuns: number | null;
	rollingBalls: number | null;
	rollingStrikeRate: number | null;
	boundaryRate: number | null;
	dotRate: number | null;
}

export interface BowlingRollingFeatures {
	bowlRollingRunsConceded: number | null;
	bowlRollingBalls: number | null;
	bowlEconomy: number | null;
	bowlWicketRate: number | null;
}

export interface InningsContextFeatures {
	cumulativeRuns: number;
	cumulativeWickets: number;
	wicketsInHand: number;
	/** Null when no balls remain or the innings is not gated in */
	requiredRunRate: number | null;
	phase: MatchPhase;
	phaseWeight: number;
	pressureIndex: number;
}

export interface NextBallTargets {
	nextBallRuns: number;
	nextBallWicket: Flag;
}

export type FeatureRow = DeliveryRecord &
	BattingRollingFeatures &
	BowlingRollingFeatures &
	InningsContextFeatures &
	NextBallTargets;
