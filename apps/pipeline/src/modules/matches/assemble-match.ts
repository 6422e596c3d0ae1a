/**
 * Match Row Assembler
 *
 * Turns one validated match record into:
 * - one FlatRow per player per innings
 * - one InningsSummary per innings
 * - one DeliveryRecord per delivery (input of the feature stage)
 */

import {
	formatResultMargin,
	type Innings,
	isBowlerCreditedWicket,
	type MatchId,
	type MatchRecord,
} from "@crease/shared-types";
import type {
	DeliveryRecord,
	Flag,
	FlatRow,
	InningsSummary,
	MatchAssembly,
	MatchMetadata,
	PlayerInningsStat,
} from "../../types";
import { toISODate } from "../../utils/date";
import { accumulateInnings, inningsDeliveries } from "../deliveries/accumulate-innings";
import { classifyDelivery } from "../deliveries/classify-delivery";

const toFlag = (value: boolean): Flag => (value ? 1 : 0);

// ============================================================================
// DERIVED RATIOS
// ============================================================================

/**
 * Runs per 100 balls; 0 when no ball was faced
 */
export const calculateStrikeRate = (runs: number, ballsFaced: number): number =>
	ballsFaced > 0 ? (runs / ballsFaced) * 100 : 0;

/**
 * Runs conceded per six legal balls; 0 when nothing was bowled
 */
export const calculateEconomy = (runsConceded: number, ballsBowled: number): number =>
	ballsBowled > 0 ? (runsConceded / ballsBowled) * 6 : 0;

// ============================================================================
// METADATA
// ============================================================================

export function extractMatchMetadata(matchId: MatchId, record: MatchRecord): MatchMetadata {
	const { info } = record;
	const [team1 = "", team2 = ""] = info.teams ?? [];

	return {
		matchId,
		date: toISODate(info.dates?.[0]),
		eventName: info.event?.name ?? "",
		matchNumber: info.event?.match_number ?? null,
		team1,
		team2,
		venue: info.venue ?? "",
		city: info.city ?? "",
		tossWinner: info.toss?.winner ?? "",
		tossDecision: info.toss?.decision ?? "",
		resultWinner: info.outcome?.winner ?? "",
		resultBy: formatResultMargin(info.outcome),
		playerOfMatch: (info.player_of_match ?? []).join(";"),
	};
}

// ============================================================================
// ROWS
// ============================================================================

export function buildFlatRow(
	metadata: MatchMetadata,
	innings: number,
	inningsTeam: string,
	stat: PlayerInningsStat,
): FlatRow {
	return {
		...metadata,
		innings,
		inningsTeam,
		player: stat.player,
		batRuns: stat.runs,
		batBallsFaced: stat.ballsFaced,
		batFours: stat.fours,
		batSixes: stat.sixes,
		batDismissal: stat.dismissal,
		batOutBy: stat.outBy,
		bowlRunsConceded: stat.runsConceded,
		bowlBallsBowled: stat.ballsBowled,
		bowlWickets: stat.wickets,
		bowlExtras: stat.extrasConceded,
		strikeRate: calculateStrikeRate(stat.runs, stat.ballsFaced),
		economy: calculateEconomy(stat.runsConceded, stat.ballsBowled),
		batBoundaryRate:
			stat.ballsFaced > 0 ? (stat.fours + stat.sixes) / stat.ballsFaced : 0,
		batIsOut: toFlag(stat.dismissal !== null),
		bowlOvers: stat.ballsBowled / 6,
		bowlStrikeRate: stat.wickets > 0 ? stat.ballsBowled / stat.wickets : null,
		isHomeTeam: toFlag(inningsTeam !== "" && inningsTeam === metadata.team1),
		tossWon: toFlag(inningsTeam !== "" && inningsTeam === metadata.tossWinner),
	};
}

/**
 * Flatten the deliveries of one innings with their position
 */
export function buildDeliveryRecords(
	matchId: MatchId,
	inningsNumber: number,
	innings: Innings,
): DeliveryRecord[] {
	const records: DeliveryRecord[] = [];
	const inningsTeam = innings.team ?? "";
	let sequence = 0;

	(innings.overs ?? []).forEach((over, overIndex) => {
		(over.deliveries ?? []).forEach((delivery, deliveryIndex) => {
			sequence += 1;
			const classified = classifyDelivery(delivery);
			const wickets = delivery.wickets ?? [];
			const firstWicket = wickets[0];

			records.push({
				matchId,
				innings: inningsNumber,
				inningsTeam,
				over: over.over ?? overIndex,
				ballInOver: deliveryIndex + 1,
				sequence,
				batter: delivery.batter ?? null,
				bowler: delivery.bowler ?? null,
				nonStriker: delivery.non_striker ?? null,
				batterRuns: classified.batterRuns,
				extrasRuns: classified.extrasRuns,
				totalRuns: classified.totalRuns,
				bowlerRuns: classified.bowlerRuns,
				isValidBall: toFlag(classified.isValidBall),
				wicketFlag: toFlag(wickets.length > 0),
				bowlerWicketFlag: toFlag(wickets.some((w) => isBowlerCreditedWicket(w.kind))),
				wicketKind: firstWicket?.kind ?? null,
				playerOut: firstWicket?.player_out ?? null,
			});
		});
	});

	return records;
}

export function summarizeInnings(
	matchId: MatchId,
	inningsNumber: number,
	innings: Innings,
	deliveries: DeliveryRecord[],
): InningsSummary {
	let totalScore = 0;
	let extras = 0;
	let wicketsLost = 0;
	let legalBalls = 0;

	for (const delivery of deliveries) {
		totalScore += delivery.totalRuns;
		extras += delivery.extrasRuns;
		legalBalls += delivery.isValidBall;
	}
	for (const delivery of inningsDeliveries(innings)) {
		wicketsLost += delivery.wickets?.length ?? 0;
	}

	return {
		matchId,
		innings: inningsNumber,
		team: innings.team ?? "",
		totalScore,
		wicketsLost,
		runsFromBat: totalScore - extras,
		extras,
		oversBowled: innings.overs?.length ?? 0,
		legalBalls,
	};
}

/**
 * Assemble every row one match contributes
 */
export function assembleMatch(matchId: MatchId, record: MatchRecord): MatchAssembly {
	const metadata = extractMatchMetadata(matchId, record);
	const assembly: MatchAssembly = { matchId, rows: [], innings: [], deliveries: [] };

	record.innings.forEach((innings, index) => {
		const inningsNumber = index + 1;
		const inningsTeam = innings.team ?? "";

		for (const stat of accumulateInnings(innings).values()) {
			assembly.rows.push(buildFlatRow(metadata, inningsNumber, inningsTeam, stat));
		}

		const deliveries = buildDeliveryRecords(matchId, inningsNumber, innings);
		assembly.innings.push(summarizeInnings(matchId, inningsNumber, innings, deliveries));
		assembly.deliveries.push(...deliveries);
	});

	return assembly;
}
