/**
 * Player Innings Accumulator
 *
 * Single pass over an innings' deliveries building one batting + bowling
 * record per player. A fresh map is returned on every call; nothing
 * survives between innings.
 */

import { type Delivery, type Innings, isBowlerCreditedWicket } from "@crease/shared-types";
import type { ClassifiedDelivery, PlayerInningsStat } from "../../types";
import { classifyDelivery } from "./classify-delivery";

/**
 * Empty record for a player not yet touched in the innings
 */
export function createPlayerInningsStat(player: string): PlayerInningsStat {
	return {
		player,
		runs: 0,
		ballsFaced: 0,
		fours: 0,
		sixes: 0,
		dismissal: null,
		outBy: null,
		runsConceded: 0,
		ballsBowled: 0,
		wickets: 0,
		extrasConceded: 0,
	};
}

/**
 * Deliveries of an innings in bowling order
 */
export function* inningsDeliveries(innings: Innings): Generator<Delivery> {
	for (const over of innings.overs ?? []) {
		for (const delivery of over.deliveries ?? []) {
			yield delivery;
		}
	}
}

function applyBatting(
	stat: PlayerInningsStat,
	delivery: Delivery,
	classified: ClassifiedDelivery,
) {
	stat.runs += classified.batterRuns;
	if (classified.isValidBall) stat.ballsFaced += 1;
	if (classified.batterRuns === 4) stat.fours += 1;
	else if (classified.batterRuns === 6) stat.sixes += 1;

	const wicket = delivery.wickets?.find((w) => w.player_out === stat.player);
	if (wicket) {
		stat.dismissal = wicket.kind;
		// No fielder listed: the bowler takes the credit
		stat.outBy = wicket.fielders?.[0]?.name ?? delivery.bowler ?? null;
	}
}

function applyBowling(
	stat: PlayerInningsStat,
	delivery: Delivery,
	classified: ClassifiedDelivery,
) {
	stat.runsConceded += classified.bowlerRuns;
	if (classified.isValidBall) stat.ballsBowled += 1;
	stat.extrasConceded += classified.extrasRuns;
	for (const wicket of delivery.wickets ?? []) {
		if (isBowlerCreditedWicket(wicket.kind)) stat.wickets += 1;
	}
}

/**
 * Accumulate per-player stats for one innings
 *
 * @returns Players keyed by name, in order of first appearance
 */
export function accumulateInnings(innings: Innings): Map<string, PlayerInningsStat> {
	const stats = new Map<string, PlayerInningsStat>();

	const touch = (player: string) => {
		let stat = stats.get(player);
		if (!stat) {
			stat = createPlayerInningsStat(player);
			stats.set(player, stat);
		}
		return stat;
	};

	for (const delivery of inningsDeliveries(innings)) {
		const classified = classifyDelivery(delivery);

		if (delivery.batter) {
			applyBatting(touch(delivery.batter), delivery, classified);
		}
		if (delivery.bowler) {
			applyBowling(touch(delivery.bowler), delivery, classified);
		}
	}

	return stats;
}
