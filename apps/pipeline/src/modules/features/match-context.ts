/**
 * Match Context Engine
 *
 * Running runs off the bat, wickets and chase pressure within each
 * (match, innings) group, walked in delivery order. Extras count
 * toward neither the running total nor the target.
 */

import type { PipelineConfig } from "../../config/pipeline-config";
import type { DeliveryRecord, InningsContextFeatures, MatchPhase } from "../../types";
import { compareDeliveryOrder, foldOrderedGroups, inningsGroupKey } from "./group-fold";

type ContextConfig = Pick<
	PipelineConfig,
	"oversPerInnings" | "ballsPerOver" | "wicketsPerInnings" | "phases" | "chaseOnlyRequiredRunRate"
>;

interface InningsContextState {
	target: number;
	cumulativeRuns: number;
	cumulativeWickets: number;
}

/**
 * Phase of an over given its 0-based index
 */
export function classifyPhase(over: number, phases: ContextConfig["phases"]): MatchPhase {
	const overNumber = over + 1;
	if (overNumber <= phases.powerplayEnd) return "powerplay";
	if (overNumber <= phases.middleEnd) return "middle";
	return "death";
}

/**
 * Runs per over needed from the balls left
 *
 * @returns null when no ball remains
 */
export function calculateRequiredRunRate(
	target: number,
	cumulativeRuns: number,
	remainingBalls: number,
	ballsPerOver: number,
): number | null {
	if (remainingBalls <= 0) return null;
	return ((target - cumulativeRuns) * ballsPerOver) / remainingBalls;
}

/**
 * RRR (absent counts as 0) scaled by phase weight, divided by wickets in hand + 1
 */
export function calculatePressureIndex(
	requiredRunRate: number | null,
	phaseWeight: number,
	wicketsInHand: number,
): number {
	return ((requiredRunRate ?? 0) * phaseWeight) / (Math.max(wicketsInHand, 0) + 1);
}

export function computeInningsContext(
	records: readonly DeliveryRecord[],
	config: ContextConfig,
): InningsContextFeatures[] {
	const inningsBalls = config.oversPerInnings * config.ballsPerOver;

	const results = foldOrderedGroups<DeliveryRecord, InningsContextState, InningsContextFeatures>(
		records,
		{
			groupKey: inningsGroupKey,
			compare: compareDeliveryOrder,
			init: (group) => ({
				// Target = the innings' runs off the bat + 1
				target: group.reduce((sum, record) => sum + record.batterRuns, 0) + 1,
				cumulativeRuns: 0,
				cumulativeWickets: 0,
			}),
			step: (state, record) => {
				state.cumulativeRuns += record.batterRuns;
				state.cumulativeWickets += record.wicketFlag;

				const wicketsInHand = config.wicketsPerInnings - state.cumulativeWickets;
				const remainingBalls =
					inningsBalls - (record.over * config.ballsPerOver + record.ballInOver);
				const gatedOut = config.chaseOnlyRequiredRunRate && record.innings !== 2;
				const requiredRunRate = gatedOut
					? null
					: calculateRequiredRunRate(
							state.target,
							state.cumulativeRuns,
							remainingBalls,
							config.ballsPerOver,
						);

				const phase = classifyPhase(record.over, config.phases);
				const phaseWeight = config.phases.weights[phase];

				return {
					cumulativeRuns: state.cumulativeRuns,
					cumulativeWickets: state.cumulativeWickets,
					wicketsInHand,
					requiredRunRate,
					phase,
					phaseWeight,
					pressureIndex: calculatePressureIndex(requiredRunRate, phaseWeight, wicketsInHand),
				};
			},
		},
	);

	return results.map((result, index) => {
		if (result) return result;
		throw new Error(`Delivery ${index} was not assigned to an innings group`);
	});
}
