/**
 * Rolling Feature Engine
 *
 * Per-player rolling statistics over the player's deliveries in
 * (match, innings, sequence) order. The value sum and indicator means
 * are windowed; the ball count is cumulative over the player's history.
 */

import type { BattingRollingFeatures, BowlingRollingFeatures, DeliveryRecord } from "../../types";
import { compareDeliveryOrder, foldOrderedGroups } from "./group-fold";
import { RollingWindow } from "./rolling-window";

// ============================================================================
// GENERIC ENGINE
// ============================================================================

export interface RollingSpec<TRecord> {
	groupBy: (record: TRecord) => string | null;
	compare: (a: TRecord, b: TRecord) => number;
	/** Value summed over the window */
	value: (record: TRecord) => number;
	/** Per-ball indicators averaged over the window */
	indicators: ReadonlyArray<(record: TRecord) => boolean>;
	windowSize: number;
}

export interface RollingStat {
	windowSum: number;
	/** Records seen so far in the group, current one included */
	count: number;
	/** Windowed means, aligned with `RollingSpec.indicators` */
	indicatorMeans: number[];
}

interface RollingState {
	values: RollingWindow;
	indicators: RollingWindow[];
	count: number;
}

export function computeRollingStats<TRecord>(
	records: readonly TRecord[],
	spec: RollingSpec<TRecord>,
): Array<RollingStat | null> {
	return foldOrderedGroups<TRecord, RollingState, RollingStat>(records, {
		groupKey: spec.groupBy,
		compare: spec.compare,
		init: () => ({
			values: new RollingWindow(spec.windowSize),
			indicators: spec.indicators.map(() => new RollingWindow(spec.windowSize)),
			count: 0,
		}),
		step: (state, record) => {
			state.count += 1;
			state.values.push(spec.value(record));
			spec.indicators.forEach((indicator, index) => {
				state.indicators[index].push(indicator(record) ? 1 : 0);
			});
			return {
				windowSum: state.values.sum,
				count: state.count,
				indicatorMeans: state.indicators.map((window) => window.mean),
			};
		},
	});
}

// ============================================================================
// BATTING
// ============================================================================

export const isBoundary = (record: DeliveryRecord) =>
	record.batterRuns === 4 || record.batterRuns === 6;

export const isDotBall = (record: DeliveryRecord) => record.batterRuns === 0;

const EMPTY_BATTING: BattingRollingFeatures = {
	rollingRuns: null,
	rollingBalls: null,
	rollingStrikeRate: null,
	boundaryRate: null,
	dotRate: null,
};

export function computeBattingRolling(
	records: readonly DeliveryRecord[],
	windowSize: number,
): BattingRollingFeatures[] {
	const stats = computeRollingStats(records, {
		groupBy: (record) => record.batter,
		compare: compareDeliveryOrder,
		value: (record) => record.batterRuns,
		indicators: [isBoundary, isDotBall],
		windowSize,
	});

	return stats.map((stat) => {
		if (!stat) return EMPTY_BATTING;
		const [boundaryRate, dotRate] = stat.indicatorMeans;
		return {
			rollingRuns: stat.windowSum,
			rollingBalls: stat.count,
			rollingStrikeRate: (stat.windowSum / stat.count) * 100,
			boundaryRate,
			dotRate,
		};
	});
}

// ============================================================================
// BOWLING
// ============================================================================

const EMPTY_BOWLING: BowlingRollingFeatures = {
	bowlRollingRunsConceded: null,
	bowlRollingBalls: null,
	bowlEconomy: null,
	bowlWicketRate: null,
};

export function computeBowlingRolling(
	records: readonly DeliveryRecord[],
	windowSize: number,
): BowlingRollingFeatures[] {
	const stats = computeRollingStats(records, {
		groupBy: (record) => record.bowler,
		compare: compareDeliveryOrder,
		value: (record) => record.bowlerRuns,
		indicators: [(record) => record.bowlerWicketFlag === 1],
		windowSize,
	});

	return stats.map((stat) => {
		if (!stat) return EMPTY_BOWLING;
		const [wicketRate] = stat.indicatorMeans;
		return {
			bowlRollingRunsConceded: stat.windowSum,
			bowlRollingBalls: stat.count,
			bowlEconomy: (stat.windowSum / stat.count) * 6,
			bowlWicketRate: wicketRate,
		};
	});
}
