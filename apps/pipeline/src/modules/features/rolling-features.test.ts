/**
 * Tests for rolling-features.ts
 *
 * Windowed numerators with cumulative ball counts, per batter and per bowler.
 */

import { describe, expect, it } from "vitest";
import { createDeliveryRecord, createInningsRecords } from "../../__fixtures__/delivery-records";
import {
	computeBattingRolling,
	computeBowlingRolling,
	computeRollingStats,
	isBoundary,
	isDotBall,
} from "./rolling-features";

describe("computeBattingRolling", () => {
	it("should give the first ball a strike rate of its runs × 100", () => {
		const [first] = computeBattingRolling(createInningsRecords([3]), 12);

		expect(first.rollingRuns).toBe(3);
		expect(first.rollingBalls).toBe(1);
		expect(first.rollingStrikeRate).toBe(300);
	});

	it("should window the runs but count every ball faced", () => {
		const features = computeBattingRolling(createInningsRecords([4, 0, 6, 1]), 2);

		expect(features).toEqual([
			{ rollingRuns: 4, rollingBalls: 1, rollingStrikeRate: 400, boundaryRate: 1, dotRate: 0 },
			{ rollingRuns: 4, rollingBalls: 2, rollingStrikeRate: 200, boundaryRate: 0.5, dotRate: 0.5 },
			{ rollingRuns: 6, rollingBalls: 3, rollingStrikeRate: 200, boundaryRate: 0.5, dotRate: 0.5 },
			{ rollingRuns: 7, rollingBalls: 4, rollingStrikeRate: 175, boundaryRate: 0.5, dotRate: 0 },
		]);
	});

	it("should carry a batter's history across matches in match order", () => {
		const records = [
			createDeliveryRecord({ matchId: "10", batterRuns: 6 }),
			createDeliveryRecord({ matchId: "2", batterRuns: 1 }),
		];

		const [later, earlier] = computeBattingRolling(records, 12);

		expect(earlier.rollingBalls).toBe(1);
		expect(earlier.rollingStrikeRate).toBe(100);
		expect(later.rollingRuns).toBe(7);
		expect(later.rollingBalls).toBe(2);
		expect(later.rollingStrikeRate).toBe(350);
	});

	it("should keep batters independent", () => {
		const records = [
			createDeliveryRecord({ batter: "A", sequence: 1, batterRuns: 4 }),
			createDeliveryRecord({ batter: "B", sequence: 2, batterRuns: 0 }),
			createDeliveryRecord({ batter: "A", sequence: 3, batterRuns: 2 }),
		];

		const features = computeBattingRolling(records, 12);

		expect(features.map((f) => f.rollingBalls)).toEqual([1, 1, 2]);
		expect(features[1].rollingStrikeRate).toBe(0);
		expect(features[2].rollingRuns).toBe(6);
	});

	it("should leave deliveries without a batter empty", () => {
		const [feature] = computeBattingRolling([createDeliveryRecord({ batter: null })], 12);

		expect(feature).toEqual({
			rollingRuns: null,
			rollingBalls: null,
			rollingStrikeRate: null,
			boundaryRate: null,
			dotRate: null,
		});
	});
});

describe("computeBowlingRolling", () => {
	it("should roll runs conceded and bowler-credited wickets", () => {
		const records = [
			createDeliveryRecord({ sequence: 1, bowlerRuns: 1 }),
			createDeliveryRecord({ sequence: 2, bowlerRuns: 0, wicketFlag: 1, bowlerWicketFlag: 1 }),
			createDeliveryRecord({ sequence: 3, bowler: "Y", bowlerRuns: 4 }),
		];

		const features = computeBowlingRolling(records, 12);

		expect(features[1]).toEqual({
			bowlRollingRunsConceded: 1,
			bowlRollingBalls: 2,
			bowlEconomy: 3,
			bowlWicketRate: 0.5,
		});
		expect(features[2]).toEqual({
			bowlRollingRunsConceded: 4,
			bowlRollingBalls: 1,
			bowlEconomy: 24,
			bowlWicketRate: 0,
		});
	});
});

describe("computeRollingStats", () => {
	it("should roll any value and indicator set by any key", () => {
		const records = [
			{ team: "A", order: 1, value: 10 },
			{ team: "A", order: 2, value: 20 },
			{ team: "A", order: 3, value: 30 },
		];

		const stats = computeRollingStats(records, {
			groupBy: (record) => record.team,
			compare: (a, b) => a.order - b.order,
			value: (record) => record.value,
			indicators: [(record) => record.value > 15],
			windowSize: 2,
		});

		expect(stats[2]).toEqual({ windowSum: 50, count: 3, indicatorMeans: [1] });
	});
});

describe("indicators", () => {
	it("should flag boundaries only for 4 and 6", () => {
		expect([0, 1, 4, 5, 6].map((runs) => isBoundary(createDeliveryRecord({ batterRuns: runs })))).toEqual([
			false,
			false,
			true,
			false,
			true,
		]);
	});

	it("should flag dot balls on zero bat runs", () => {
		expect(isDotBall(createDeliveryRecord({ batterRuns: 0 }))).toBe(true);
		expect(isDotBall(createDeliveryRecord({ batterRuns: 1 }))).toBe(false);
	});
});
