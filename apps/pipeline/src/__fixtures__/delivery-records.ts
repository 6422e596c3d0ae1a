import type { DeliveryRecord } from "../types";

export function createDeliveryRecord(overrides: Partial<DeliveryRecord> = {}): DeliveryRecord {
	return {
		matchId: "1001",
		innings: 1,
		inningsTeam: "Hawks",
		over: 0,
		ballInOver: 1,
		sequence: 1,
		batter: "A",
		bowler: "X",
		nonStriker: "B",
		batterRuns: 0,
		extrasRuns: 0,
		totalRuns: 0,
		bowlerRuns: 0,
		isValidBall: 1,
		wicketFlag: 0,
		bowlerWicketFlag: 0,
		wicketKind: null,
		playerOut: null,
		...overrides,
	};
}

/**
 * Consecutive legal deliveries of one innings, six to an over,
 * with runs off the bat (no extras)
 */
export function createInningsRecords(
	runs: number[],
	overrides: Partial<DeliveryRecord> = {},
): DeliveryRecord[] {
	return runs.map((value, index) =>
		createDeliveryRecord({
			over: Math.floor(index / 6),
			ballInOver: (index % 6) + 1,
			sequence: index + 1,
			batterRuns: value,
			totalRuns: value,
			bowlerRuns: value,
			...overrides,
		}),
	);
}
