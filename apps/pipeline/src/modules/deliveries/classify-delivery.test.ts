/**
 * Tests for classify-delivery.ts
 */

import { describe, expect, it } from "vitest";
import { classifyDelivery } from "./classify-delivery";

describe("classifyDelivery", () => {
	it("should treat a plain delivery as a valid ball", () => {
		const result = classifyDelivery({
			batter: "A",
			bowler: "X",
			runs: { batter: 2, extras: 0, total: 2 },
		});

		expect(result).toEqual({
			isValidBall: true,
			extras: {},
			extrasRuns: 0,
			batterRuns: 2,
			totalRuns: 2,
			bowlerRuns: 2,
		});
	});

	it("should mark a wide as invalid and charge its run to the bowler", () => {
		const result = classifyDelivery({
			extras: { wides: 1 },
			runs: { total: 1 },
		});

		expect(result.isValidBall).toBe(false);
		expect(result.extrasRuns).toBe(1);
		expect(result.batterRuns).toBe(0);
		expect(result.bowlerRuns).toBe(1);
	});

	it("should count a zero-valued no-ball key as present", () => {
		const result = classifyDelivery({
			extras: { noballs: 0 },
			runs: { batter: 0, extras: 0, total: 0 },
		});

		expect(result.isValidBall).toBe(false);
	});

	it("should keep byes and leg-byes out of the bowler's runs", () => {
		const legbyes = classifyDelivery({
			extras: { legbyes: 2 },
			runs: { batter: 0, extras: 2, total: 2 },
		});
		const byes = classifyDelivery({
			extras: { byes: 4 },
			runs: { batter: 0, extras: 4, total: 4 },
		});

		expect(legbyes.isValidBall).toBe(true);
		expect(legbyes.bowlerRuns).toBe(0);
		expect(byes.isValidBall).toBe(true);
		expect(byes.bowlerRuns).toBe(0);
	});

	it("should charge no-ball penalty and bat runs to the bowler", () => {
		const result = classifyDelivery({
			extras: { noballs: 1 },
			runs: { batter: 4, extras: 1, total: 5 },
		});

		expect(result.isValidBall).toBe(false);
		expect(result.batterRuns).toBe(4);
		expect(result.bowlerRuns).toBe(5);
	});

	it("should read a missing runs object as all zero", () => {
		const result = classifyDelivery({ batter: "A", bowler: "X" });

		expect(result.isValidBall).toBe(true);
		expect(result.batterRuns).toBe(0);
		expect(result.totalRuns).toBe(0);
		expect(result.extrasRuns).toBe(0);
		expect(result.bowlerRuns).toBe(0);
	});

	it("should fall back to the extras breakdown when runs.extras is absent", () => {
		const result = classifyDelivery({
			extras: { wides: 2, penalty: 5 },
			runs: { total: 7 },
		});

		expect(result.extrasRuns).toBe(7);
		expect(result.extras).toEqual({ wides: 2, penalty: 5 });
	});
});
