import type { Delivery } from "@crease/shared-types";
import type { ClassifiedDelivery } from "../../types";

/**
 * Extra kinds that make a delivery illegal (not one of the six balls)
 */
const ILLEGAL_DELIVERY_EXTRAS = ["wides", "noballs"] as const;

/**
 * Extra kinds not charged to the bowler
 */
const FIELDING_EXTRAS = ["byes", "legbyes"] as const;

const toCount = (value: unknown): number =>
	typeof value === "number" && Number.isFinite(value) ? value : 0;

/**
 * Classify a single delivery
 *
 * A key present in the extras mapping counts even when its value is 0.
 * A missing `runs` object reads as all zero.
 */
export function classifyDelivery(delivery: Delivery): ClassifiedDelivery {
	const extras: Record<string, number> = {};
	for (const [kind, value] of Object.entries(delivery.extras ?? {})) {
		extras[kind] = toCount(value);
	}

	const isValidBall = !ILLEGAL_DELIVERY_EXTRAS.some((kind) => kind in extras);

	const runs = delivery.runs ?? {};
	const batterRuns = toCount(runs.batter);
	const totalRuns = toCount(runs.total);
	const extrasRuns =
		runs.extras !== undefined
			? toCount(runs.extras)
			: Object.values(extras).reduce((sum, value) => sum + value, 0);

	const fieldingExtras = FIELDING_EXTRAS.reduce(
		(sum, kind) => sum + (extras[kind] ?? 0),
		0,
	);

	return {
		isValidBall,
		extras,
		extrasRuns,
		batterRuns,
		totalRuns,
		bowlerRuns: totalRuns - fieldingExtras,
	};
}
