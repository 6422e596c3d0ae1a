/**
 * Feature Table Builder
 *
 * Runs the rolling, context and target passes over the delivery stream
 * and joins them into one row per delivery. Deliveries without a next
 * ball (last of each innings) are dropped.
 */

import type { PipelineConfig } from "../../config/pipeline-config";
import type { DeliveryRecord, FeatureRow } from "../../types";
import { compareDeliveryOrder } from "./group-fold";
import { computeInningsContext } from "./match-context";
import { computeBattingRolling, computeBowlingRolling } from "./rolling-features";
import { generateNextBallTargets } from "./targets";

export function buildFeatureTable(
	deliveries: readonly DeliveryRecord[],
	config: PipelineConfig,
): FeatureRow[] {
	const batting = computeBattingRolling(deliveries, config.windowSize);
	const bowling = computeBowlingRolling(deliveries, config.windowSize);
	const context = computeInningsContext(deliveries, config);
	const targets = generateNextBallTargets(deliveries);

	const rows: FeatureRow[] = [];
	deliveries.forEach((delivery, index) => {
		const target = targets[index];
		if (!target) return;
		rows.push({
			...delivery,
			...batting[index],
			...bowling[index],
			...context[index],
			...target,
		});
	});

	return rows.sort(compareDeliveryOrder);
}
