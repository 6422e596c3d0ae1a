/**
 * Next-ball Targets
 *
 * Shift within each (match, innings) group: every delivery gets the
 * following delivery's runs and wicket flag. The last delivery of a
 * group gets none.
 */

import type { DeliveryRecord, NextBallTargets } from "../../types";
import { compareDeliveryOrder, foldOrderedGroups, inningsGroupKey } from "./group-fold";

export function generateNextBallTargets(
	records: readonly DeliveryRecord[],
): Array<NextBallTargets | null> {
	return foldOrderedGroups<DeliveryRecord, null, NextBallTargets | null>(records, {
		groupKey: inningsGroupKey,
		compare: compareDeliveryOrder,
		init: () => null,
		step: (_state, _record, position, group) => {
			const next = group[position + 1];
			if (!next) return null;
			return {
				nextBallRuns: next.batterRuns,
				nextBallWicket: next.wicketFlag,
			};
		},
	});
}
