/**
 * Ordered Group Fold
 *
 * Shared primitive for the feature stage: partition records by a key,
 * order each partition, then walk it once with fresh state.
 * Results come back aligned with the input array.
 */

import type { DeliveryRecord } from "../../types";

export interface OrderedGroupFold<TRecord, TState, TResult> {
	/** Partition key; null leaves the record out of every group */
	groupKey: (record: TRecord) => string | null;
	compare: (a: TRecord, b: TRecord) => number;
	/** Fresh state for a group, given its ordered records */
	init: (group: readonly TRecord[]) => TState;
	step: (
		state: TState,
		record: TRecord,
		position: number,
		group: readonly TRecord[],
	) => TResult;
}

/**
 * Run a fold over every group
 *
 * @returns One entry per input record (same index); null for records
 * without a group
 */
export function foldOrderedGroups<TRecord, TState, TResult>(
	records: readonly TRecord[],
	fold: OrderedGroupFold<TRecord, TState, TResult>,
): Array<TResult | null> {
	const groups = new Map<string, number[]>();
	records.forEach((record, index) => {
		const key = fold.groupKey(record);
		if (key === null) return;
		const indices = groups.get(key);
		if (indices) indices.push(index);
		else groups.set(key, [index]);
	});

	const results: Array<TResult | null> = records.map(() => null);

	for (const indices of groups.values()) {
		indices.sort((a, b) => fold.compare(records[a], records[b]) || a - b);
		const group = indices.map((index) => records[index]);
		const state = fold.init(group);
		group.forEach((record, position) => {
			results[indices[position]] = fold.step(state, record, position, group);
		});
	}

	return results;
}

// ============================================================================
// DELIVERY ORDERING
// ============================================================================

const compareMatchIds = (a: string, b: string) =>
	a.localeCompare(b, "en", { numeric: true });

/**
 * Match id, then innings, then position within the innings
 */
export const compareDeliveryOrder = (a: DeliveryRecord, b: DeliveryRecord): number =>
	compareMatchIds(a.matchId, b.matchId) ||
	a.innings - b.innings ||
	a.sequence - b.sequence;

export const inningsGroupKey = (record: DeliveryRecord): string =>
	`${record.matchId}|${record.innings}`;
