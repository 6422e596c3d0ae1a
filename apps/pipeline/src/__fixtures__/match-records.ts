/**
 * Match record fixtures for tests
 *
 * Hawks bat first (17/2 from 9 deliveries), Owls reply (6/1 from 3).
 */

import type { Delivery, MatchRecord, WicketEvent } from "@crease/shared-types";

export function createDelivery(
	batter: string,
	bowler: string,
	runs: { batter?: number; extras?: number; total?: number } = {},
	options: { extras?: Delivery["extras"]; wickets?: WicketEvent[]; nonStriker?: string } = {},
): Delivery {
	return {
		batter,
		bowler,
		non_striker: options.nonStriker ?? "N/A",
		runs: {
			batter: runs.batter ?? 0,
			extras: runs.extras ?? 0,
			total: runs.total ?? (runs.batter ?? 0) + (runs.extras ?? 0),
		},
		...(options.extras ? { extras: options.extras } : {}),
		...(options.wickets ? { wickets: options.wickets } : {}),
	};
}

export function createMatchRecord(): MatchRecord {
	return {
		meta: { data_version: "1.1.0", created: "2024-03-05", revision: 1 },
		info: {
			dates: ["2024-03-02"],
			event: { name: "Test League", match_number: 3 },
			teams: ["Hawks", "Owls"],
			venue: "Riverside Oval",
			city: "Springfield",
			toss: { winner: "Owls", decision: "field" },
			outcome: { winner: "Owls", by: { wickets: 9 } },
			player_of_match: ["O3"],
		},
		innings: [
			{
				team: "Hawks",
				overs: [
					{
						over: 0,
						deliveries: [
							createDelivery("H1", "O1", { batter: 4 }),
							createDelivery("H1", "O1", { extras: 1 }, { extras: { wides: 1 } }),
							createDelivery("H1", "O1", { batter: 1 }),
							createDelivery("H2", "O1", {}, {
								wickets: [{ kind: "caught", player_out: "H2", fielders: [{ name: "O2" }] }],
							}),
							createDelivery("H3", "O1", { extras: 2 }, { extras: { legbyes: 2 } }),
							createDelivery("H3", "O1", { batter: 6 }),
							createDelivery("H3", "O1"),
						],
					},
					{
						over: 1,
						deliveries: [
							createDelivery("H1", "O2", { batter: 2 }),
							createDelivery("H1", "O2", { batter: 1 }, {
								wickets: [{ kind: "run out", player_out: "H1", fielders: [{ name: "O1" }] }],
							}),
						],
					},
				],
			},
			{
				team: "Owls",
				overs: [
					{
						over: 0,
						deliveries: [
							createDelivery("O1", "H2", { batter: 1 }),
							createDelivery("O3", "H2", { batter: 4, extras: 1 }, { extras: { noballs: 1 } }),
							createDelivery("O3", "H2", {}, {
								wickets: [{ kind: "bowled", player_out: "O3" }],
							}),
						],
					},
				],
			},
		],
	};
}

/**
 * Valid record with no innings (abandoned match)
 */
export function createAbandonedMatchRecord(): MatchRecord {
	return {
		info: {
			dates: ["2024-03-09"],
			teams: ["Hawks", "Owls"],
			outcome: { result: "no result" },
		},
		innings: [],
	};
}
