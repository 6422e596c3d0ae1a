/**
 * Match Record Validation
 *
 * Only `info` and `innings` are required. Every nested field is optional,
 * may be null, and falls back to a default further down the pipeline.
 */

import type { MatchId, MatchRecord } from "@crease/shared-types";
import { z } from "zod";
import { MalformedRecordError } from "../../errors";

// ============================================================================
// VALIDATION SCHEMAS
// ============================================================================

/**
 * Optional field that may also arrive as JSON `null`; null reads as absent
 */
const dropNull = <T>(value: T | null | undefined): T | undefined => value ?? undefined;

const fielderSchema = z.object({
	name: z.string().nullish().transform(dropNull),
	substitute: z.boolean().nullish().transform(dropNull),
});

const wicketSchema = z.object({
	kind: z.string(),
	player_out: z.string(),
	fielders: z.array(fielderSchema).nullish().transform(dropNull),
});

const deliverySchema = z.object({
	batter: z.string().nullish().transform(dropNull),
	bowler: z.string().nullish().transform(dropNull),
	non_striker: z.string().nullish().transform(dropNull),
	runs: z
		.object({
			batter: z.number().nullish().transform(dropNull),
			extras: z.number().nullish().transform(dropNull),
			total: z.number().nullish().transform(dropNull),
			non_boundary: z.boolean().nullish().transform(dropNull),
		})
		.nullish().transform(dropNull),
	extras: z.record(z.string(), z.number()).nullish().transform(dropNull),
	wickets: z.array(wicketSchema).nullish().transform(dropNull),
});

const overSchema = z.object({
	over: z.number().int().nonnegative().nullish().transform(dropNull),
	deliveries: z.array(deliverySchema).nullish().transform(dropNull),
});

const inningsSchema = z.object({
	team: z.string().nullish().transform(dropNull),
	overs: z.array(overSchema).nullish().transform(dropNull),
});

const infoSchema = z.object({
	dates: z.array(z.string()).nullish().transform(dropNull),
	event: z
		.object({
			name: z.string().nullish().transform(dropNull),
			match_number: z.number().nullish().transform(dropNull),
			stage: z.string().nullish().transform(dropNull),
		})
		.nullish().transform(dropNull),
	teams: z.array(z.string()).nullish().transform(dropNull),
	venue: z.string().nullish().transform(dropNull),
	city: z.string().nullish().transform(dropNull),
	gender: z.string().nullish().transform(dropNull),
	match_type: z.string().nullish().transform(dropNull),
	overs: z.number().nullish().transform(dropNull),
	toss: z
		.object({
			winner: z.string().nullish().transform(dropNull),
			decision: z.string().nullish().transform(dropNull),
		})
		.nullish().transform(dropNull),
	outcome: z
		.object({
			winner: z.string().nullish().transform(dropNull),
			result: z.string().nullish().transform(dropNull),
			method: z.string().nullish().transform(dropNull),
			by: z
				.object({
					runs: z.number().nullish().transform(dropNull),
					wickets: z.number().nullish().transform(dropNull),
					innings: z.number().nullish().transform(dropNull),
				})
				.nullish().transform(dropNull),
		})
		.nullish().transform(dropNull),
	player_of_match: z.array(z.string()).nullish().transform(dropNull),
});

export const matchRecordSchema = z.object({
	meta: z
		.object({
			data_version: z.string().nullish().transform(dropNull),
			created: z.string().nullish().transform(dropNull),
			revision: z.number().nullish().transform(dropNull),
		})
		.nullish().transform(dropNull),
	info: infoSchema,
	innings: z.array(inningsSchema),
});

// ============================================================================
// PARSING
// ============================================================================

/**
 * Validate a decoded match file
 *
 * @throws MalformedRecordError when `info` / `innings` are missing or mistyped
 */
export function parseMatchRecord(raw: unknown, matchId: MatchId): MatchRecord {
	const result = matchRecordSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
		);
		throw new MalformedRecordError(
			`Match ${matchId} is missing required sections`,
			matchId,
			issues,
		);
	}
	const record: MatchRecord = result.data;
	return record;
}

/**
 * Decode and validate the text of a match file
 *
 * @throws MalformedRecordError on invalid JSON or schema mismatch
 */
export function decodeMatchRecord(text: string, matchId: MatchId): MatchRecord {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new MalformedRecordError(`Match ${matchId} is not valid JSON`, matchId, [
			reason,
		]);
	}
	return parseMatchRecord(raw, matchId);
}
