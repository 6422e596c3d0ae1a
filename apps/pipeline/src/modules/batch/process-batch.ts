/**
 * Batch Runner
 *
 * Aggregates every match a RecordSource lists, a chunk of matches at a
 * time, then derives the feature table and hands all tables to a
 * TableSink. A failing match is logged and skipped; only an empty input
 * or an empty output fails the batch.
 */

import type { MatchId } from "@crease/shared-types";
import type { PipelineConfig } from "../../config/pipeline-config";
import { EmptyBatchError, isMatchError } from "../../errors";
import type {
	DeliveryRecord,
	FeatureRow,
	FlatRow,
	InningsSummary,
	MatchAssembly,
} from "../../types";
import { chunkArray } from "../../utils/array";
import type { PipelineLogger } from "../../utils/logger";
import { buildFeatureTable } from "../features/build-feature-table";
import { assembleMatch } from "../matches/assemble-match";
import type { RecordSource } from "./record-source";
import type { TableSink } from "./table-sink";

// ============================================================================
// TYPES
// ============================================================================

export interface MatchFailure {
	matchId: MatchId;
	code: "MALFORMED_RECORD" | "NOT_FOUND" | "UNEXPECTED";
	message: string;
}

export interface BatchResult {
	processed: MatchId[];
	failures: MatchFailure[];
	rows: FlatRow[];
	innings: InningsSummary[];
	deliveries: DeliveryRecord[];
}

export interface PipelineResult extends BatchResult {
	features: FeatureRow[];
}

export interface BatchOptions {
	concurrency: number;
	logger?: PipelineLogger;
	/** Aborting stops new chunks from starting; finished matches are kept */
	signal?: AbortSignal;
}

// ============================================================================
// MATCHES
// ============================================================================

export async function processMatch(source: RecordSource, matchId: MatchId): Promise<MatchAssembly> {
	const record = await source.readMatch(matchId);
	return assembleMatch(matchId, record);
}

export function toMatchFailure(matchId: MatchId, error: unknown): MatchFailure {
	if (isMatchError(error)) {
		return { matchId, code: error.code, message: error.message };
	}
	return {
		matchId,
		code: "UNEXPECTED",
		message: error instanceof Error ? error.message : String(error),
	};
}

/**
 * Aggregate the given matches
 */
export async function collectMatches(
	source: RecordSource,
	matchIds: readonly MatchId[],
	options: BatchOptions,
): Promise<BatchResult> {
	const logger = options.logger ?? console;
	const result: BatchResult = {
		processed: [],
		failures: [],
		rows: [],
		innings: [],
		deliveries: [],
	};

	const chunks = chunkArray(matchIds, options.concurrency);
	for (const [chunkIndex, chunk] of chunks.entries()) {
		if (options.signal?.aborted) {
			logger.warn(
				`⚠️ [Batch] Stopped after ${chunkIndex}/${chunks.length} chunks (${result.processed.length} matches kept)`,
			);
			break;
		}

		logger.debug(`🔄 [Batch] Processing chunk ${chunkIndex + 1}/${chunks.length}`);

		const settled = await Promise.allSettled(
			chunk.map((matchId) => processMatch(source, matchId)),
		);

		settled.forEach((outcome, index) => {
			const matchId = chunk[index];
			if (outcome.status === "fulfilled") {
				const assembly = outcome.value;
				result.processed.push(matchId);
				result.rows.push(...assembly.rows);
				result.innings.push(...assembly.innings);
				result.deliveries.push(...assembly.deliveries);
				return;
			}
			const failure = toMatchFailure(matchId, outcome.reason);
			result.failures.push(failure);
			logger.warn(`⚠️ [Batch] Skipped ${matchId} (${failure.code}): ${failure.message}`);
		});
	}

	return result;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Source → aggregation → features → sink
 *
 * @throws EmptyBatchError when no match is listed or no row is produced
 */
export async function runPipeline(
	source: RecordSource,
	sink: TableSink,
	config: PipelineConfig,
	options: Omit<BatchOptions, "concurrency"> = {},
): Promise<PipelineResult> {
	const logger = options.logger ?? console;
	const startTime = performance.now();

	const matchIds = await source.listMatches();
	if (matchIds.length === 0) {
		throw new EmptyBatchError("No match files found", "EMPTY_INPUT");
	}
	logger.log(`📋 [Batch] ${matchIds.length} match files discovered`);

	const batch = await collectMatches(source, matchIds, {
		...options,
		logger,
		concurrency: config.concurrency,
	});

	if (batch.rows.length === 0) {
		throw new EmptyBatchError(
			`No rows produced from ${matchIds.length} match files (${batch.failures.length} failed)`,
			"EMPTY_OUTPUT",
		);
	}

	const features = buildFeatureTable(batch.deliveries, config);

	await sink.writeRows("player_innings", batch.rows);
	await sink.writeRows("innings_summary", batch.innings);
	await sink.writeRows("features", features);

	const duration = ((performance.now() - startTime) / 1000).toFixed(2);
	logger.log(
		`✅ [Batch] ${batch.processed.length} matches, ${batch.failures.length} skipped, ${batch.rows.length} player rows, ${features.length} feature rows in ${duration}s`,
	);

	return { ...batch, features };
}
