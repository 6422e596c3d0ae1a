/**
 * Tests for process-batch.ts
 *
 * In-memory RecordSource / TableSink stand-ins; no filesystem.
 */

import type { MatchId, MatchRecord } from "@crease/shared-types";
import { describe, expect, it, vi } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "../../config/pipeline-config";
import {
	createAbandonedMatchRecord,
	createMatchRecord,
} from "../../__fixtures__/match-records";
import { EmptyBatchError, RecordNotFoundError } from "../../errors";
import type { PipelineLogger } from "../../utils/logger";
import { parseMatchRecord } from "../matches/match-schema";
import { collectMatches, runPipeline, toMatchFailure } from "./process-batch";
import type { RecordSource } from "./record-source";
import type { TableName, TableSink } from "./table-sink";

class MemoryRecordSource implements RecordSource {
	readonly reads: MatchId[] = [];

	constructor(
		private readonly records: Record<MatchId, unknown>,
		private readonly onRead?: (matchId: MatchId) => void,
	) {}

	async listMatches(): Promise<MatchId[]> {
		return Object.keys(this.records);
	}

	async readMatch(matchId: MatchId): Promise<MatchRecord> {
		this.reads.push(matchId);
		this.onRead?.(matchId);
		if (!(matchId in this.records)) {
			throw new RecordNotFoundError(`Match ${matchId} not found`, matchId);
		}
		return parseMatchRecord(this.records[matchId], matchId);
	}
}

class MemoryTableSink implements TableSink {
	readonly tables = new Map<TableName, number>();

	async writeRows<TRow extends object>(table: TableName, rows: readonly TRow[]): Promise<void> {
		this.tables.set(table, rows.length);
	}
}

function createLogger(): PipelineLogger {
	return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("collectMatches", () => {
	it("should keep rows from valid matches and skip malformed ones", async () => {
		const logger = createLogger();
		const source = new MemoryRecordSource({
			"1001": createMatchRecord(),
			broken: { info: {} },
		});

		const result = await collectMatches(source, ["broken", "1001"], { concurrency: 4, logger });

		expect(result.processed).toEqual(["1001"]);
		expect(result.rows).toHaveLength(8);
		expect(new Set(result.rows.map((row) => row.matchId))).toEqual(new Set(["1001"]));
		expect(result.failures).toEqual([
			{
				matchId: "broken",
				code: "MALFORMED_RECORD",
				message: "Match broken is missing required sections",
			},
		]);
		expect(logger.warn).toHaveBeenCalledWith(
			"⚠️ [Batch] Skipped broken (MALFORMED_RECORD): Match broken is missing required sections",
		);
	});

	it("should report unknown match ids as not found", async () => {
		const source = new MemoryRecordSource({});
		const result = await collectMatches(source, ["404"], {
			concurrency: 1,
			logger: createLogger(),
		});

		expect(result.failures).toEqual([
			{ matchId: "404", code: "NOT_FOUND", message: "Match 404 not found" },
		]);
	});

	it("should concatenate matches processed in several chunks", async () => {
		const source = new MemoryRecordSource({
			a: createMatchRecord(),
			b: createMatchRecord(),
			c: createMatchRecord(),
		});

		const result = await collectMatches(source, ["a", "b", "c"], {
			concurrency: 2,
			logger: createLogger(),
		});

		expect(result.processed).toEqual(["a", "b", "c"]);
		expect(result.rows).toHaveLength(24);
		expect(result.innings).toHaveLength(6);
		expect(result.deliveries).toHaveLength(36);
	});

	it("should stop starting chunks once aborted and keep finished matches", async () => {
		const controller = new AbortController();
		const logger = createLogger();
		const source = new MemoryRecordSource(
			{ a: createMatchRecord(), b: createMatchRecord() },
			() => controller.abort(),
		);

		const result = await collectMatches(source, ["a", "b"], {
			concurrency: 1,
			logger,
			signal: controller.signal,
		});

		expect(source.reads).toEqual(["a"]);
		expect(result.processed).toEqual(["a"]);
		expect(logger.warn).toHaveBeenCalledWith(
			"⚠️ [Batch] Stopped after 1/2 chunks (1 matches kept)",
		);
	});
});

describe("runPipeline", () => {
	it("should write all three tables", async () => {
		const sink = new MemoryTableSink();
		const source = new MemoryRecordSource({
			"1001": createMatchRecord(),
			broken: "not a match",
		});

		const result = await runPipeline(source, sink, DEFAULT_PIPELINE_CONFIG, {
			logger: createLogger(),
		});

		expect(result.failures).toHaveLength(1);
		expect(result.features).toHaveLength(10);
		expect(sink.tables).toEqual(
			new Map([
				["player_innings", 8],
				["innings_summary", 2],
				["features", 10],
			]),
		);
	});

	it("should fail the batch when no match is listed", async () => {
		const run = runPipeline(new MemoryRecordSource({}), new MemoryTableSink(), DEFAULT_PIPELINE_CONFIG, {
			logger: createLogger(),
		});

		await expect(run).rejects.toBeInstanceOf(EmptyBatchError);
		await expect(run).rejects.toMatchObject({ code: "EMPTY_INPUT" });
	});

	it("should fail the batch when no row is produced", async () => {
		const sink = new MemoryTableSink();
		const run = runPipeline(
			new MemoryRecordSource({ bad: {}, abandoned: createAbandonedMatchRecord() }),
			sink,
			DEFAULT_PIPELINE_CONFIG,
			{ logger: createLogger() },
		);

		await expect(run).rejects.toMatchObject({ code: "EMPTY_OUTPUT" });
		expect(sink.tables.size).toBe(0);
	});
});

describe("toMatchFailure", () => {
	it("should wrap unexpected errors", () => {
		expect(toMatchFailure("1001", new TypeError("boom"))).toEqual({
			matchId: "1001",
			code: "UNEXPECTED",
			message: "boom",
		});
		expect(toMatchFailure("1002", "plain")).toEqual({
			matchId: "1002",
			code: "UNEXPECTED",
			message: "plain",
		});
	});
});
