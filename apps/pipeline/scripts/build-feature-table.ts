import { resolve } from "node:path";
import {
	type PipelineConfigOverrides,
	resolvePipelineConfig,
} from "../src/config/pipeline-config";
import { CsvTableSink } from "../src/modules/batch/table-sink";
import { FileSystemRecordSource } from "../src/modules/batch/record-source";
import { runPipeline } from "../src/modules/batch/process-batch";
import { createPipelineLogger, parseLogLevel } from "../src/utils/logger";

const args = process.argv.slice(2);
const inputIndex = args.indexOf("--input");

if (inputIndex === -1) {
	console.error(
		"Usage: tsx scripts/build-feature-table.ts --input <match-dir> [--out <output-dir>] [--window 12] [--overs 20] [--concurrency 8] [--chase-only-rrr]",
	);
	process.exit(1);
}

const readOption = (flag: string): string | null => {
	const index = args.indexOf(flag);
	return index !== -1 ? (args[index + 1] ?? null) : null;
};

const readNumber = (flag: string): number | undefined => {
	const value = readOption(flag);
	return value === null ? undefined : Number(value);
};

const overrides: PipelineConfigOverrides = {
	chaseOnlyRequiredRunRate: args.includes("--chase-only-rrr"),
};
const windowSize = readNumber("--window");
if (windowSize !== undefined) overrides.windowSize = windowSize;
const oversPerInnings = readNumber("--overs");
if (oversPerInnings !== undefined) overrides.oversPerInnings = oversPerInnings;
const concurrency = readNumber("--concurrency");
if (concurrency !== undefined) overrides.concurrency = concurrency;
const outputDir = readOption("--out");
if (outputDir) overrides.outputDir = outputDir;

const logger = createPipelineLogger(parseLogLevel(process.env.LOG_LEVEL));

async function main() {
	const config = resolvePipelineConfig(overrides);
	const inputPath = resolve(args[inputIndex + 1] ?? ".");
	const sink = new CsvTableSink(resolve(config.outputDir));

	const controller = new AbortController();
	process.once("SIGINT", () => {
		logger.warn("⚠️ [Batch] Interrupt received, finishing current chunk");
		controller.abort();
	});

	const result = await runPipeline(new FileSystemRecordSource(inputPath), sink, config, {
		logger,
		signal: controller.signal,
	});

	logger.log(`📁 CSV: ${sink.pathFor("player_innings")}`);
	logger.log(`📁 CSV: ${sink.pathFor("innings_summary")}`);
	logger.log(`📁 CSV: ${sink.pathFor("features")}`);
	if (result.failures.length > 0) {
		logger.warn(`⚠️ [Batch] ${result.failures.length} match files skipped`);
	}
}

main().catch((error: unknown) => {
	logger.error("❌ [Batch] Feature build failed:", error);
	process.exit(1);
});
