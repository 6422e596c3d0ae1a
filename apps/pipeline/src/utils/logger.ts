/**
 * Console logger with a level threshold
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface PipelineLogger {
	debug: (...args: unknown[]) => void;
	log: (...args: unknown[]) => void;
	warn: (...args: unknown[]) => void;
	error: (...args: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

const noop = () => {};

export const parseLogLevel = (value: string | undefined): LogLevel => {
	const normalized = value?.trim().toLowerCase();
	switch (normalized) {
		case "debug":
		case "info":
		case "warn":
		case "error":
		case "silent":
			return normalized;
		default:
			return "info";
	}
};

export function createPipelineLogger(
	level: LogLevel = "info",
	output: PipelineLogger = console,
): PipelineLogger {
	const threshold = LEVEL_ORDER[level];
	const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= threshold;

	return {
		debug: enabled("debug") ? (...args) => output.debug(...args) : noop,
		log: enabled("info") ? (...args) => output.log(...args) : noop,
		warn: enabled("warn") ? (...args) => output.warn(...args) : noop,
		error: enabled("error") ? (...args) => output.error(...args) : noop,
	};
}
