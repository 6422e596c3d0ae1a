/**
 * Pipeline Configuration
 *
 * Default window sizes, innings shape and batch settings, plus the
 * validation applied to caller overrides.
 */

import { z } from "zod";
import { ConfigError } from "../errors";
import type { MatchPhase } from "../types";

// ============================================================================
// TYPES
// ============================================================================

export interface PhaseBuckets {
	/** Last over (1-based) of the powerplay */
	powerplayEnd: number;
	/** Last over (1-based) of the middle overs; later overs are death */
	middleEnd: number;
	weights: Record<MatchPhase, number>;
}

export interface PipelineConfig {
	/** Deliveries in each rolling window */
	windowSize: number;
	oversPerInnings: number;
	ballsPerOver: number;
	wicketsPerInnings: number;
	phases: PhaseBuckets;
	/** Only give second-innings deliveries a required run rate */
	chaseOnlyRequiredRunRate: boolean;
	/** Match files processed at once */
	concurrency: number;
	outputDir: string;
}

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_PHASE_BUCKETS: PhaseBuckets = {
	powerplayEnd: 6,
	middleEnd: 15,
	weights: {
		powerplay: 1,
		middle: 1.5,
		death: 2,
	},
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	windowSize: 12,
	oversPerInnings: 20,
	ballsPerOver: 6,
	wicketsPerInnings: 10,
	phases: DEFAULT_PHASE_BUCKETS,
	chaseOnlyRequiredRunRate: false,
	concurrency: 8,
	outputDir: "data/features",
};

// ============================================================================
// VALIDATION
// ============================================================================

const positiveInt = z.number().int().positive();

const pipelineConfigSchema = z
	.object({
		windowSize: positiveInt,
		oversPerInnings: positiveInt,
		ballsPerOver: positiveInt,
		wicketsPerInnings: positiveInt,
		phases: z.object({
			powerplayEnd: positiveInt,
			middleEnd: positiveInt,
			weights: z.object({
				powerplay: z.number().nonnegative(),
				middle: z.number().nonnegative(),
				death: z.number().nonnegative(),
			}),
		}),
		chaseOnlyRequiredRunRate: z.boolean(),
		concurrency: positiveInt,
		outputDir: z.string().min(1),
	})
	.refine((config) => config.phases.powerplayEnd < config.phases.middleEnd, {
		message: "powerplayEnd must come before middleEnd",
		path: ["phases", "powerplayEnd"],
	})
	.refine((config) => config.phases.middleEnd <= config.oversPerInnings, {
		message: "middleEnd cannot exceed oversPerInnings",
		path: ["phases", "middleEnd"],
	});

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, "phases">> & {
	phases?: Partial<Omit<PhaseBuckets, "weights">> & {
		weights?: Partial<PhaseBuckets["weights"]>;
	};
};

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws ConfigError when a value is out of range
 */
export function resolvePipelineConfig(
	overrides: PipelineConfigOverrides = {},
): PipelineConfig {
	const { phases, ...rest } = overrides;
	const merged: PipelineConfig = {
		...DEFAULT_PIPELINE_CONFIG,
		...rest,
		phases: {
			...DEFAULT_PHASE_BUCKETS,
			...phases,
			weights: {
				...DEFAULT_PHASE_BUCKETS.weights,
				...phases?.weights,
			},
		},
	};

	const result = pipelineConfigSchema.safeParse(merged);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid pipeline config: ${details}`);
	}
	return merged;
}
