/**
 * Iteration defaults and environment overrides.
 *
 * Explicit options always win over the environment, which wins over
 * DEFAULT_ITERATION_CONFIG.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface IterationConfig {
	/** Equal-sized percentile steps per half-distance to 100% */
	readonly ticksPerHalfDistance: number;
	/** Decimal digits of value precision kept by each histogram bucket (0-5) */
	readonly significantValueDigits: number;
	/** Largest value a histogram built from this config can record */
	readonly highestTrackableValue: number;
	/** Log level for loggers created from this config */
	readonly logLevel: LogLevel;
}

export const DEFAULT_ITERATION_CONFIG: IterationConfig = {
	ticksPerHalfDistance: 5,
	significantValueDigits: 3,
	// one hour in microseconds
	highestTrackableValue: 3_600_000_000,
	logLevel: "warn",
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shape for constructing Partial<IterationConfig>. */
interface MutableIterationConfig {
	ticksPerHalfDistance?: number;
	significantValueDigits?: number;
	highestTrackableValue?: number;
	logLevel?: LogLevel;
}

/**
 * Reads iteration config values from environment variables.
 * Supported: PERCENTILE_TICKS_PER_HALF_DISTANCE, PERCENTILE_SIGNIFICANT_DIGITS,
 * PERCENTILE_HIGHEST_TRACKABLE_VALUE, PERCENTILE_LOG_LEVEL.
 * @throws ConfigError if a variable is set to a malformed value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<IterationConfig> {
	const result: MutableIterationConfig = {};

	const ticks = parseIntEnv(env, "PERCENTILE_TICKS_PER_HALF_DISTANCE", 1);
	if (ticks !== undefined) result.ticksPerHalfDistance = ticks;

	const digits = parseIntEnv(env, "PERCENTILE_SIGNIFICANT_DIGITS", 0);
	if (digits !== undefined) {
		if (digits > 5) {
			throw new ConfigError(
				`Invalid PERCENTILE_SIGNIFICANT_DIGITS: "${digits}" must be between 0 and 5`,
			);
		}
		result.significantValueDigits = digits;
	}

	const highest = parseIntEnv(env, "PERCENTILE_HIGHEST_TRACKABLE_VALUE", 2);
	if (highest !== undefined) result.highestTrackableValue = highest;

	const level = env["PERCENTILE_LOG_LEVEL"];
	if (level) {
		const match = LOG_LEVELS.find((l) => l === level);
		if (match === undefined) {
			throw new ConfigError(`Invalid PERCENTILE_LOG_LEVEL: "${level}"`, {
				allowed: LOG_LEVELS,
			});
		}
		result.logLevel = match;
	}

	return result;
}

/** Merge defaults, environment and explicit overrides, in that order. */
export function resolveIterationConfig(
	overrides: Partial<IterationConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): IterationConfig {
	return { ...DEFAULT_ITERATION_CONFIG, ...configFromEnv(env), ...overrides };
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || !Number.isSafeInteger(parsed) || parsed < min) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer >= ${min}`);
	}
	return parsed;
}
