// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	ErrorCode,
	HistogramError,
	ConfigError,
	ExhaustedIteratorError,
	ConcurrentModificationError,
	ValueOutOfRangeError,
	isHistogramError,
	isConfigError,
	isExhaustedIteratorError,
	isConcurrentModificationError,
	isValueOutOfRangeError,
	type IterationConfig,
	DEFAULT_ITERATION_CONFIG,
	configFromEnv,
	resolveIterationConfig,
} from "./shared/index.js";

// ── Histogram ────────────────────────────────────────────────────────
export { BucketLayout, Histogram, type HistogramOptions } from "./histogram/index.js";

// ── Iteration ────────────────────────────────────────────────────────
export {
	type CheckpointRecord,
	type HistogramSource,
	type TickStrategy,
	type TraversalState,
	PercentileTickScheduler,
	LAST_TARGET_BELOW_100,
	percentileReportingTicks,
	TraversalEngine,
	PercentileIterator,
	type PercentileIteratorOptions,
	collectPercentiles,
} from "./iteration/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { ValidationError, type ValidationIssue, validate, z } from "./lib/validation/index.js";
