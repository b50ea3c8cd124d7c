export {
	type Result,
	ok,
	err,
	map,
	unwrap,
} from "./result.js";

export {
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
} from "./errors.js";

export {
	type IterationConfig,
	DEFAULT_ITERATION_CONFIG,
	configFromEnv,
	resolveIterationConfig,
} from "./config.js";
