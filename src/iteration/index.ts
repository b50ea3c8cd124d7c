export type {
	CheckpointRecord,
	HistogramSource,
	TickStrategy,
	TraversalState,
} from "./types.js";
export {
	PercentileTickScheduler,
	LAST_TARGET_BELOW_100,
	percentileReportingTicks,
	assertTicksPerHalfDistance,
} from "./percentile-schedule.js";
export { TraversalEngine } from "./traversal-engine.js";
export {
	PercentileIterator,
	type PercentileIteratorOptions,
	collectPercentiles,
} from "./percentile-iterator.js";
