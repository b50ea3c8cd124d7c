/**
 * Iteration types — the contract between a histogram, the traversal engine
 * and the tick strategies that decide where checkpoints fall.
 */

/** The read-only view of a histogram that a traversal walks. */
export interface HistogramSource {
	readonly totalCount: number;
	readonly countsArrayLength: number;
	countAtIndex(index: number): number;
	valueFromIndex(index: number): number;
	highestEquivalentValue(value: number): number;
}

/** Accumulated cursor state, owned by the engine and read by strategies. */
export interface TraversalState {
	/** Total count captured when the session started; fixed for the session */
	readonly totalRecordedCount: number;
	/** Non-decreasing as the cursor advances */
	readonly cumulativeCountThroughCurrentBucket: number;
	readonly countAtCurrentBucket: number;
}

/**
 * Hooks a traversal engine calls to decide when to emit and what to label
 * the emitted step with.
 */
export interface TickStrategy {
	/** Has the bucket under the cursor reached the active target? */
	reachedIterationLevel(state: TraversalState): boolean;
	/** Called once after each emitted checkpoint, before seeking the next. */
	incrementIterationLevel(): void;
	percentileIteratedTo(state: TraversalState): number;
	percentileIteratedFrom(state: TraversalState): number;
}

/** Immutable snapshot produced for each emitted step. */
export interface CheckpointRecord {
	/** Highest value equivalent to the bucket the step stopped at */
	readonly valueIteratedTo: number;
	/** `valueIteratedTo` of the previous step, 0 for the first */
	readonly valueIteratedFrom: number;
	/** Count recorded exactly in the bucket the step stopped at */
	readonly countAtValueIteratedTo: number;
	readonly countAddedInThisIterationStep: number;
	readonly totalCountToThisValue: number;
	/** Sum of count × highest equivalent value through this bucket */
	readonly totalValueToThisValue: number;
	readonly totalRecordedCount: number;
	/** Actual cumulative percentile at this bucket */
	readonly percentile: number;
	readonly percentileLevelIteratedTo: number;
	readonly percentileLevelIteratedFrom: number;
}
