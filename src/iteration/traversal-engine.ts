/**
 * TraversalEngine — walks histogram buckets in value order for a TickStrategy.
 *
 * The engine owns the cursor and the running totals; the strategy only
 * decides when the cursor has gone far enough and how to label the step.
 * A bucket's count is added to the totals once, on first arrival, so several
 * checkpoints may be emitted from the same bucket.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { ConcurrentModificationError, ExhaustedIteratorError } from "../shared/errors.js";
import type { CheckpointRecord, HistogramSource, TickStrategy, TraversalState } from "./types.js";

export class TraversalEngine implements TraversalState {
	private histogram: HistogramSource;
	private readonly strategy: TickStrategy;
	private readonly logger: Logger;

	private arrayTotalCount = 0;
	private currentIndex = 0;
	private currentValueAtIndex = 0;
	private prevValueIteratedTo = 0;
	private totalCountToPrevIndex = 0;
	private totalCountToCurrentIndex = 0;
	/** Sum of count × value; exact only while it stays below 2^53. */
	private totalValueToCurrentIndex = 0;
	private countAtThisValue = 0;
	private freshSubBucket = true;

	constructor(histogram: HistogramSource, strategy: TickStrategy, logger: Logger = silentLogger) {
		this.histogram = histogram;
		this.strategy = strategy;
		this.logger = logger;
		this.reset(histogram);
	}

	// ── TraversalState ───────────────────────────────────────────────

	get totalRecordedCount(): number {
		return this.arrayTotalCount;
	}

	get cumulativeCountThroughCurrentBucket(): number {
		return this.totalCountToCurrentIndex;
	}

	get countAtCurrentBucket(): number {
		return this.countAtThisValue;
	}

	// ── Cursor ───────────────────────────────────────────────────────

	/** Start a fresh pass, over a new histogram or the current one. */
	reset(histogram: HistogramSource = this.histogram): void {
		this.histogram = histogram;
		this.arrayTotalCount = histogram.totalCount;
		this.currentIndex = 0;
		this.currentValueAtIndex = 0;
		this.prevValueIteratedTo = 0;
		this.totalCountToPrevIndex = 0;
		this.totalCountToCurrentIndex = 0;
		this.totalValueToCurrentIndex = 0;
		this.countAtThisValue = 0;
		this.freshSubBucket = true;
	}

	/** Recorded counts remain beyond the cursor. */
	hasNext(): boolean {
		this.assertUnmodified();
		return this.totalCountToCurrentIndex < this.arrayTotalCount;
	}

	/**
	 * Advance until the strategy reports its level reached, then build the
	 * checkpoint for that bucket and let the strategy move its target on.
	 */
	step(): CheckpointRecord {
		while (this.currentIndex < this.histogram.countsArrayLength) {
			this.countAtThisValue = this.histogram.countAtIndex(this.currentIndex);
			if (this.freshSubBucket) {
				this.totalCountToCurrentIndex += this.countAtThisValue;
				this.totalValueToCurrentIndex +=
					this.countAtThisValue * this.histogram.highestEquivalentValue(this.currentValueAtIndex);
				this.freshSubBucket = false;
			}

			if (this.strategy.reachedIterationLevel(this)) {
				const record = this.buildRecord();
				this.prevValueIteratedTo = record.valueIteratedTo;
				this.totalCountToPrevIndex = this.totalCountToCurrentIndex;
				this.strategy.incrementIterationLevel();
				this.assertUnmodified();
				return record;
			}

			this.incrementSubBucket();
		}

		throw new ExhaustedIteratorError("Histogram buckets exhausted before the next checkpoint", {
			index: this.currentIndex,
			totalCountToCurrentIndex: this.totalCountToCurrentIndex,
			arrayTotalCount: this.arrayTotalCount,
		});
	}

	private buildRecord(): CheckpointRecord {
		const valueIteratedTo = this.histogram.highestEquivalentValue(this.currentValueAtIndex);
		return Object.freeze({
			valueIteratedTo,
			valueIteratedFrom: this.prevValueIteratedTo,
			countAtValueIteratedTo: this.countAtThisValue,
			countAddedInThisIterationStep: this.totalCountToCurrentIndex - this.totalCountToPrevIndex,
			totalCountToThisValue: this.totalCountToCurrentIndex,
			totalValueToThisValue: this.totalValueToCurrentIndex,
			totalRecordedCount: this.arrayTotalCount,
			percentile: (100.0 * this.totalCountToCurrentIndex) / this.arrayTotalCount,
			percentileLevelIteratedTo: this.strategy.percentileIteratedTo(this),
			percentileLevelIteratedFrom: this.strategy.percentileIteratedFrom(this),
		});
	}

	private incrementSubBucket(): void {
		this.freshSubBucket = true;
		this.currentIndex++;
		this.currentValueAtIndex = this.histogram.valueFromIndex(this.currentIndex);
	}

	private assertUnmodified(): void {
		const current = this.histogram.totalCount;
		if (current === this.arrayTotalCount) return;
		const context = { expectedTotalCount: this.arrayTotalCount, totalCount: current };
		this.logger.warn(context, "Histogram modified during iteration");
		throw new ConcurrentModificationError(
			"Histogram total count changed during iteration",
			context,
		);
	}
}
