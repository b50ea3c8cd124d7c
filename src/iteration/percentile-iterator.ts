/**
 * PercentileIterator — pull-based checkpoint sequence over a histogram.
 *
 * Steps start at 0% and close in on 100% by the tick schedule, then one
 * extra step lands on exactly 100% once the recorded values are exhausted.
 * An empty histogram yields nothing. The same instance can be reset and
 * walked again.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { ExhaustedIteratorError } from "../shared/errors.js";
import { PercentileTickScheduler } from "./percentile-schedule.js";
import { TraversalEngine } from "./traversal-engine.js";
import type { CheckpointRecord, HistogramSource } from "./types.js";

export interface PercentileIteratorOptions {
	readonly logger?: Logger | undefined;
}

export class PercentileIterator implements Iterable<CheckpointRecord> {
	private readonly scheduler: PercentileTickScheduler;
	private readonly engine: TraversalEngine;
	private readonly logger: Logger;
	private closed = false;

	/** @throws ConfigError when `ticksPerHalfDistance` is not a positive integer */
	constructor(
		histogram: HistogramSource,
		ticksPerHalfDistance: number,
		options: PercentileIteratorOptions = {},
	) {
		this.logger = options.logger ?? silentLogger;
		this.scheduler = new PercentileTickScheduler(ticksPerHalfDistance);
		this.engine = new TraversalEngine(histogram, this.scheduler, this.logger);
		this.logger.debug(
			{ ticksPerHalfDistance, totalCount: this.engine.totalRecordedCount },
			"Percentile iteration started",
		);
	}

	get ticksPerHalfDistance(): number {
		return this.scheduler.ticksPerHalfDistance;
	}

	/** The percentile the next checkpoint is waiting for. */
	get targetPercentile(): number {
		return this.scheduler.targetPercentile;
	}

	get previousTargetPercentile(): number {
		return this.scheduler.previousTargetPercentile;
	}

	get terminalStepEmitted(): boolean {
		return this.scheduler.terminalStepEmitted;
	}

	/**
	 * Reinitialise for a fresh pass over the same histogram.
	 * @throws ConfigError when `ticksPerHalfDistance` is not a positive integer
	 */
	reset(ticksPerHalfDistance: number = this.scheduler.ticksPerHalfDistance): void {
		this.scheduler.reset(ticksPerHalfDistance);
		this.engine.reset();
		this.closed = false;
		this.logger.debug(
			{ ticksPerHalfDistance, totalCount: this.engine.totalRecordedCount },
			"Percentile iteration reset",
		);
	}

	/**
	 * True while recorded counts remain, then once more for the closing 100%
	 * step. Confirming that closing step pins the target to 100.
	 */
	hasNext(): boolean {
		if (this.engine.hasNext()) return true;
		if (this.scheduler.terminalStepEmitted) return !this.closed;
		if (this.engine.totalRecordedCount > 0) {
			this.scheduler.markTerminalStep();
			this.logger.debug(
				{ previousTargetPercentile: this.scheduler.previousTargetPercentile },
				"Percentile iteration reached 100%",
			);
			return true;
		}
		return false;
	}

	/** @throws ExhaustedIteratorError when `hasNext()` is false */
	next(): CheckpointRecord {
		if (!this.hasNext()) {
			throw new ExhaustedIteratorError("No more percentile checkpoints", {
				totalCount: this.engine.totalRecordedCount,
				terminalStepEmitted: this.scheduler.terminalStepEmitted,
			});
		}
		const record = this.engine.step();
		if (this.scheduler.terminalStepEmitted) this.closed = true;
		return record;
	}

	*[Symbol.iterator](): Iterator<CheckpointRecord> {
		while (this.hasNext()) {
			yield this.next();
		}
	}
}

/** Walk the whole sequence eagerly. */
export function collectPercentiles(
	histogram: HistogramSource,
	ticksPerHalfDistance: number,
	options: PercentileIteratorOptions = {},
): CheckpointRecord[] {
	return [...new PercentileIterator(histogram, ticksPerHalfDistance, options)];
}
