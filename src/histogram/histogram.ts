/**
 * Histogram — fixed-precision counting histogram over a log-linear layout.
 *
 * Records non-negative integer values (latencies in microseconds, sizes in
 * bytes, ...) with bounded relative error, and hands out percentile
 * iterators over the recorded distribution.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import type { IterationConfig } from "../shared/config.js";
import { ConfigError, ValueOutOfRangeError } from "../shared/errors.js";
import { type Result, map, unwrap } from "../shared/result.js";
import {
	PercentileIterator,
	type PercentileIteratorOptions,
} from "../iteration/percentile-iterator.js";
import type { HistogramSource } from "../iteration/types.js";
import { BucketLayout } from "./bucket-layout.js";

export interface HistogramOptions {
	/** Smallest value distinguishable from 0 (default 1) */
	readonly lowestDiscernibleValue?: number | undefined;
	readonly highestTrackableValue: number;
	/** Decimal digits of precision, 0-5 (default 3) */
	readonly significantValueDigits?: number | undefined;
	readonly logger?: Logger | undefined;
}

const HistogramOptionsSchema = z
	.object({
		lowestDiscernibleValue: z.number().int().min(1).max(Number.MAX_SAFE_INTEGER).default(1),
		highestTrackableValue: z.number().int().max(Number.MAX_SAFE_INTEGER),
		significantValueDigits: z.number().int().min(0).max(5).default(3),
	})
	.refine((o) => o.highestTrackableValue >= 2 * o.lowestDiscernibleValue, {
		message: "highestTrackableValue must be at least twice lowestDiscernibleValue",
		path: ["highestTrackableValue"],
	});

export class Histogram implements HistogramSource {
	private readonly layout: BucketLayout;
	private readonly counts: Float64Array;
	private readonly logger: Logger;
	private _totalCount = 0;
	private _minNonZeroValue = Number.MAX_SAFE_INTEGER;
	private _maxValue = 0;

	private constructor(layout: BucketLayout, logger: Logger) {
		this.layout = layout;
		this.counts = new Float64Array(layout.countsArrayLength);
		this.logger = logger;
	}

	/** Validate options and build a histogram without throwing. */
	static tryCreate(options: HistogramOptions): Result<Histogram, ValidationError> {
		const parsed = validate(HistogramOptionsSchema, {
			lowestDiscernibleValue: options.lowestDiscernibleValue,
			highestTrackableValue: options.highestTrackableValue,
			significantValueDigits: options.significantValueDigits,
		});
		return map(parsed, (o) => {
			const layout = new BucketLayout(
				o.lowestDiscernibleValue,
				o.highestTrackableValue,
				o.significantValueDigits,
			);
			return new Histogram(layout, options.logger ?? silentLogger);
		});
	}

	/** @throws ConfigError when the options are invalid */
	static create(options: HistogramOptions): Histogram {
		const result = Histogram.tryCreate(options);
		if (!result.ok) {
			throw new ConfigError(result.error.message, {
				cause: result.error,
				issues: result.error.issues,
			});
		}
		return unwrap(result);
	}

	/** Build from resolved iteration config (see `resolveIterationConfig`). */
	static fromConfig(config: IterationConfig, logger?: Logger): Histogram {
		return Histogram.create({
			highestTrackableValue: config.highestTrackableValue,
			significantValueDigits: config.significantValueDigits,
			logger,
		});
	}

	// ── Layout ───────────────────────────────────────────────────────

	get lowestDiscernibleValue(): number {
		return this.layout.lowestDiscernibleValue;
	}

	get highestTrackableValue(): number {
		return this.layout.highestTrackableValue;
	}

	get significantValueDigits(): number {
		return this.layout.significantValueDigits;
	}

	get countsArrayLength(): number {
		return this.layout.countsArrayLength;
	}

	countsArrayIndex(value: number): number {
		return this.layout.countsArrayIndex(value);
	}

	valueFromIndex(index: number): number {
		return this.layout.valueFromIndex(index);
	}

	lowestEquivalentValue(value: number): number {
		return this.layout.lowestEquivalentValue(value);
	}

	highestEquivalentValue(value: number): number {
		return this.layout.highestEquivalentValue(value);
	}

	sizeOfEquivalentValueRange(value: number): number {
		return this.layout.sizeOfEquivalentValueRange(value);
	}

	valuesAreEquivalent(a: number, b: number): boolean {
		return this.layout.valuesAreEquivalent(a, b);
	}

	// ── Recording ────────────────────────────────────────────────────

	/** @throws ValueOutOfRangeError for negative, fractional or untrackable values */
	recordValue(value: number): void {
		this.recordValueWithCount(value, 1);
	}

	/**
	 * @throws ValueOutOfRangeError for negative, fractional or untrackable values
	 * @throws ConfigError when `count` is not a positive integer
	 */
	recordValueWithCount(value: number, count: number): void {
		if (!Number.isSafeInteger(count) || count <= 0) {
			throw new ConfigError(`count must be a positive integer, got ${count}`, { value, count });
		}
		const index = this.indexForRecording(value);
		this.counts[index] = (this.counts[index] ?? 0) + count;
		this._totalCount += count;
		if (value > this._maxValue) this._maxValue = value;
		if (value !== 0 && value < this._minNonZeroValue) this._minNonZeroValue = value;
	}

	/** Drop all recorded counts. Iterators over this histogram must be reset afterwards. */
	reset(): void {
		this.logger.debug({ totalCount: this._totalCount }, "Histogram reset");
		this.counts.fill(0);
		this._totalCount = 0;
		this._minNonZeroValue = Number.MAX_SAFE_INTEGER;
		this._maxValue = 0;
	}

	private indexForRecording(value: number): number {
		if (!Number.isSafeInteger(value) || value < 0) {
			throw new ValueOutOfRangeError(`value must be a non-negative integer, got ${value}`, value);
		}
		const index = this.layout.countsArrayIndex(value);
		if (index >= this.layout.countsArrayLength) {
			this.logger.warn(
				{ value, highestTrackableValue: this.layout.highestTrackableValue },
				"Value exceeds trackable range",
			);
			throw new ValueOutOfRangeError(
				`value ${value} exceeds the trackable range (highestTrackableValue ${this.layout.highestTrackableValue})`,
				value,
				{ index, countsArrayLength: this.layout.countsArrayLength },
			);
		}
		return index;
	}

	// ── Queries ──────────────────────────────────────────────────────

	get totalCount(): number {
		return this._totalCount;
	}

	countAtIndex(index: number): number {
		return this.counts[index] ?? 0;
	}

	/** @throws ValueOutOfRangeError for negative, fractional or untrackable values */
	countAtValue(value: number): number {
		return this.countAtIndex(this.indexForRecording(value));
	}

	/** Lowest equivalent of the smallest recorded value; 0 when empty or 0 was recorded. */
	get minValue(): number {
		if (this._totalCount === 0 || (this.counts[0] ?? 0) > 0) return 0;
		return this.layout.lowestEquivalentValue(this._minNonZeroValue);
	}

	/** Highest equivalent of the largest recorded value; 0 when empty. */
	get maxValue(): number {
		return this._maxValue === 0 ? 0 : this.layout.highestEquivalentValue(this._maxValue);
	}

	/**
	 * Value at or below which `percentile`% of recorded values fall, to the
	 * histogram's precision. 0 when empty.
	 * @throws ConfigError when `percentile` is NaN
	 */
	valueAtPercentile(percentile: number): number {
		if (Number.isNaN(percentile)) {
			throw new ConfigError("percentile must be a number, got NaN", { percentile });
		}
		if (this._totalCount === 0) return 0;
		const requested = Math.min(Math.max(percentile, 0), 100);
		const countAtPercentile = Math.max(
			Math.trunc((requested / 100) * this._totalCount + 0.5),
			1,
		);

		let totalToCurrentIndex = 0;
		for (let i = 0; i < this.layout.countsArrayLength; i++) {
			totalToCurrentIndex += this.counts[i] ?? 0;
			if (totalToCurrentIndex >= countAtPercentile) {
				const valueAtIndex = this.layout.valueFromIndex(i);
				return requested === 0
					? this.layout.lowestEquivalentValue(valueAtIndex)
					: this.layout.highestEquivalentValue(valueAtIndex);
			}
		}
		return 0;
	}

	// ── Iteration ────────────────────────────────────────────────────

	/**
	 * Checkpoints at human-readable percentile steps, ending at exactly 100%.
	 * @throws ConfigError when `ticksPerHalfDistance` is not a positive integer
	 */
	percentiles(
		ticksPerHalfDistance: number,
		options: PercentileIteratorOptions = {},
	): PercentileIterator {
		return new PercentileIterator(this, ticksPerHalfDistance, {
			logger: options.logger ?? this.logger,
		});
	}
}
