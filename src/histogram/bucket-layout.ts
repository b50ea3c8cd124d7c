/**
 * Log-linear bucket layout.
 *
 * Bucket 0 holds `subBucketCount` unit-wide slots; every later bucket covers
 * twice the value range of the one before it with half as many new slots, so
 * relative precision stays within `significantValueDigits` decimal digits
 * across the whole trackable range.
 *
 * Values are non-negative safe integers. JavaScript bitwise operators are
 * 32-bit, so shifts are done with powers of two instead.
 */

const TWO_POW_32 = 2 ** 32;

/** floor(log2(value)) for a safe integer value >= 1. */
export function floorLog2(value: number): number {
	if (value < TWO_POW_32) return 31 - Math.clz32(value);
	return 63 - Math.clz32(Math.floor(value / TWO_POW_32));
}

function shiftLeft(value: number, bits: number): number {
	return value * 2 ** bits;
}

function shiftRight(value: number, bits: number): number {
	return Math.floor(value / 2 ** bits);
}

export class BucketLayout {
	readonly lowestDiscernibleValue: number;
	readonly highestTrackableValue: number;
	readonly significantValueDigits: number;

	readonly unitMagnitude: number;
	readonly subBucketHalfCountMagnitude: number;
	readonly subBucketCount: number;
	readonly subBucketHalfCount: number;
	readonly bucketCount: number;
	readonly countsArrayLength: number;

	/** Arguments are expected to be validated by the caller. */
	constructor(
		lowestDiscernibleValue: number,
		highestTrackableValue: number,
		significantValueDigits: number,
	) {
		this.lowestDiscernibleValue = lowestDiscernibleValue;
		this.highestTrackableValue = highestTrackableValue;
		this.significantValueDigits = significantValueDigits;

		const largestValueWithSingleUnitResolution = 2 * 10 ** significantValueDigits;
		this.unitMagnitude = floorLog2(lowestDiscernibleValue);

		const subBucketCountMagnitude = Math.ceil(
			Math.log(largestValueWithSingleUnitResolution) / Math.log(2),
		);
		this.subBucketHalfCountMagnitude = Math.max(subBucketCountMagnitude, 1) - 1;
		this.subBucketCount = 2 ** (this.subBucketHalfCountMagnitude + 1);
		this.subBucketHalfCount = this.subBucketCount / 2;

		this.bucketCount = this.bucketsNeededToCoverValue(highestTrackableValue);
		this.countsArrayLength = (this.bucketCount + 1) * this.subBucketHalfCount;
	}

	countsArrayIndex(value: number): number {
		const bucketIndex = this.bucketIndex(value);
		const subBucketIndex = this.subBucketIndex(value, bucketIndex);
		const bucketBaseIndex = shiftLeft(bucketIndex + 1, this.subBucketHalfCountMagnitude);
		return bucketBaseIndex + subBucketIndex - this.subBucketHalfCount;
	}

	/** Lowest value that maps to `index`. */
	valueFromIndex(index: number): number {
		let bucketIndex = shiftRight(index, this.subBucketHalfCountMagnitude) - 1;
		let subBucketIndex = (index % this.subBucketHalfCount) + this.subBucketHalfCount;
		if (bucketIndex < 0) {
			subBucketIndex -= this.subBucketHalfCount;
			bucketIndex = 0;
		}
		return shiftLeft(subBucketIndex, bucketIndex + this.unitMagnitude);
	}

	sizeOfEquivalentValueRange(value: number): number {
		const bucketIndex = this.bucketIndex(value);
		const subBucketIndex = this.subBucketIndex(value, bucketIndex);
		const adjustedBucket = subBucketIndex >= this.subBucketCount ? bucketIndex + 1 : bucketIndex;
		return 2 ** (this.unitMagnitude + adjustedBucket);
	}

	lowestEquivalentValue(value: number): number {
		const bucketIndex = this.bucketIndex(value);
		const subBucketIndex = this.subBucketIndex(value, bucketIndex);
		return shiftLeft(subBucketIndex, bucketIndex + this.unitMagnitude);
	}

	highestEquivalentValue(value: number): number {
		return this.lowestEquivalentValue(value) + this.sizeOfEquivalentValueRange(value) - 1;
	}

	valuesAreEquivalent(a: number, b: number): boolean {
		return this.lowestEquivalentValue(a) === this.lowestEquivalentValue(b);
	}

	private bucketIndex(value: number): number {
		if (value < 1) return 0;
		return Math.max(0, floorLog2(value) - this.unitMagnitude - this.subBucketHalfCountMagnitude);
	}

	private subBucketIndex(value: number, bucketIndex: number): number {
		return shiftRight(value, bucketIndex + this.unitMagnitude);
	}

	private bucketsNeededToCoverValue(value: number): number {
		let smallestUntrackableValue = shiftLeft(this.subBucketCount, this.unitMagnitude);
		let bucketsNeeded = 1;
		while (smallestUntrackableValue <= value) {
			if (smallestUntrackableValue > Number.MAX_SAFE_INTEGER / 2) {
				return bucketsNeeded + 1;
			}
			smallestUntrackableValue *= 2;
			bucketsNeeded++;
		}
		return bucketsNeeded;
	}
}
