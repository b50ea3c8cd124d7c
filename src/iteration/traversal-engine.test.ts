import { describe, expect, it } from "vitest";
import { Histogram } from "../histogram/histogram.js";
import { ConcurrentModificationError, ExhaustedIteratorError } from "../shared/errors.js";
import { TraversalEngine } from "./traversal-engine.js";
import type { TickStrategy, TraversalState } from "./types.js";

/** Emits every `step` recorded counts. */
class CountStepStrategy implements TickStrategy {
	private nextCount: number;
	private lastCount = 0;
	private readonly step: number;

	constructor(step: number) {
		this.step = step;
		this.nextCount = step;
	}

	reachedIterationLevel(state: TraversalState): boolean {
		return state.cumulativeCountThroughCurrentBucket >= this.nextCount;
	}

	incrementIterationLevel(): void {
		this.lastCount = this.nextCount;
		this.nextCount += this.step;
	}

	percentileIteratedTo(state: TraversalState): number {
		return (100 * this.nextCount) / state.totalRecordedCount;
	}

	percentileIteratedFrom(state: TraversalState): number {
		return (100 * this.lastCount) / state.totalRecordedCount;
	}
}

function histogramOf(...values: number[]): Histogram {
	const h = Histogram.create({ highestTrackableValue: 10_000, significantValueDigits: 2 });
	for (const v of values) h.recordValue(v);
	return h;
}

describe("TraversalEngine", () => {
	it("exposes the captured total and a zeroed cursor after construction", () => {
		const engine = new TraversalEngine(histogramOf(5, 6), new CountStepStrategy(1));
		expect(engine.totalRecordedCount).toBe(2);
		expect(engine.cumulativeCountThroughCurrentBucket).toBe(0);
		expect(engine.countAtCurrentBucket).toBe(0);
		expect(engine.hasNext()).toBe(true);
	});

	it("stops at each bucket the strategy accepts", () => {
		const engine = new TraversalEngine(histogramOf(1, 2, 3), new CountStepStrategy(1));

		const values: number[] = [];
		while (engine.hasNext()) values.push(engine.step().valueIteratedTo);

		expect(values).toEqual([1, 2, 3]);
		expect(engine.cumulativeCountThroughCurrentBucket).toBe(3);
	});

	it("labels steps with the strategy's levels, read before it advances", () => {
		const engine = new TraversalEngine(histogramOf(1, 2, 3, 4), new CountStepStrategy(2));

		const first = engine.step();
		expect(first.percentileLevelIteratedTo).toBe(50);
		expect(first.percentileLevelIteratedFrom).toBe(0);
		expect(first.valueIteratedTo).toBe(2);

		const second = engine.step();
		expect(second.percentileLevelIteratedTo).toBe(100);
		expect(second.percentileLevelIteratedFrom).toBe(50);
		expect(second.valueIteratedFrom).toBe(2);
		expect(second.countAddedInThisIterationStep).toBe(2);
	});

	it("adds a bucket's count once even when it is checked repeatedly", () => {
		const h = histogramOf();
		h.recordValueWithCount(7, 4);
		const strategy = new CountStepStrategy(1);
		const engine = new TraversalEngine(h, strategy);

		const records = [engine.step(), engine.step(), engine.step(), engine.step()];

		expect(records.map((r) => r.totalCountToThisValue)).toEqual([4, 4, 4, 4]);
		expect(records.map((r) => r.totalValueToThisValue)).toEqual([28, 28, 28, 28]);
		expect(engine.hasNext()).toBe(false);
	});

	it("throws ExhaustedIteratorError when it runs out of buckets", () => {
		const engine = new TraversalEngine(histogramOf(1, 2, 3), new CountStepStrategy(1));
		engine.step();
		engine.step();
		engine.step();
		expect(() => engine.step()).toThrow(ExhaustedIteratorError);
	});

	it("throws ConcurrentModificationError when the total count moves", () => {
		const h = histogramOf(1, 2);
		const engine = new TraversalEngine(h, new CountStepStrategy(1));
		h.recordValue(9);
		expect(() => engine.hasNext()).toThrow(ConcurrentModificationError);
	});

	it("restarts over another histogram on reset", () => {
		const engine = new TraversalEngine(histogramOf(1), new CountStepStrategy(1));
		engine.step();
		engine.reset(histogramOf(40, 50));
		expect(engine.totalRecordedCount).toBe(2);
		expect(engine.cumulativeCountThroughCurrentBucket).toBe(0);
		expect(engine.step().valueIteratedFrom).toBe(0);
	});
});
