import { bench, describe } from "vitest";
import { Histogram } from "../src/histogram/histogram.js";

function latencyHistogram(n: number): Histogram {
	const h = Histogram.create({ highestTrackableValue: 3_600_000_000, significantValueDigits: 3 });
	let x = 12_345;
	for (let i = 0; i < n; i++) {
		// MINSTD; deterministic so runs are comparable
		x = (x * 48_271) % 2_147_483_647;
		h.recordValue(100 + (x % 50_000));
	}
	return h;
}

const h10k = latencyHistogram(10_000);
const h100k = latencyHistogram(100_000);

describe("percentile iteration", () => {
	bench("5 ticks per half-distance over 10k values", () => {
		for (const _ of h10k.percentiles(5)) {
			// drain
		}
	});

	bench("5 ticks per half-distance over 100k values", () => {
		for (const _ of h100k.percentiles(5)) {
			// drain
		}
	});

	bench("reset and re-walk one iterator", () => {
		const iter = h10k.percentiles(1);
		for (let i = 0; i < 5; i++) {
			iter.reset(1 + i);
			while (iter.hasNext()) iter.next();
		}
	});
});

describe("recording", () => {
	bench("recordValue x 10k", () => {
		latencyHistogram(10_000);
	});
});
