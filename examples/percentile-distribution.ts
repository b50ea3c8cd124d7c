/**
 * Percentile distribution — record simulated request latencies and print
 * one row per percentile checkpoint.
 *
 * Run: npm run example
 * Tune with PERCENTILE_TICKS_PER_HALF_DISTANCE / PERCENTILE_LOG_LEVEL.
 */

import { Histogram, createLogger, resolveIterationConfig } from "../src/index.js";

const config = resolveIterationConfig();
const logger = createLogger({ level: config.logLevel, bindings: { example: "distribution" } });
const histogram = Histogram.fromConfig(config, logger);

// Latencies in microseconds: mostly fast, with a slow tail.
let seed = 42;
for (let i = 0; i < 50_000; i++) {
	seed = (seed * 48_271) % 2_147_483_647;
	const fast = 800 + (seed % 400);
	histogram.recordValue(seed % 100 === 0 ? fast * 25 : fast);
}

console.log("       Value   Percentile   TotalCount");
for (const checkpoint of histogram.percentiles(config.ticksPerHalfDistance)) {
	const value = (checkpoint.valueIteratedTo / 1000).toFixed(3).padStart(12);
	const percentile = (checkpoint.percentileLevelIteratedTo / 100).toFixed(6).padStart(12);
	const count = String(checkpoint.totalCountToThisValue).padStart(12);
	console.log(`${value} ${percentile} ${count}`);
}
console.log(`#[Max = ${(histogram.maxValue / 1000).toFixed(3)}, Total count = ${histogram.totalCount}]`);
