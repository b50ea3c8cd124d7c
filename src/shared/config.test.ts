import { describe, expect, it } from "vitest";
import { DEFAULT_ITERATION_CONFIG, configFromEnv, resolveIterationConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("IterationConfig", () => {
	describe("DEFAULT_ITERATION_CONFIG", () => {
		it("has readable defaults", () => {
			expect(DEFAULT_ITERATION_CONFIG.ticksPerHalfDistance).toBe(5);
			expect(DEFAULT_ITERATION_CONFIG.significantValueDigits).toBe(3);
			expect(DEFAULT_ITERATION_CONFIG.highestTrackableValue).toBe(3_600_000_000);
			expect(DEFAULT_ITERATION_CONFIG.logLevel).toBe("warn");
		});

		it("all fields are defined (no undefined values)", () => {
			for (const [key, value] of Object.entries(DEFAULT_ITERATION_CONFIG)) {
				expect(value, `${key} should not be undefined`).toBeDefined();
			}
		});
	});

	describe("configFromEnv", () => {
		it("returns empty object when no PERCENTILE_ env vars", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads every supported variable", () => {
			const result = configFromEnv({
				PERCENTILE_TICKS_PER_HALF_DISTANCE: "2",
				PERCENTILE_SIGNIFICANT_DIGITS: "4",
				PERCENTILE_HIGHEST_TRACKABLE_VALUE: "60000000",
				PERCENTILE_LOG_LEVEL: "debug",
			});
			expect(result).toEqual({
				ticksPerHalfDistance: 2,
				significantValueDigits: 4,
				highestTrackableValue: 60_000_000,
				logLevel: "debug",
			});
		});

		it("allows zero significant digits", () => {
			expect(configFromEnv({ PERCENTILE_SIGNIFICANT_DIGITS: "0" })).toEqual({
				significantValueDigits: 0,
			});
		});

		it.each([
			["PERCENTILE_TICKS_PER_HALF_DISTANCE", "0"],
			["PERCENTILE_TICKS_PER_HALF_DISTANCE", "-4"],
			["PERCENTILE_TICKS_PER_HALF_DISTANCE", "5abc"],
			["PERCENTILE_TICKS_PER_HALF_DISTANCE", "2.5"],
			["PERCENTILE_SIGNIFICANT_DIGITS", "6"],
			["PERCENTILE_HIGHEST_TRACKABLE_VALUE", "1"],
			["PERCENTILE_LOG_LEVEL", "verbose"],
		])("rejects %s=%s", (key, raw) => {
			expect(() => configFromEnv({ [key]: raw })).toThrow(ConfigError);
		});

		it("reads process.env by default", () => {
			process.env["PERCENTILE_TICKS_PER_HALF_DISTANCE"] = "7";
			try {
				expect(configFromEnv().ticksPerHalfDistance).toBe(7);
			} finally {
				Reflect.deleteProperty(process.env, "PERCENTILE_TICKS_PER_HALF_DISTANCE");
			}
		});
	});

	describe("resolveIterationConfig", () => {
		it("layers defaults, environment and overrides", () => {
			const config = resolveIterationConfig(
				{ ticksPerHalfDistance: 10 },
				{ PERCENTILE_TICKS_PER_HALF_DISTANCE: "2", PERCENTILE_SIGNIFICANT_DIGITS: "2" },
			);
			expect(config).toEqual({
				...DEFAULT_ITERATION_CONFIG,
				ticksPerHalfDistance: 10,
				significantValueDigits: 2,
			});
		});

		it("falls back to defaults", () => {
			expect(resolveIterationConfig({}, {})).toEqual(DEFAULT_ITERATION_CONFIG);
		});
	});
});
