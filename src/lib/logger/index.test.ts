import { describe, expect, it } from "vitest";
import { createLogger, silentLogger } from "./index.js";

function capture(level: "debug" | "info" | "warn", bindings?: Record<string, unknown>) {
	const captured: string[] = [];
	const logger = createLogger({
		level,
		...(bindings !== undefined && { bindings }),
		destination: {
			write(msg: string) {
				captured.push(msg);
			},
		},
	});
	return { logger, captured };
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("writes structured fields and message as JSON", () => {
			const { logger, captured } = capture("info");
			logger.info({ totalCount: 12 }, "Histogram ready");

			expect(captured).toHaveLength(1);
			const line = JSON.parse(captured[0] ?? "{}");
			expect(line.msg).toBe("Histogram ready");
			expect(line.totalCount).toBe(12);
		});

		it("adds configured bindings to every line", () => {
			const { logger, captured } = capture("info", { histogram: "rtt" });
			logger.info("bound");
			expect(JSON.parse(captured[0] ?? "{}").histogram).toBe("rtt");
		});

		it("child loggers carry their bindings", () => {
			const { logger, captured } = capture("info");
			logger.child({ module: "iteration" }).warn("from child");
			expect(JSON.parse(captured[0] ?? "{}").module).toBe("iteration");
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { logger, captured } = capture("warn");

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(captured.length).toBe(1);
			expect(captured[0]).toContain("should appear");
		});

		it("accepts every valid log level", () => {
			const validLevels = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
			for (const level of validLevels) {
				expect(() => createLogger({ level })).not.toThrow();
			}
		});
	});

	describe("silentLogger", () => {
		it("discards everything, including from children", () => {
			expect(() => {
				silentLogger.info("x");
				silentLogger.warn({ a: 1 }, "y");
				silentLogger.child({ b: 2 }).error("z");
			}).not.toThrow();
			expect(silentLogger.child({})).toBe(silentLogger);
		});
	});
});
