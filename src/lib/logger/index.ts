/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Library code depends on the small `Logger` interface, never on pino
 * directly. Components default to `silentLogger` so iteration stays quiet
 * unless a caller opts in.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly bindings?: Record<string, unknown>;
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function emit(pinoLogger: pino.Logger, method: LogMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "object" && msgOrObj !== null) {
		pinoLogger[method](msgOrObj, msg ?? "");
	} else {
		pinoLogger[method](String(msgOrObj ?? ""));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * const it = histogram.percentiles(5, { logger: logger.child({ histogram: "rtt" }) });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	if (config.bindings) {
		pinoLogger = pinoLogger.child(config.bindings);
	}

	return wrapPino(pinoLogger);
}

/** Logger that drops every message. */
export const silentLogger: Logger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
	child: () => silentLogger,
};
