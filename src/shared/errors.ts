/**
 * HistogramError hierarchy — structured error classification.
 *
 * Every failure in this library is a programming or configuration error;
 * nothing here is transient, so there is no retry category. The `code`
 * field is stable and safe to match on.
 */

/** Stable error codes carried by every HistogramError. */
export const ErrorCode = {
	Config: "CONFIG_ERROR",
	Validation: "VALIDATION_FAILED",
	IteratorExhausted: "ITERATOR_EXHAUSTED",
	ConcurrentModification: "CONCURRENT_MODIFICATION",
	ValueOutOfRange: "VALUE_OUT_OF_RANGE",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Options for constructing HistogramError subclasses with optional cause chain. */
interface HistogramErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for histogram recording and iteration. */
export class HistogramError extends Error {
	readonly code: ErrorCode;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: ErrorCode,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "HistogramError";
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Invalid construction or reset parameters (tick density, bucket layout, counts). */
export class ConfigError extends HistogramError {
	constructor(message: string, context: Record<string, unknown> & HistogramErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, ErrorCode.Config, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** `next()` was called on an iterator whose `hasNext()` is false. */
export class ExhaustedIteratorError extends HistogramError {
	constructor(message: string, context: Record<string, unknown> & HistogramErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			ErrorCode.IteratorExhausted,
			rest,
			"Check hasNext() before calling next(), or reset() the iterator",
		);
		this.name = "ExhaustedIteratorError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The histogram's total count changed while an iteration session was active. */
export class ConcurrentModificationError extends HistogramError {
	constructor(message: string, context: Record<string, unknown> & HistogramErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			ErrorCode.ConcurrentModification,
			rest,
			"Record into a copy, or reset() the iterator after recording",
		);
		this.name = "ConcurrentModificationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A value outside the trackable range, negative, or not an integer. */
export class ValueOutOfRangeError extends HistogramError {
	readonly value: number;

	constructor(
		message: string,
		value: number,
		context: Record<string, unknown> & HistogramErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, ErrorCode.ValueOutOfRange, rest);
		this.name = "ValueOutOfRangeError";
		this.value = value;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			value: this.value,
		};
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for any HistogramError. */
export function isHistogramError(e: unknown): e is HistogramError {
	return e instanceof HistogramError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for ExhaustedIteratorError. */
export function isExhaustedIteratorError(e: unknown): e is ExhaustedIteratorError {
	return e instanceof ExhaustedIteratorError;
}

/** Type guard for ConcurrentModificationError. */
export function isConcurrentModificationError(e: unknown): e is ConcurrentModificationError {
	return e instanceof ConcurrentModificationError;
}

/** Type guard for ValueOutOfRangeError. */
export function isValueOutOfRangeError(e: unknown): e is ValueOutOfRangeError {
	return e instanceof ValueOutOfRangeError;
}
