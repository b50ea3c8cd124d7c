/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas are built against the same zod instance
 * everywhere in the library.
 */

import { z } from "zod";
import { ErrorCode, HistogramError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Error containing one or more validation issues. */
export class ValidationError extends HistogramError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, ErrorCode.Validation, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	const summary = issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
	return err(new ValidationError(`Validation failed: ${summary}`, issues));
}
