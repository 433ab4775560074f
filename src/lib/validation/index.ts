/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Response and error-envelope schemas are built with the re-exported `z`
 * so the decoding layer never imports zod directly.
 */

import { z } from "zod";
import { ErrorCategory, SdkError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** Any schema producing T, whatever input it accepts (transforms included). */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends SdkError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: Schema<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	return err(new ValidationError("Validation failed", toIssues(result.error)));
}

/** Flatten zod issues into path/message pairs. */
export function toIssues(error: z.ZodError): ValidationIssue[] {
	return error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
}

/** Render issues as `a.b: message; c: message` for log lines and error messages. */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues
		.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
		.join("; ");
}
