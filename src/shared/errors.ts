/**
 * SdkError hierarchy: structured error classification for the request pipeline.
 *
 * Every error has a category (retryable, non-retryable, fatal). The pipeline
 * never acts on it; callers use it to decide whether a fresh attempt is worth
 * building.
 */

/** Error severity categories exposed to callers that wrap the pipeline. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing SdkError subclasses with optional cause chain. */
interface SdkErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for every pipeline stage. */
export class SdkError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "SdkError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Request construction ─────────────────────────────────────────────

/** URI or method assembly failed (bad path template, unsupported method, pre-existing query). */
export class ConstructRequestError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONSTRUCT_REQUEST", ErrorCategory.Fatal, rest);
		this.name = "ConstructRequestError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Field set could not be encoded as a query string or JSON body. */
export class SerializeBodyError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SERIALIZE_BODY", ErrorCategory.Fatal, rest);
		this.name = "SerializeBodyError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Transport ────────────────────────────────────────────────────────

/** The underlying transport failed before a response arrived (DNS, TLS, reset, abort). */
export class TransportError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "TRANSPORT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TransportError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Response classification ──────────────────────────────────────────

/** The exchange answered with a non-success status; carries its own diagnostic fields. */
export class RequestFailedError extends SdkError {
	readonly status: number;
	readonly exchangeCode: string | undefined;
	readonly exchangeMessage: string | undefined;

	constructor(
		status: number,
		exchangeCode: string | undefined,
		exchangeMessage: string | undefined,
		context: Record<string, unknown> & SdkErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(
			`request failed with status ${status}` +
				(exchangeCode !== undefined ? `, code: ${exchangeCode}` : "") +
				(exchangeMessage !== undefined ? `, message: ${exchangeMessage}` : ""),
			"REQUEST_FAILED",
			ErrorCategory.NonRetryable,
			{ status, ...rest },
		);
		this.name = "RequestFailedError";
		this.status = status;
		this.exchangeCode = exchangeCode;
		this.exchangeMessage = exchangeMessage;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			...(this.exchangeCode !== undefined && { exchangeCode: this.exchangeCode }),
			...(this.exchangeMessage !== undefined && { exchangeMessage: this.exchangeMessage }),
		};
	}
}

/** Success status, but the body is not JSON or does not match the expected schema. */
export class DeserializeResponseError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "DESERIALIZE_RESPONSE", ErrorCategory.NonRetryable, rest);
		this.name = "DeserializeResponseError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Boundary errors ──────────────────────────────────────────────────

/** Non-retryable error for missing or malformed credentials. */
export class AuthError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "AuthError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The exchange client has no operation for the requested capability. */
export class NotSupportedError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "NOT_SUPPORTED", ErrorCategory.Fatal, rest);
		this.name = "NotSupportedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends SdkError {
	constructor(message: string, context: Record<string, unknown> & SdkErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function ownCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function errnoCode(error: Error): string | undefined {
	const code = ownCode(error);
	if (code !== undefined) return code;
	return error.cause instanceof Error ? ownCode(error.cause) : undefined;
}

/**
 * Wraps anything the transport threw into a TransportError, keeping the
 * original value as `cause`. SdkErrors pass through untouched.
 */
export function classifyTransportFailure(error: unknown): SdkError {
	if (error instanceof SdkError) return error;
	if (error instanceof Error) {
		const code = errnoCode(error);
		const aborted = error.name === "AbortError" || error.name === "TimeoutError";
		return new TransportError(error.message, {
			cause: error,
			...(code !== undefined && { errno: code }),
			...(aborted && { aborted: true }),
		});
	}
	return new TransportError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ConstructRequestError. */
export function isConstructRequestError(e: unknown): e is ConstructRequestError {
	return e instanceof ConstructRequestError;
}

/** Type guard for SerializeBodyError. */
export function isSerializeBodyError(e: unknown): e is SerializeBodyError {
	return e instanceof SerializeBodyError;
}

/** Type guard for TransportError. */
export function isTransportError(e: unknown): e is TransportError {
	return e instanceof TransportError;
}

/** Type guard for RequestFailedError. */
export function isRequestFailed(e: unknown): e is RequestFailedError {
	return e instanceof RequestFailedError;
}

/** Type guard for DeserializeResponseError. */
export function isDeserializeResponseError(e: unknown): e is DeserializeResponseError {
	return e instanceof DeserializeResponseError;
}

/** Type guard for AuthError. */
export function isAuthError(e: unknown): e is AuthError {
	return e instanceof AuthError;
}

/** Type guard for NotSupportedError. */
export function isNotSupportedError(e: unknown): e is NotSupportedError {
	return e instanceof NotSupportedError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
