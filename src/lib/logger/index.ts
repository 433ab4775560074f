/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Auto-redacts opaque credential objects (anything with `__opaque: true`)
 * and censors the signing headers every exchange adds, plus any extra
 * paths the caller configures.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels, plus `silent` to disable output. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
}

/** Structured logger interface with auto-redaction of opaque credentials. */
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

/** Header paths censored in every logger, wherever a `headers` object is logged. */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	'headers["X-MBX-APIKEY"]',
	'headers["OK-ACCESS-KEY"]',
	'headers["OK-ACCESS-SIGN"]',
	'headers["OK-ACCESS-PASSPHRASE"]',
	"headers.Authorization",
	"*.headers.Authorization",
	'*.headers["X-MBX-APIKEY"]',
	'*.headers["OK-ACCESS-SIGN"]',
];

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Method = "info" | "warn" | "error" | "debug";

function emit(
	pinoLogger: pino.Logger,
	method: Method,
	msgOrObj: string | Record<string, unknown> | null | undefined,
	msg?: string,
): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[method](String(msgOrObj ?? ""));
	} else if (isOpaqueCredential(msgOrObj)) {
		pinoLogger[method]({ credentials: "[REDACTED]" }, msg ?? "");
	} else {
		pinoLogger[method](redactCredentials(msgOrObj), msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ exchange: "okx", status: 200 }, "response received");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
