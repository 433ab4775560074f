/**
 * SDK configuration: defaults plus an environment overlay.
 *
 * Explicit options passed to a client win over environment values, which
 * win over DEFAULT_SDK_CONFIG.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";
import { API_HOSTS, EXCHANGE_IDS, type HostId, envPrefix } from "./exchange-id.js";
import { Duration } from "./time.js";

export interface SdkConfig {
	/** Binance `recvWindow` in milliseconds */
	readonly recvWindowMs: number;
	readonly logLevel: LogLevel;
	/**
	 * Base URL overrides (e.g. a testnet host), keyed by exchange or by
	 * secondary host such as `binance.futures`. Trailing slashes are dropped.
	 */
	readonly baseUrls: Readonly<Partial<Record<HostId, string>>>;
}

export const DEFAULT_SDK_CONFIG: SdkConfig = {
	recvWindowMs: Duration.seconds(5),
	logLevel: "info",
	baseUrls: {},
};

/** Mutable builder shape for Partial<SdkConfig>. */
interface MutableSdkConfig {
	recvWindowMs?: number;
	logLevel?: LogLevel;
	baseUrls?: Partial<Record<HostId, string>>;
}

/**
 * Reads SDK config values from environment variables.
 * Supported: CEXWIRE_RECV_WINDOW_MS, CEXWIRE_LOG_LEVEL and
 * CEXWIRE_<HOST>_BASE_URL (e.g. CEXWIRE_BINANCE_BASE_URL or
 * CEXWIRE_BINANCE_FUTURES_BASE_URL).
 * @throws ConfigError if a variable is set to an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SdkConfig> {
	const result: MutableSdkConfig = {};

	const recvWindow = env["CEXWIRE_RECV_WINDOW_MS"];
	if (recvWindow) {
		result.recvWindowMs = parsePositiveInt("CEXWIRE_RECV_WINDOW_MS", recvWindow);
	}

	const level = env["CEXWIRE_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(`Invalid CEXWIRE_LOG_LEVEL: "${level}"`, {
				allowed: [...LOG_LEVELS],
			});
		}
		result.logLevel = level;
	}

	const baseUrls: Partial<Record<HostId, string>> = {};
	for (const host of [...EXCHANGE_IDS, ...API_HOSTS]) {
		const key = `CEXWIRE_${envPrefix(host)}_BASE_URL`;
		const raw = env[key];
		if (!raw) continue;
		if (!URL.canParse(raw)) {
			throw new ConfigError(`Invalid ${key}: "${raw}" is not an absolute URL`);
		}
		baseUrls[host] = raw.replace(/\/+$/, "");
	}
	if (Object.keys(baseUrls).length > 0) {
		result.baseUrls = baseUrls;
	}

	return result;
}

/**
 * Merge overrides onto the defaults; base URL maps are merged key by key
 * and stripped of trailing slashes, whichever layer they came from.
 */
export function resolveConfig(...layers: ReadonlyArray<Partial<SdkConfig>>): SdkConfig {
	let merged: SdkConfig = DEFAULT_SDK_CONFIG;
	for (const layer of layers) {
		merged = {
			recvWindowMs: layer.recvWindowMs ?? merged.recvWindowMs,
			logLevel: layer.logLevel ?? merged.logLevel,
			baseUrls: { ...merged.baseUrls, ...normalizeBaseUrls(layer.baseUrls ?? {}) },
		};
	}
	return merged;
}

function normalizeBaseUrls(
	urls: Readonly<Partial<Record<HostId, string>>>,
): Partial<Record<HostId, string>> {
	const normalized: Partial<Record<HostId, string>> = {};
	for (const host of [...EXCHANGE_IDS, ...API_HOSTS]) {
		const url = urls[host];
		if (url !== undefined) normalized[host] = url.replace(/\/+$/, "");
	}
	return normalized;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parsePositiveInt(envKey: string, raw: string): number {
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a positive integer`);
	}
	return parsed;
}
