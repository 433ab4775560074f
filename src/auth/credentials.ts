/**
 * Opaque credential container: secrets never leak through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { AuthError } from "../shared/errors.js";
import { type ExchangeId, envPrefix } from "../shared/exchange-id.js";
import type { ApiKeySet, Credentials } from "./types.js";

// ── Private store ────────────────────────────────────────────────────

const store = new WeakMap<object, ApiKeySet>();

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Seals an API key set into opaque Credentials.
 *
 * @example
 * const credentials = createCredentials({ apiKey: "key", secret: "secret" });
 * console.log(credentials); // [REDACTED]
 * @throws AuthError if the API key or secret is empty
 */
export function createCredentials(keys: ApiKeySet): Credentials {
	if (keys.apiKey.length === 0) {
		throw new AuthError("API key must not be empty");
	}
	if (keys.secret.length === 0) {
		throw new AuthError("API secret must not be empty");
	}
	const obj: { __opaque: true; toString: () => string; toJSON: () => string } = Object.create(null);
	obj.__opaque = true as const;
	obj.toString = () => "[REDACTED]";
	obj.toJSON = () => "[REDACTED]";
	Object.defineProperty(obj, Symbol.for("nodejs.util.inspect.custom"), {
		value: () => "[REDACTED]",
	});
	store.set(obj, { ...keys });
	return obj as unknown as Credentials;
}

// ── Accessor ─────────────────────────────────────────────────────────

/**
 * Unwraps opaque credentials to retrieve a copy of the raw key set.
 * This is the only way to access the underlying keys.
 *
 * @throws AuthError if the object was not produced by createCredentials
 */
export function unwrapCredentials(credentials: Credentials): ApiKeySet {
	const keys = store.get(credentials);
	if (!keys) {
		throw new AuthError("Invalid credentials object");
	}
	return { ...keys };
}

// ── Environment ──────────────────────────────────────────────────────

/**
 * Reads `<EXCHANGE>_API_KEY`, `<EXCHANGE>_API_SECRET` and the optional
 * `<EXCHANGE>_PASSPHRASE` (e.g. `OKX_PASSPHRASE`).
 * @throws AuthError if the key or secret variable is missing
 */
export function credentialsFromEnv(
	exchange: ExchangeId,
	env: NodeJS.ProcessEnv = process.env,
): Credentials {
	const prefix = envPrefix(exchange);
	const apiKey = env[`${prefix}_API_KEY`];
	const secret = env[`${prefix}_API_SECRET`];
	if (!apiKey || !secret) {
		throw new AuthError(`Missing ${prefix}_API_KEY or ${prefix}_API_SECRET`, { exchange });
	}
	const passphrase = env[`${prefix}_PASSPHRASE`];
	return createCredentials({ apiKey, secret, ...(passphrase ? { passphrase } : {}) });
}
