/**
 * Shared fixtures for signing tests.
 */

import type { ApiKeySet } from "../auth/types.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Field, HttpMethod } from "../operation/types.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import { FakeClock, FixedNonceSource } from "../shared/time.js";
import type { EncodingRules } from "../transport/types.js";
import type { PreparedRequest, SigningContext } from "./types.js";

export const TEST_KEYS: ApiKeySet = { apiKey: "test-key", secret: "test-secret" };
export const TEST_KEYS_WITH_PASSPHRASE: ApiKeySet = { ...TEST_KEYS, passphrase: "test-passphrase" };

export const TEST_NONCE = "00000000-0000-4000-8000-000000000000";

export const FORM_RULES: EncodingRules = { listStyle: "comma", revertBracketKeys: false, writeBody: "form" };
export const RAW_RULES: EncodingRules = { listStyle: "comma", revertBracketKeys: false, writeBody: "raw" };
export const JSON_RULES: EncodingRules = { listStyle: "brackets", revertBracketKeys: true, writeBody: "json" };

export function signingContext(nowMs: number, recvWindowMs = 5_000): SigningContext {
	return {
		clock: new FakeClock(nowMs),
		nonces: new FixedNonceSource(TEST_NONCE),
		recvWindowMs,
		logger: silentLogger(),
	};
}

export function prepared(
	exchange: ExchangeId,
	method: HttpMethod,
	path: string,
	fields: readonly Field[],
	rules: EncodingRules,
): PreparedRequest {
	return { exchange, operation: `${exchange}.test`, method, path, fields, auth: "private", rules };
}
