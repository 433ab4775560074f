/**
 * Shared fixtures for pipeline tests: a full exchange → auth → transport
 * chain over a FakeTransport, with a fixed clock and nonce.
 */

import { createCredentials } from "../auth/credentials.js";
import type { Credentials } from "../auth/types.js";
import { resolveBaseUrls } from "../exchanges/profile.js";
import { profileFor } from "../exchanges/registry.js";
import { silentLogger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { defineOperation } from "../operation/operation.js";
import type { AuthTag, HttpMethod, Operation } from "../operation/types.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import { FakeClock, FixedNonceSource } from "../shared/time.js";
import type { HttpTransport } from "../transport/types.js";
import { authLayer } from "./auth-layer.js";
import { exchangeLayer } from "./exchange-layer.js";
import { Pipeline } from "./pipeline.js";
import { transportLayer } from "./transport-layer.js";
import type { ExchangeCall } from "./types.js";

export const TEST_NOW = 1_700_000_000_000;
export const TEST_NONCE = "00000000-0000-4000-8000-000000000000";

/** Unwraps under every envelope: bare, `data` and `status-data`. */
export const ANY_ENVELOPE = { status: "0000", data: {} };

export function testCredentials(): Credentials {
	return createCredentials({ apiKey: "test-key", secret: "test-secret", passphrase: "test-passphrase" });
}

export function sampleOperation(auth: AuthTag, method: HttpMethod = "GET"): Operation<unknown> {
	return defineOperation({
		name: "test.sample",
		method,
		path: "/sample",
		fields: [
			["a", "1"],
			["b", 2],
		],
		auth,
		response: z.unknown(),
	});
}

export function testPipeline(
	exchange: ExchangeId,
	transport: HttpTransport,
	credentials?: Credentials,
): Pipeline<ExchangeCall> {
	const profile = profileFor(exchange);
	const logger = silentLogger();
	return Pipeline.create(transportLayer(profile, resolveBaseUrls(profile), transport, logger))
		.with(
			authLayer(profile, credentials, {
				clock: new FakeClock(TEST_NOW),
				nonces: new FixedNonceSource(TEST_NONCE),
				recvWindowMs: 5_000,
				logger,
			}),
		)
		.with(exchangeLayer(profile, logger));
}
