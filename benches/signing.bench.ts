import { bench, describe } from "vitest";
import { createCredentials, unwrapCredentials } from "../src/auth/credentials.js";
import { silentLogger } from "../src/lib/logger/index.js";
import type { Field } from "../src/operation/types.js";
import { bearerJwtSigner } from "../src/signing/bearer-jwt.js";
import { headerHmacSigner } from "../src/signing/header-hmac.js";
import { queryHmacSigner } from "../src/signing/query-hmac.js";
import type { PreparedRequest, SigningContext } from "../src/signing/types.js";
import { FakeClock, FixedNonceSource } from "../src/shared/time.js";

const keys = unwrapCredentials(
	createCredentials({ apiKey: "test-key", secret: "test-secret", passphrase: "test-passphrase" }),
);

const ctx: SigningContext = {
	clock: new FakeClock(1_700_000_000_000),
	nonces: new FixedNonceSource("00000000-0000-4000-8000-000000000000"),
	recvWindowMs: 5_000,
	logger: silentLogger(),
};

const fields: readonly Field[] = [
	["symbol", "BTCUSDT"],
	["side", "BUY"],
	["type", "LIMIT"],
	["timeInForce", "GTC"],
	["quantity", "0.001"],
	["price", "1000"],
];

function request(exchange: PreparedRequest["exchange"], json: boolean): PreparedRequest {
	return {
		exchange,
		operation: `${exchange}.bench`,
		method: "POST",
		path: "/order",
		fields,
		auth: "private",
		rules: json
			? { listStyle: "brackets", revertBracketKeys: true, writeBody: "json" }
			: { listStyle: "comma", revertBracketKeys: false, writeBody: "form" },
	};
}

describe("signing", () => {
	bench("query hmac", async () => {
		await queryHmacSigner.sign(request("binance", false), keys, ctx);
	});

	bench("header hmac", async () => {
		await headerHmacSigner.sign(request("okx", false), keys, ctx);
	});

	bench("bearer jwt", async () => {
		await bearerJwtSigner.sign(request("upbit", true), keys, ctx);
	});
});
