import { decodeJwt } from "jose";
import { describe, expect, it } from "vitest";
import { hmacSha256Hex, sha512Hex } from "../signing/digest.js";
import { isAuthError } from "../shared/errors.js";
import { FakeTransport } from "../transport/fake-transport.js";
import { ANY_ENVELOPE, TEST_NONCE, sampleOperation, testCredentials, testPipeline } from "./pipeline-test-helpers.js";

function transport(): FakeTransport {
	return new FakeTransport(FakeTransport.json(200, ANY_ENVELOPE));
}

describe("authLayer", () => {
	it("rejects a private operation when the client has no credentials", async () => {
		const wire = transport();
		const op = sampleOperation("private");

		const result = await testPipeline("binance", wire).call({ operation: op }, op.response);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isAuthError(result.error)).toBe(true);
			expect(result.error.message).toBe("test.sample is private and the client has no credentials");
			expect(result.error.context).toEqual({ exchange: "binance", operation: "test.sample" });
		}
		expect(wire.requests).toHaveLength(0);
	});

	it("binance: signs the query and adds the API key header", async () => {
		const wire = transport();
		const op = sampleOperation("private");

		await testPipeline("binance", wire, testCredentials()).call({ operation: op }, op.response);

		const signed = "a=1&b=2&recvWindow=5000&timestamp=1700000000000";
		expect(wire.lastRequest?.url).toBe(
			`https://api.binance.com/sample?${signed}&signature=${hmacSha256Hex("test-secret", signed)}`,
		);
		expect(wire.lastRequest?.headers).toEqual({
			Accept: "application/json",
			"X-MBX-APIKEY": "test-key",
		});
	});

	it("binance: a signed write sends the signed string as a form body", async () => {
		const wire = transport();
		const op = sampleOperation("private", "POST");

		await testPipeline("binance", wire, testCredentials()).call({ operation: op }, op.response);

		const signed = "a=1&b=2&recvWindow=5000&timestamp=1700000000000";
		expect(wire.lastRequest?.url).toBe("https://api.binance.com/sample");
		expect(wire.lastRequest?.body).toBe(`${signed}&signature=${hmacSha256Hex("test-secret", signed)}`);
		expect(wire.lastRequest?.headers["Content-Type"]).toBe("application/x-www-form-urlencoded");
	});

	it("okx: signs into headers and leaves the query as is", async () => {
		const wire = transport();
		const op = sampleOperation("private");

		await testPipeline("okx", wire, testCredentials()).call({ operation: op }, op.response);

		const headers = wire.lastRequest?.headers ?? {};
		expect(wire.lastRequest?.url).toBe("https://aws.okx.com/sample?a=1&b=2");
		expect(headers["OK-ACCESS-KEY"]).toBe("test-key");
		expect(headers["OK-ACCESS-PASSPHRASE"]).toBe("test-passphrase");
		expect(headers["OK-ACCESS-SIGN"]).toMatch(/^[A-Za-z0-9+/]+=*$/);
	});

	it("upbit: sends a bearer token hashing the query", async () => {
		const wire = transport();
		const op = sampleOperation("private");

		await testPipeline("upbit", wire, testCredentials()).call({ operation: op }, op.response);

		const authorization = wire.lastRequest?.headers.Authorization ?? "";
		expect(authorization.startsWith("Bearer ")).toBe(true);
		expect(decodeJwt(authorization.slice("Bearer ".length))).toEqual({
			access_key: "test-key",
			nonce: TEST_NONCE,
			query_hash: sha512Hex("a=1&b=2"),
			query_hash_alg: "SHA512",
		});
	});

	it("upbit: a signed write carries a JSON body", async () => {
		const wire = transport();
		const op = sampleOperation("private", "POST");

		await testPipeline("upbit", wire, testCredentials()).call({ operation: op }, op.response);

		expect(wire.lastRequest?.body).toBe('{"a":"1","b":2}');
		expect(wire.lastRequest?.headers["Content-Type"]).toBe("application/json");
	});

	it("signing is deterministic under a fixed clock and nonce", async () => {
		const wire = transport();
		const chain = testPipeline("binance", wire, testCredentials());
		const op = sampleOperation("private");

		await chain.call({ operation: op }, op.response);
		await chain.call({ operation: op }, op.response);

		expect(wire.requests[1]).toEqual(wire.requests[0]);
	});
});
