import { describe, expect, it } from "vitest";
import { z } from "../lib/validation/index.js";
import { defineOperation } from "../operation/operation.js";
import {
	isConstructRequestError,
	isDeserializeResponseError,
	isRequestFailed,
	isTransportError,
} from "../shared/errors.js";
import { ApiHost } from "../shared/exchange-id.js";
import { FakeTransport } from "../transport/fake-transport.js";
import type { HttpTransport } from "../transport/types.js";
import { sampleOperation, testPipeline } from "./pipeline-test-helpers.js";

describe("transportLayer", () => {
	it("wraps a thrown transport failure in TransportError", async () => {
		const cause = new Error("socket hang up");
		const op = sampleOperation("disabled");

		const result = await testPipeline("okx", new FakeTransport(cause)).call({ operation: op }, op.response);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isTransportError(result.error)).toBe(true);
			expect(result.error.message).toBe("socket hang up");
			expect(result.error.cause).toBe(cause);
		}
	});

	it("turns an error status into RequestFailedError with the exchange's code", async () => {
		const wire = new FakeTransport(FakeTransport.json(400, { code: -1121, msg: "Invalid symbol." }));
		const op = sampleOperation("disabled");

		const result = await testPipeline("binance", wire).call({ operation: op }, op.response);

		if (result.ok || !isRequestFailed(result.error)) throw new Error("expected RequestFailedError");
		expect(result.error.status).toBe(400);
		expect(result.error.exchangeCode).toBe("-1121");
		expect(result.error.exchangeMessage).toBe("Invalid symbol.");
	});

	it("binance treats any status other than 200 as failure", async () => {
		const wire = new FakeTransport(FakeTransport.json(202, { code: -1007, msg: "Timeout." }));
		const op = sampleOperation("disabled");

		const result = await testPipeline("binance", wire).call({ operation: op }, op.response);

		if (result.ok || !isRequestFailed(result.error)) throw new Error("expected RequestFailedError");
		expect(result.error.status).toBe(202);
		expect(result.error.exchangeCode).toBe("-1007");
	});

	it("reports a failure status without an error envelope as an unreadable response", async () => {
		const wire = new FakeTransport({ status: 502, body: "<html>Bad Gateway</html>" });
		const op = sampleOperation("disabled");

		const result = await testPipeline("binance", wire).call({ operation: op }, op.response);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isDeserializeResponseError(result.error)).toBe(true);
			expect(isRequestFailed(result.error)).toBe(false);
			expect(result.error.context).toEqual({
				exchange: "binance",
				status: 502,
				body: "<html>Bad Gateway</html>",
			});
		}
	});

	it("reports a payload that does not match the operation's schema", async () => {
		const op = defineOperation({
			name: "test.count",
			method: "GET",
			path: "/count",
			response: z.object({ count: z.number() }),
		});
		const wire = new FakeTransport(FakeTransport.json(200, { data: { count: "three" } }));

		const result = await testPipeline("cryptocom", wire).call({ operation: op }, op.response);

		expect(result.ok).toBe(false);
		if (!result.ok) expect(isDeserializeResponseError(result.error)).toBe(true);
		expect(wire.lastRequest?.url).toBe("https://api.crypto.com/count");
	});

	it("sends an operation to its secondary host", async () => {
		const op = defineOperation({
			name: "test.remote",
			method: "GET",
			path: "/fapi/v1/time",
			host: ApiHost.BinanceFutures,
			response: z.unknown(),
		});
		const wire = new FakeTransport();

		await testPipeline("binance", wire).call({ operation: op }, op.response);

		expect(wire.lastRequest?.url).toBe("https://fapi.binance.com/fapi/v1/time");
	});

	it("rejects an operation whose host the exchange does not have", async () => {
		const op = defineOperation({
			name: "test.remote",
			method: "GET",
			path: "/fapi/v1/time",
			host: ApiHost.BinanceFutures,
			response: z.unknown(),
		});
		const wire = new FakeTransport();

		const result = await testPipeline("okx", wire).call({ operation: op }, op.response);

		expect(wire.requests).toHaveLength(0);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isConstructRequestError(result.error)).toBe(true);
			expect(result.error.message).toBe("okx has no binance.futures host");
		}
	});

	it("passes the caller's abort signal to the transport", async () => {
		const seen: (AbortSignal | undefined)[] = [];
		const spy: HttpTransport = {
			send: async (_request, options) => {
				seen.push(options?.signal);
				return { status: 200, body: "{}" };
			},
		};
		const controller = new AbortController();
		const op = sampleOperation("disabled");

		await testPipeline("binance", spy).call({ operation: op, signal: controller.signal }, op.response);

		expect(seen).toEqual([controller.signal]);
	});
});
