import { describe, expect, it } from "vitest";
import { EXCHANGE_IDS } from "../shared/exchange-id.js";
import { z } from "../lib/validation/index.js";
import { ok } from "../shared/result.js";
import { FakeTransport } from "../transport/fake-transport.js";
import { Pipeline } from "./pipeline.js";
import { ANY_ENVELOPE, sampleOperation, testCredentials, testPipeline } from "./pipeline-test-helpers.js";
import type { Handler, Layer } from "./types.js";

function tracingLayer(name: string, trace: string[]): Layer<string, string> {
	return {
		name,
		wrap(next: Handler<string>): Handler<string> {
			return (request, schema) => {
				trace.push(name);
				return next(`${request}>${name}`, schema);
			};
		},
	};
}

describe("Pipeline", () => {
	it("runs layers outermost first and reaches the stage last", async () => {
		const trace: string[] = [];
		const chain = Pipeline.create<string>({
			name: "inner",
			handle: async (request, schema) => ok(schema.parse(request)),
		})
			.with(tracingLayer("middle", trace))
			.with(tracingLayer("outer", trace));

		const result = await chain.call("req", z.string());

		expect(result).toEqual({ ok: true, value: "req>outer>middle" });
		expect(trace).toEqual(["outer", "middle"]);
		expect(chain.stageNames()).toEqual(["outer", "middle", "inner"]);
	});

	it("with() leaves the original pipeline untouched", () => {
		const base = Pipeline.create<string>({ name: "inner", handle: async (r, s) => ok(s.parse(r)) });
		base.with(tracingLayer("outer", []));

		expect(base.stageNames()).toEqual(["inner"]);
	});

	it("the exchange chain is exchange → auth → transport", () => {
		expect(testPipeline("binance", new FakeTransport()).stageNames()).toEqual([
			"exchange",
			"auth",
			"transport",
		]);
	});
});

describe("exchange chain", () => {
	it.each(EXCHANGE_IDS)("%s: a disabled operation carries no auth headers", async (exchange) => {
		const transport = new FakeTransport(FakeTransport.json(200, ANY_ENVELOPE));
		const chain = testPipeline(exchange, transport);

		const op = sampleOperation("disabled");
		const result = await chain.call({ operation: op }, op.response);

		expect(result.ok).toBe(true);
		expect(transport.lastRequest?.headers).toEqual({ Accept: "application/json" });
		expect(transport.lastRequest?.url.endsWith("/sample?a=1&b=2")).toBe(true);
	});

	it.each(["bithumb", "cryptocom"] as const)(
		"%s: a private operation goes out exactly like a disabled one",
		async (exchange) => {
			const transport = new FakeTransport(FakeTransport.json(200, ANY_ENVELOPE));
			const chain = testPipeline(exchange, transport, testCredentials());

			const unsigned = sampleOperation("disabled", "POST");
			const signed = sampleOperation("private", "POST");
			await chain.call({ operation: unsigned }, unsigned.response);
			await chain.call({ operation: signed }, signed.response);

			expect(transport.requests).toHaveLength(2);
			expect(transport.requests[1]).toEqual(transport.requests[0]);
			expect(transport.requests[0]?.body).toBe("a=1&b=2");
		},
	);

	it("unwraps the profile's envelope", async () => {
		const bare = new FakeTransport(FakeTransport.json(200, ANY_ENVELOPE));
		const wrapped = new FakeTransport(FakeTransport.json(200, ANY_ENVELOPE));
		const op = sampleOperation("disabled");

		const binance = await testPipeline("binance", bare).call({ operation: op }, op.response);
		const bithumb = await testPipeline("bithumb", wrapped).call({ operation: op }, op.response);

		expect(binance).toEqual({ ok: true, value: { status: "0000", data: {} } });
		expect(bithumb).toEqual({ ok: true, value: {} });
	});
});
