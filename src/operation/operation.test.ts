import { describe, expect, it } from "vitest";
import { z } from "../lib/validation/index.js";
import { ConstructRequestError } from "../shared/errors.js";
import { defineOperation, hasQuery, renderPath } from "./operation.js";
import type { Field } from "./types.js";

describe("defineOperation", () => {
	it("defaults auth to disabled and fields to empty", () => {
		const op = defineOperation({
			name: "test.ping",
			method: "GET",
			path: "/ping",
			response: z.object({}),
		});
		expect(op.auth).toBe("disabled");
		expect(op.fields).toEqual([]);
		expect("host" in op).toBe(false);
	});

	it("keeps a secondary host", () => {
		const op = defineOperation({
			name: "test.remote",
			method: "GET",
			path: "/remote",
			host: "binance.futures",
			response: z.unknown(),
		});
		expect(op.host).toBe("binance.futures");
	});

	it("freezes the operation and copies fields", () => {
		const fields: Field[] = [["symbol", "BTCUSDT"]];
		const op = defineOperation({
			name: "test.depth",
			method: "GET",
			path: "/depth",
			fields,
			response: z.unknown(),
		});
		fields.push(["limit", 5]);

		expect(op.fields).toEqual([["symbol", "BTCUSDT"]]);
		expect(Object.isFrozen(op)).toBe(true);
		expect(Object.isFrozen(op.fields)).toBe(true);
	});
});

describe("renderPath", () => {
	it("fills placeholders in order", () => {
		const result = renderPath("/public/orderbook/{orderCurrency}_{paymentCurrency}", {
			orderCurrency: "BTC",
			paymentCurrency: "KRW",
		});
		expect(result).toEqual({ ok: true, value: "/public/orderbook/BTC_KRW" });
	});

	it("percent-encodes parameter values", () => {
		const result = renderPath("/v2/{name}", { name: "a b/c" });
		expect(result).toEqual({ ok: true, value: "/v2/a%20b%2Fc" });
	});

	it("returns a template without placeholders unchanged", () => {
		expect(renderPath("/api/v3/depth")).toEqual({ ok: true, value: "/api/v3/depth" });
	});

	it("reports missing parameters", () => {
		const result = renderPath("/public/orderbook/{orderCurrency}_{paymentCurrency}", {
			orderCurrency: "BTC",
		});
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConstructRequestError);
			expect(result.error.message).toBe("missing path parameter: paymentCurrency");
		}
	});

	it("rejects relative templates", () => {
		const result = renderPath("orders");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("path template must start with /");
	});

	it("rejects unmatched braces", () => {
		const result = renderPath("/orders/{id");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("malformed path template");
	});
});

describe("hasQuery", () => {
	it("detects a query component", () => {
		expect(hasQuery("/api/v3/order?symbol=BTCUSDT")).toBe(true);
		expect(hasQuery("/api/v3/order")).toBe(false);
	});
});
