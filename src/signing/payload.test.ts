import { describe, expect, it } from "vitest";
import { encodeParams, unsignedPayload } from "./payload.js";
import { FORM_RULES, JSON_RULES, RAW_RULES, prepared } from "./signing-test-helpers.js";

describe("encodeParams", () => {
	it("reverts bracket keys only when the rules ask for it", () => {
		const fields = [["states", ["wait"]]] as const;
		expect(encodeParams(JSON_RULES, fields)).toEqual({ ok: true, value: "states[]=wait" });
		expect(encodeParams({ ...JSON_RULES, revertBracketKeys: false }, fields)).toEqual({
			ok: true,
			value: "states%5B%5D=wait",
		});
		expect(encodeParams(FORM_RULES, fields)).toEqual({ ok: true, value: "states=wait" });
	});
});

describe("unsignedPayload", () => {
	it("adds a JSON body for writes under json rules", () => {
		const request = prepared("upbit", "DELETE", "/v1/order", [["uuid", "abc"]], JSON_RULES);
		expect(unsignedPayload(request)).toEqual({
			ok: true,
			value: { params: "uuid=abc", jsonBody: '{"uuid":"abc"}', headers: {}, derived: {} },
		});
	});

	it("keeps only the encoded string for GET", () => {
		const request = prepared("upbit", "GET", "/v1/orderbook", [["markets", "KRW-BTC"]], JSON_RULES);
		expect(unsignedPayload(request)).toEqual({
			ok: true,
			value: { params: "markets=KRW-BTC", headers: {}, derived: {} },
		});
	});

	it("propagates encoding failures", () => {
		const request = prepared("okx", "POST", "/x", [["px", Number.NaN]], RAW_RULES);
		expect(unsignedPayload(request).ok).toBe(false);
	});
});
