import { describe, expect, it } from "vitest";
import { isConstructRequestError } from "./errors.js";
import { MarketKind, formatMarket, market, parseMarket } from "./market.js";

describe("parseMarket", () => {
	it.each([
		["spot:BTC/USDT", "BTC", "USDT", MarketKind.Spot],
		["swap:ETH/USDT", "ETH", "USDT", MarketKind.Swap],
		["inverse:BTC/USD", "BTC", "USD", MarketKind.Inverse],
	])("parses %s", (text, base, quote, kind) => {
		const result = parseMarket(text);
		expect(result).toEqual({ ok: true, value: { base, quote, kind } });
	});

	it.each(["BTC/USDT", "spot:BTCUSDT", "spot:/USDT", "spot:BTC/", ":BTC/USDT", "spot:A/B/C"])(
		"rejects malformed %s",
		(text) => {
			const result = parseMarket(text);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(isConstructRequestError(result.error)).toBe(true);
				expect(result.error.message).toBe(`cannot parse market ${text}`);
			}
		},
	);

	it("rejects unknown kinds", () => {
		const result = parseMarket("margin:BTC/USDT");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("invalid market kind margin");
		}
	});
});

describe("market", () => {
	it("defaults to spot", () => {
		expect(market("BTC", "KRW")).toEqual({ base: "BTC", quote: "KRW", kind: "spot" });
	});

	it("formats back to text", () => {
		expect(formatMarket(market("ETH", "USDT", MarketKind.Swap))).toBe("swap:ETH/USDT");
	});
});
