import { describe, expect, it } from "vitest";
import { API_HOSTS, ApiHost, EXCHANGE_IDS, ExchangeId, envPrefix, isExchangeId } from "./exchange-id.js";

describe("ExchangeId", () => {
	it("lists the five venues in order", () => {
		expect(EXCHANGE_IDS).toEqual(["binance", "okx", "upbit", "bithumb", "cryptocom"]);
	});

	it("isExchangeId narrows known names only", () => {
		expect(isExchangeId("okx")).toBe(true);
		expect(isExchangeId("OKX")).toBe(false);
		expect(isExchangeId("kraken")).toBe(false);
	});

	it("envPrefix upper-cases the id", () => {
		expect(envPrefix(ExchangeId.Cryptocom)).toBe("CRYPTOCOM");
	});

	it("envPrefix turns a secondary host's dot into an underscore", () => {
		expect(envPrefix(ApiHost.BinanceFutures)).toBe("BINANCE_FUTURES");
	});

	it("lists binance futures as the only secondary host", () => {
		expect(API_HOSTS).toEqual(["binance.futures"]);
	});
});
