import { describe, expect, it } from "vitest";
import { resolveBaseUrls } from "./profile.js";
import { profileFor } from "./registry.js";

describe("resolveBaseUrls", () => {
	it("uses the profile's hosts when nothing is overridden", () => {
		expect(resolveBaseUrls(profileFor("binance"))).toEqual({
			main: "https://api.binance.com",
			hosts: { "binance.futures": "https://fapi.binance.com" },
		});
	});

	it("overrides each host independently", () => {
		const urls = resolveBaseUrls(profileFor("binance"), {
			"binance.futures": "https://testnet.binancefuture.com",
		});
		expect(urls.main).toBe("https://api.binance.com");
		expect(urls.hosts["binance.futures"]).toBe("https://testnet.binancefuture.com");
	});

	it("ignores hosts the exchange does not declare", () => {
		const urls = resolveBaseUrls(profileFor("okx"), {
			okx: "https://www.okx.com",
			"binance.futures": "https://testnet.binancefuture.com",
		});
		expect(urls).toEqual({ main: "https://www.okx.com", hosts: {} });
	});
});
