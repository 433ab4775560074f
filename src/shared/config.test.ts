import { describe, expect, it } from "vitest";
import { DEFAULT_SDK_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("SdkConfig", () => {
	describe("DEFAULT_SDK_CONFIG", () => {
		it("has a 5 second recvWindow and info logging", () => {
			expect(DEFAULT_SDK_CONFIG.recvWindowMs).toBe(5_000);
			expect(DEFAULT_SDK_CONFIG.logLevel).toBe("info");
			expect(DEFAULT_SDK_CONFIG.baseUrls).toEqual({});
		});
	});

	describe("configFromEnv", () => {
		it("returns empty object when no CEXWIRE_ vars are set", () => {
			expect(configFromEnv({ HOME: "/tmp" })).toEqual({});
		});

		it("reads CEXWIRE_RECV_WINDOW_MS", () => {
			expect(configFromEnv({ CEXWIRE_RECV_WINDOW_MS: "10000" }).recvWindowMs).toBe(10_000);
		});

		it.each(["abc", "0", "-5", "12.5", "100abc"])(
			"rejects CEXWIRE_RECV_WINDOW_MS=%s",
			(raw) => {
				expect(() => configFromEnv({ CEXWIRE_RECV_WINDOW_MS: raw })).toThrow(ConfigError);
			},
		);

		it("reads CEXWIRE_LOG_LEVEL", () => {
			expect(configFromEnv({ CEXWIRE_LOG_LEVEL: "debug" }).logLevel).toBe("debug");
		});

		it("rejects unknown log levels", () => {
			expect(() => configFromEnv({ CEXWIRE_LOG_LEVEL: "verbose" })).toThrow(
				'Invalid CEXWIRE_LOG_LEVEL: "verbose"',
			);
		});

		it("reads per-exchange base URLs and strips trailing slashes", () => {
			const config = configFromEnv({
				CEXWIRE_BINANCE_BASE_URL: "https://testnet.binance.vision/",
				CEXWIRE_OKX_BASE_URL: "https://www.okx.com",
			});
			expect(config.baseUrls).toEqual({
				binance: "https://testnet.binance.vision",
				okx: "https://www.okx.com",
			});
		});

		it("reads a secondary host's base URL", () => {
			const config = configFromEnv({
				CEXWIRE_BINANCE_FUTURES_BASE_URL: "https://testnet.binancefuture.com/",
			});
			expect(config.baseUrls).toEqual({ "binance.futures": "https://testnet.binancefuture.com" });
		});

		it("rejects a relative base URL", () => {
			expect(() => configFromEnv({ CEXWIRE_UPBIT_BASE_URL: "api.upbit.com" })).toThrow(
				ConfigError,
			);
		});

		it("falls back to process.env", () => {
			process.env.CEXWIRE_RECV_WINDOW_MS = "7000";
			try {
				expect(configFromEnv().recvWindowMs).toBe(7_000);
			} finally {
				Reflect.deleteProperty(process.env, "CEXWIRE_RECV_WINDOW_MS");
			}
		});
	});

	describe("resolveConfig", () => {
		it("returns defaults with no layers", () => {
			expect(resolveConfig()).toEqual(DEFAULT_SDK_CONFIG);
		});

		it("later layers win and base URLs merge", () => {
			const config = resolveConfig(
				{ recvWindowMs: 7_000, baseUrls: { okx: "https://www.okx.com" } },
				{ logLevel: "warn", baseUrls: { binance: "https://testnet.binance.vision" } },
			);
			expect(config).toEqual({
				recvWindowMs: 7_000,
				logLevel: "warn",
				baseUrls: { okx: "https://www.okx.com", binance: "https://testnet.binance.vision" },
			});
		});

		it("strips trailing slashes from explicitly passed base URLs", () => {
			const config = resolveConfig({
				baseUrls: {
					binance: "https://testnet.binance.vision/",
					"binance.futures": "https://testnet.binancefuture.com//",
					okx: "https://www.okx.com",
				},
			});
			expect(config.baseUrls).toEqual({
				binance: "https://testnet.binance.vision",
				okx: "https://www.okx.com",
				"binance.futures": "https://testnet.binancefuture.com",
			});
		});
	});
});
