import { describe, expect, it } from "vitest";
import {
	AuthError,
	ConfigError,
	ConstructRequestError,
	DeserializeResponseError,
	ErrorCategory,
	NotSupportedError,
	RequestFailedError,
	SdkError,
	SerializeBodyError,
	TransportError,
	classifyTransportFailure,
	isAuthError,
	isDeserializeResponseError,
	isNotSupportedError,
	isRequestFailed,
	isTransportError,
} from "./errors.js";

describe("SdkError hierarchy", () => {
	describe("error categories", () => {
		const cases: Array<[string, SdkError, ErrorCategory]> = [
			["ConstructRequestError", new ConstructRequestError("bad uri"), ErrorCategory.Fatal],
			["SerializeBodyError", new SerializeBodyError("bad field"), ErrorCategory.Fatal],
			["TransportError", new TransportError("reset"), ErrorCategory.Retryable],
			["RequestFailedError", new RequestFailedError(400, "-1100", "bad"), ErrorCategory.NonRetryable],
			[
				"DeserializeResponseError",
				new DeserializeResponseError("not json"),
				ErrorCategory.NonRetryable,
			],
			["AuthError", new AuthError("no key"), ErrorCategory.NonRetryable],
			["NotSupportedError", new NotSupportedError("nope"), ErrorCategory.Fatal],
			["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
		];

		it.each(cases)("%s has category %s", (_name, error, expected) => {
			expect(error.category).toBe(expected);
		});
	});

	describe("isRetryable", () => {
		it("only transport failures are retryable", () => {
			expect(new TransportError("fail").isRetryable).toBe(true);
			expect(new RequestFailedError(500, undefined, undefined).isRetryable).toBe(false);
			expect(new DeserializeResponseError("fail").isRetryable).toBe(false);
		});
	});

	describe("RequestFailedError", () => {
		it("carries status, code and message", () => {
			const e = new RequestFailedError(400, "-1021", "Timestamp outside recvWindow");
			expect(e.status).toBe(400);
			expect(e.exchangeCode).toBe("-1021");
			expect(e.exchangeMessage).toBe("Timestamp outside recvWindow");
			expect(e.message).toBe(
				"request failed with status 400, code: -1021, message: Timestamp outside recvWindow",
			);
			expect(e.context).toEqual({ status: 400 });
		});

		it("omits absent fields from message and JSON", () => {
			const e = new RequestFailedError(502, undefined, undefined);
			expect(e.message).toBe("request failed with status 502");
			const json = e.toJSON();
			expect(json).not.toHaveProperty("exchangeCode");
			expect(json).not.toHaveProperty("exchangeMessage");
		});
	});

	it("is instanceof Error", () => {
		expect(new TransportError("fail")).toBeInstanceOf(Error);
		expect(new TransportError("fail")).toBeInstanceOf(SdkError);
	});

	it("keeps cause out of context", () => {
		const root = new Error("boom");
		const e = new SerializeBodyError("cannot encode", { cause: root, field: "price" });
		expect(e.cause).toBe(root);
		expect(e.context).toEqual({ field: "price" });
	});
});

describe("classifyTransportFailure", () => {
	it("returns SdkError as-is", () => {
		const original = new AuthError("bad key");
		expect(classifyTransportFailure(original)).toBe(original);
	});

	it("wraps thrown errors and keeps them as cause", () => {
		const thrown = new TypeError("fetch failed");
		const e = classifyTransportFailure(thrown);
		expect(e).toBeInstanceOf(TransportError);
		expect(e.message).toBe("fetch failed");
		expect(e.cause).toBe(thrown);
	});

	it("records errno from the cause chain", () => {
		const inner = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
		const thrown = new TypeError("fetch failed", { cause: inner });
		const e = classifyTransportFailure(thrown);
		expect(e.context).toEqual({ errno: "ECONNREFUSED" });
	});

	it("marks aborted requests", () => {
		const thrown = new Error("This operation was aborted");
		thrown.name = "AbortError";
		const e = classifyTransportFailure(thrown);
		expect(e.context).toEqual({ aborted: true });
	});

	it("handles non-Error thrown values", () => {
		const e = classifyTransportFailure("socket hang up");
		expect(e).toBeInstanceOf(TransportError);
		expect(e.message).toBe("socket hang up");
	});
});

describe("toJSON", () => {
	it("serializes all fields", () => {
		const e = new TransportError("conn failed", { host: "api.example.com" });
		expect(e.toJSON()).toEqual({
			name: "TransportError",
			message: "conn failed",
			code: "TRANSPORT_ERROR",
			category: ErrorCategory.Retryable,
			retryable: true,
			context: { host: "api.example.com" },
		});
	});

	it("includes hint when provided", () => {
		const e = new SdkError("fail", "TEST", ErrorCategory.Fatal, {}, "Check the base URL");
		expect(e.toJSON()).toHaveProperty("hint", "Check the base URL");
	});

	it("adds exchange fields for RequestFailedError", () => {
		const e = new RequestFailedError(401, "50113", "Invalid Sign");
		expect(e.toJSON()).toMatchObject({
			code: "REQUEST_FAILED",
			exchangeCode: "50113",
			exchangeMessage: "Invalid Sign",
			context: { status: 401 },
		});
	});
});

describe("type guards", () => {
	it("narrow to their own class only", () => {
		expect(isRequestFailed(new RequestFailedError(400, undefined, undefined))).toBe(true);
		expect(isRequestFailed(new TransportError("x"))).toBe(false);
		expect(isTransportError(new TransportError("x"))).toBe(true);
		expect(isTransportError(new DeserializeResponseError("x"))).toBe(false);
		expect(isDeserializeResponseError(new DeserializeResponseError("x"))).toBe(true);
		expect(isAuthError(new AuthError("x"))).toBe(true);
		expect(isNotSupportedError(new NotSupportedError("x"))).toBe(true);
	});

	it("return false for null and plain errors", () => {
		expect(isRequestFailed(null)).toBe(false);
		expect(isTransportError(undefined)).toBe(false);
		expect(isAuthError(new Error("x"))).toBe(false);
	});
});
