import { describe, expect, it, vi } from "vitest";
import { FetchTransport } from "./fetch-transport.js";

describe("FetchTransport", () => {
	it("passes method, headers and body to fetch and returns status and text", async () => {
		const fetchFn = vi.fn(async () => new Response('{"ok":true}', { status: 201 }));
		const transport = new FetchTransport({ fetchFn });

		const response = await transport.send({
			method: "POST",
			url: "https://api.example.com/v1/orders",
			headers: { Accept: "application/json" },
			body: "a=1",
		});

		expect(response).toEqual({ status: 201, body: '{"ok":true}' });
		expect(fetchFn).toHaveBeenCalledWith("https://api.example.com/v1/orders", {
			method: "POST",
			headers: { Accept: "application/json" },
			body: "a=1",
		});
	});

	it("leaves body and signal out of the init when absent", async () => {
		const fetchFn = vi.fn(async () => new Response("[]", { status: 200 }));
		const transport = new FetchTransport({ fetchFn });

		await transport.send({ method: "GET", url: "https://api.example.com/x", headers: {} });

		expect(fetchFn).toHaveBeenCalledWith("https://api.example.com/x", {
			method: "GET",
			headers: {},
		});
	});

	it("forwards the abort signal", async () => {
		const fetchFn = vi.fn(async () => new Response(null, { status: 204 }));
		const controller = new AbortController();
		await new FetchTransport({ fetchFn }).send(
			{ method: "GET", url: "https://api.example.com/x", headers: {} },
			{ signal: controller.signal },
		);

		expect(fetchFn).toHaveBeenCalledWith("https://api.example.com/x", {
			method: "GET",
			headers: {},
			signal: controller.signal,
		});
	});

	it("rejects when fetch rejects", async () => {
		const failure = new TypeError("fetch failed");
		const transport = new FetchTransport({
			fetchFn: async () => {
				throw failure;
			},
		});

		await expect(
			transport.send({ method: "GET", url: "https://api.example.com/x", headers: {} }),
		).rejects.toBe(failure);
	});
});
