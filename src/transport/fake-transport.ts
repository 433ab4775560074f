import type { HttpTransport, WireRequest, WireResponse } from "./types.js";

type Scripted = WireResponse | Error;

/**
 * In-process HttpTransport for tests. Replays scripted responses in order
 * (repeating the last one) and records every request it receives. An Error
 * in the script is thrown as a transport failure.
 */
export class FakeTransport implements HttpTransport {
	readonly requests: WireRequest[] = [];
	private readonly script: readonly Scripted[];
	private index = 0;

	constructor(...script: readonly Scripted[]) {
		this.script = script.length > 0 ? script : [{ status: 200, body: "{}" }];
	}

	/** A response whose body is `JSON.stringify(body)`. */
	static json(status: number, body: unknown): WireResponse {
		return { status, body: JSON.stringify(body) };
	}

	get lastRequest(): WireRequest | undefined {
		return this.requests[this.requests.length - 1];
	}

	async send(request: WireRequest): Promise<WireResponse> {
		this.requests.push(request);
		const next = this.script[Math.min(this.index, this.script.length - 1)];
		this.index++;
		if (next === undefined) {
			throw new Error("FakeTransport has no scripted response");
		}
		if (next instanceof Error) throw next;
		return next;
	}
}
