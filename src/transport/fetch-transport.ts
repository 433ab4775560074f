import type { HttpTransport, TransportOptions, WireRequest, WireResponse } from "./types.js";

export type FetchFn = typeof fetch;

export interface FetchTransportConfig {
	/** Defaults to the global `fetch` */
	readonly fetchFn?: FetchFn | undefined;
}

/** HttpTransport over the WHATWG fetch API. Rejections propagate to the caller. */
export class FetchTransport implements HttpTransport {
	private readonly fetchFn: FetchFn;

	constructor(config: FetchTransportConfig = {}) {
		this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
	}

	async send(request: WireRequest, options: TransportOptions = {}): Promise<WireResponse> {
		const init: RequestInit = {
			method: request.method,
			headers: { ...request.headers },
			...(request.body !== undefined && { body: request.body }),
			...(options.signal !== undefined && { signal: options.signal }),
		};
		const response = await this.fetchFn(request.url, init);
		return { status: response.status, body: await response.text() };
	}
}
