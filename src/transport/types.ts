/**
 * Wire-level types shared by the signing, encoding and transport stages.
 */

import type { ListStyle } from "../operation/query.js";
import type { HttpMethod } from "../operation/types.js";

/** How a write (POST/DELETE) carries its parameters. */
export type WriteBody =
	/** urlencoded string with `Content-Type: application/x-www-form-urlencoded` */
	| "form"
	/** urlencoded string, no content type */
	| "raw"
	/** JSON object of the fields with `Content-Type: application/json` */
	| "json";

/** Per-exchange parameter encoding rules. */
export interface EncodingRules {
	readonly listStyle: ListStyle;
	/** Turn `%5B`/`%5D` back into brackets in parameter names */
	readonly revertBracketKeys: boolean;
	readonly writeBody: WriteBody;
}

export interface WireRequest {
	readonly method: HttpMethod;
	/** Absolute URL, query included */
	readonly url: string;
	readonly headers: Readonly<Record<string, string>>;
	/** Never set for GET */
	readonly body?: string | undefined;
}

export interface WireResponse {
	readonly status: number;
	readonly body: string;
}

export interface TransportOptions {
	readonly signal?: AbortSignal | undefined;
}

/**
 * Sends one request and resolves with whatever status came back. Rejects
 * only when no response arrived (DNS, TLS, reset, abort).
 */
export interface HttpTransport {
	send(request: WireRequest, options?: TransportOptions): Promise<WireResponse>;
}
