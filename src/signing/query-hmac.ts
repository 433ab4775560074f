/**
 * Query-string HMAC signing (binance).
 *
 * `recvWindow` and `timestamp` are appended to the encoded fields, the whole
 * string is signed with HMAC-SHA256 and `signature=<hex>` is appended last.
 * The result goes in the URL for GET and in the form body for writes.
 */

import { hasQuery } from "../operation/operation.js";
import type { Field } from "../operation/types.js";
import { ConstructRequestError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { hmacSha256Hex } from "./digest.js";
import { encodeParams } from "./payload.js";
import type { SigningStrategy } from "./types.js";

export const API_KEY_HEADER = "X-MBX-APIKEY";

/** `signature=<hex>` joined onto the signed string, without a leading `&` when it is empty. */
export function appendSignature(signed: string, signature: string): string {
	return signed.length === 0 ? `signature=${signature}` : `${signed}&signature=${signature}`;
}

export const queryHmacSigner: SigningStrategy = {
	kind: "query-hmac",

	async sign(request, keys, ctx) {
		if (hasQuery(request.path)) {
			return err(
				new ConstructRequestError("signed request path must not carry a query", {
					path: request.path,
				}),
			);
		}

		const timestamp = ctx.clock.now();
		const fields: Field[] = [
			...request.fields,
			["recvWindow", ctx.recvWindowMs],
			["timestamp", timestamp],
		];
		const signed = encodeParams(request.rules, fields);
		if (!signed.ok) return signed;

		const signature = hmacSha256Hex(keys.secret, signed.value);
		return ok({
			params: appendSignature(signed.value, signature),
			headers: { [API_KEY_HEADER]: keys.apiKey },
			derived: {
				timestamp: String(timestamp),
				recvWindow: String(ctx.recvWindowMs),
				signature,
			},
		});
	},
};
