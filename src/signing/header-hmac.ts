/**
 * Header HMAC signing (okx).
 *
 * The prehash is `timestamp + METHOD + requestPath`, where requestPath
 * carries the `?query` suffix only when the query is in the URL (GET).
 * A write sends its encoded fields as the body, outside the prehash.
 */

import { AuthError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { hmacSha256Base64 } from "./digest.js";
import { encodeParams } from "./payload.js";
import type { SigningStrategy } from "./types.js";

export const OkxHeader = {
	Key: "OK-ACCESS-KEY",
	Timestamp: "OK-ACCESS-TIMESTAMP",
	Passphrase: "OK-ACCESS-PASSPHRASE",
	Sign: "OK-ACCESS-SIGN",
} as const;

export const headerHmacSigner: SigningStrategy = {
	kind: "header-hmac",

	async sign(request, keys, ctx) {
		if (!keys.passphrase) {
			return err(
				new AuthError("passphrase is required for signed requests", {
					exchange: request.exchange,
				}),
			);
		}

		const params = encodeParams(request.rules, request.fields);
		if (!params.ok) return params;

		// ISO-8601 UTC with milliseconds, e.g. 2020-12-08T09:08:57.715Z
		const timestamp = new Date(ctx.clock.now()).toISOString();
		const requestPath =
			request.method === "GET" && params.value.length > 0
				? `${request.path}?${params.value}`
				: request.path;
		const prehash = timestamp + request.method + requestPath;
		const signature = hmacSha256Base64(keys.secret, prehash);

		return ok({
			params: params.value,
			headers: {
				[OkxHeader.Key]: keys.apiKey,
				[OkxHeader.Timestamp]: timestamp,
				[OkxHeader.Passphrase]: keys.passphrase,
				[OkxHeader.Sign]: signature,
			},
			derived: { timestamp, prehash, signature },
		});
	},
};
