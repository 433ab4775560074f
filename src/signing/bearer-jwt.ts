/**
 * Bearer JWT signing (upbit).
 *
 * The token's `query_hash` covers the urlencoded parameters, while a write
 * transmits the JSON encoding of the same fields. The two are produced
 * independently and are not the same bytes.
 */

import { type JWTPayload, SignJWT } from "jose";
import { encodeJsonBody } from "../operation/query.js";
import { AuthError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { sha512Hex } from "./digest.js";
import { encodeParams, sendsJsonBody } from "./payload.js";
import type { SigningStrategy } from "./types.js";

export const QUERY_HASH_ALG = "SHA512";

interface UpbitClaims extends JWTPayload {
	access_key: string;
	nonce: string;
	query_hash?: string;
	query_hash_alg?: string;
}

export const bearerJwtSigner: SigningStrategy = {
	kind: "bearer-jwt",

	async sign(request, keys, ctx) {
		const params = encodeParams(request.rules, request.fields);
		if (!params.ok) return params;

		let jsonBody: string | undefined;
		if (sendsJsonBody(request)) {
			const body = encodeJsonBody(request.fields);
			if (!body.ok) return body;
			jsonBody = body.value;
		}

		const nonce = ctx.nonces.next();
		const claims: UpbitClaims = { access_key: keys.apiKey, nonce };
		if (params.value.length > 0) {
			claims.query_hash = sha512Hex(params.value);
			claims.query_hash_alg = QUERY_HASH_ALG;
		}

		let token: string;
		try {
			token = await new SignJWT(claims)
				.setProtectedHeader({ alg: "HS256", typ: "JWT" })
				.sign(new TextEncoder().encode(keys.secret));
		} catch (error) {
			return err(new AuthError("failed to sign token", { cause: error, exchange: request.exchange }));
		}

		return ok({
			params: params.value,
			jsonBody,
			headers: { Authorization: `Bearer ${token}` },
			derived: {
				nonce,
				token,
				...(claims.query_hash !== undefined && { queryHash: claims.query_hash }),
			},
		});
	},
};
