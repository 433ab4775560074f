import { bearerJwtSigner } from "./bearer-jwt.js";
import { headerHmacSigner } from "./header-hmac.js";
import { noopSigner } from "./noop.js";
import { queryHmacSigner } from "./query-hmac.js";
import type { SignerKind, SigningStrategy } from "./types.js";

const SIGNERS: Readonly<Record<SignerKind, SigningStrategy>> = {
	"query-hmac": queryHmacSigner,
	"header-hmac": headerHmacSigner,
	"bearer-jwt": bearerJwtSigner,
	none: noopSigner,
};

export function signerFor(kind: SignerKind): SigningStrategy {
	return SIGNERS[kind];
}

export type {
	PreparedRequest,
	SignedPayload,
	SignerKind,
	SigningContext,
	SigningStrategy,
} from "./types.js";
export { encodeParams, sendsJsonBody, unsignedPayload } from "./payload.js";
export { API_KEY_HEADER, appendSignature, queryHmacSigner } from "./query-hmac.js";
export { OkxHeader, headerHmacSigner } from "./header-hmac.js";
export { QUERY_HASH_ALG, bearerJwtSigner } from "./bearer-jwt.js";
export { noopSigner } from "./noop.js";
