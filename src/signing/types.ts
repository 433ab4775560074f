/**
 * Signing stage types. A strategy turns a prepared request plus key material
 * into the exact parameter string that will be sent and the headers that
 * authenticate it.
 */

import type { ApiKeySet } from "../auth/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { AuthTag, Field, HttpMethod } from "../operation/types.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import type { SdkError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { Clock, NonceSource } from "../shared/time.js";
import type { EncodingRules } from "../transport/types.js";

/** An operation after its path template has been rendered. */
export interface PreparedRequest {
	readonly exchange: ExchangeId;
	readonly operation: string;
	readonly method: HttpMethod;
	/** Rendered path, no query */
	readonly path: string;
	readonly fields: readonly Field[];
	readonly auth: AuthTag;
	readonly rules: EncodingRules;
}

export interface SignedPayload {
	/**
	 * Encoded parameter string. For GET it becomes the URL query; for writes
	 * with a `form` or `raw` body it is the body.
	 */
	readonly params: string;
	/** JSON text sent instead of `params` on writes with a `json` body */
	readonly jsonBody?: string | undefined;
	/** Headers added by signing; empty when unsigned */
	readonly headers: Readonly<Record<string, string>>;
	/** Values sampled or computed while signing (timestamp, nonce, signature, …) */
	readonly derived: Readonly<Record<string, string>>;
}

export interface SigningContext {
	readonly clock: Clock;
	readonly nonces: NonceSource;
	readonly recvWindowMs: number;
	readonly logger: Logger;
}

export type SignerKind = "query-hmac" | "header-hmac" | "bearer-jwt" | "none";

export interface SigningStrategy {
	readonly kind: SignerKind;
	sign(
		request: PreparedRequest,
		keys: ApiKeySet,
		ctx: SigningContext,
	): Promise<Result<SignedPayload, SdkError>>;
}
