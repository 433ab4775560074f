/**
 * Middleware chain types. A Handler is generic in the payload type, so one
 * chain serves every operation: the schema travels with the call down to
 * the decoder.
 */

import type { Schema } from "../lib/validation/index.js";
import type { Operation, PathParams } from "../operation/types.js";
import type { PreparedRequest, SignedPayload } from "../signing/types.js";
import type { SdkError } from "../shared/errors.js";
import type { ApiHost } from "../shared/exchange-id.js";
import type { Result } from "../shared/result.js";

/** An operation minus its response schema, which the handler takes separately. */
export type OperationDescriptor = Omit<Operation<unknown>, "response">;

/** Outermost request: an operation tagged with its path parameters. */
export interface ExchangeCall {
	readonly operation: OperationDescriptor;
	readonly pathParams?: PathParams | undefined;
	readonly signal?: AbortSignal | undefined;
}

/** After the exchange stage: path rendered, encoding rules attached. */
export interface PreparedCall {
	readonly request: PreparedRequest;
	/** Secondary host to send to; absent for the main one */
	readonly host?: ApiHost | undefined;
	readonly signal?: AbortSignal | undefined;
}

/** After the auth stage: the exact parameters and headers to send. */
export interface SignedCall extends PreparedCall {
	readonly payload: SignedPayload;
}

export type Handler<Req> = <T>(request: Req, schema: Schema<T>) => Promise<Result<T, SdkError>>;

/** Wraps an inner handler, turning Outer requests into Inner ones. */
export interface Layer<Outer, Inner> {
	readonly name: string;
	wrap(next: Handler<Inner>): Handler<Outer>;
}

/** The innermost stage; it talks to the network. */
export interface Stage<Req> {
	readonly name: string;
	readonly handle: Handler<Req>;
}
