import { encodeJsonBody, encodeQuery, revertBracketKeys } from "../operation/query.js";
import type { Field } from "../operation/types.js";
import type { SerializeBodyError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { EncodingRules } from "../transport/types.js";
import type { PreparedRequest, SignedPayload } from "./types.js";

/** Encodes fields with the exchange's list style and bracket rule. */
export function encodeParams(
	rules: EncodingRules,
	fields: readonly Field[],
): Result<string, SerializeBodyError> {
	const query = encodeQuery(fields, rules.listStyle);
	if (!query.ok) return query;
	return ok(rules.revertBracketKeys ? revertBracketKeys(query.value) : query.value);
}

/** True when the request's body is the JSON object of its fields. */
export function sendsJsonBody(request: PreparedRequest): boolean {
	return request.method !== "GET" && request.rules.writeBody === "json";
}

/** Payload for a request that carries no authentication. */
export function unsignedPayload(
	request: PreparedRequest,
): Result<SignedPayload, SerializeBodyError> {
	const params = encodeParams(request.rules, request.fields);
	if (!params.ok) return params;

	if (sendsJsonBody(request)) {
		const body = encodeJsonBody(request.fields);
		if (!body.ok) return err(body.error);
		return ok({ params: params.value, jsonBody: body.value, headers: {}, derived: {} });
	}
	return ok({ params: params.value, headers: {}, derived: {} });
}
