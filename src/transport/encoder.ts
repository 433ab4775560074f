/**
 * Transport encoder: places a signed payload on the wire.
 *
 * GET carries the parameter string as the URL query and no body. Writes
 * carry it as the body: urlencoded (`form` or `raw`) or the JSON object
 * of the fields (`json`).
 */

import type { PreparedRequest, SignedPayload } from "../signing/types.js";
import { SerializeBodyError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { WireRequest, WriteBody } from "./types.js";

const CONTENT_TYPE: Readonly<Record<WriteBody, string | undefined>> = {
	form: "application/x-www-form-urlencoded",
	raw: undefined,
	json: "application/json",
};

export function encodeWireRequest(
	baseUrl: string,
	request: PreparedRequest,
	payload: SignedPayload,
): Result<WireRequest, SerializeBodyError> {
	const headers: Record<string, string> = { Accept: "application/json" };

	if (request.method === "GET") {
		const query = payload.params.length > 0 ? `?${payload.params}` : "";
		return ok({
			method: request.method,
			url: `${baseUrl}${request.path}${query}`,
			headers: { ...headers, ...payload.headers },
		});
	}

	const writeBody = request.rules.writeBody;
	let body: string;
	if (writeBody === "json") {
		if (payload.jsonBody === undefined) {
			return err(
				new SerializeBodyError("JSON body missing from payload", {
					operation: request.operation,
				}),
			);
		}
		body = payload.jsonBody;
	} else {
		body = payload.params;
	}

	const contentType = CONTENT_TYPE[writeBody];
	if (contentType !== undefined) headers["Content-Type"] = contentType;

	return ok({
		method: request.method,
		url: `${baseUrl}${request.path}`,
		headers: { ...headers, ...payload.headers },
		body,
	});
}
