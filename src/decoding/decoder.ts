/**
 * Response decoder: success bodies become typed payloads, failure bodies
 * carrying the exchange's error envelope become RequestFailedError. A failure
 * body is never parsed as a payload; one without a recognisable error
 * envelope is a DeserializeResponseError.
 */

import { type Schema, formatIssues, validate } from "../lib/validation/index.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import { DeserializeResponseError, RequestFailedError, type SdkError } from "../shared/errors.js";
import { err, ok, tryCatch } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { WireResponse } from "../transport/types.js";
import type { Envelope, ResponseRules } from "./types.js";

const EXCERPT_LENGTH = 200;

export function bodyExcerpt(body: string): string {
	return body.length > EXCERPT_LENGTH ? `${body.slice(0, EXCERPT_LENGTH)}…` : body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unwrapEnvelope(envelope: Envelope, json: unknown): unknown {
	switch (envelope) {
		case "bare":
			return json;
		case "data":
			return isRecord(json) && "data" in json ? json.data : undefined;
		case "status-data":
			return isRecord(json) && typeof json.status === "string" && "data" in json
				? json.data
				: undefined;
	}
}

/** Decodes one response for `exchange` against the operation's payload schema. */
export function decodeResponse<T>(
	exchange: ExchangeId,
	rules: ResponseRules,
	response: WireResponse,
	schema: Schema<T>,
): Result<T, SdkError> {
	const { status, body } = response;
	const parsed = tryCatch((): unknown => JSON.parse(body));

	if (!rules.isSuccess(status)) {
		if (parsed.ok) {
			const fields = validate(rules.errorSchema, parsed.value);
			if (fields.ok) {
				return err(
					new RequestFailedError(status, fields.value.code, fields.value.message, { exchange }),
				);
			}
		}
		return err(
			new DeserializeResponseError(
				`response status ${status} carries no recognisable error envelope`,
				{
					...(parsed.ok ? {} : { cause: parsed.error }),
					exchange,
					status,
					body: bodyExcerpt(body),
				},
			),
		);
	}

	if (!parsed.ok) {
		return err(
			new DeserializeResponseError("response body is not valid JSON", {
				cause: parsed.error,
				exchange,
				status,
				body: bodyExcerpt(body),
			}),
		);
	}

	const payload = unwrapEnvelope(rules.envelope, parsed.value);
	if (payload === undefined) {
		return err(
			new DeserializeResponseError(`response is missing its ${rules.envelope} envelope`, {
				exchange,
				status,
				body: bodyExcerpt(body),
			}),
		);
	}

	const typed = validate(schema, payload);
	if (!typed.ok) {
		return err(
			new DeserializeResponseError(
				`response does not match schema: ${formatIssues(typed.error.issues)}`,
				{ cause: typed.error, exchange, status, issues: typed.error.issues },
			),
		);
	}
	return ok(typed.value);
}
