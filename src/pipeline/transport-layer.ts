import { decodeResponse } from "../decoding/decoder.js";
import type { BaseUrls, ExchangeProfile } from "../exchanges/profile.js";
import type { Logger } from "../lib/logger/index.js";
import { ConstructRequestError, classifyTransportFailure } from "../shared/errors.js";
import { err } from "../shared/result.js";
import { encodeWireRequest } from "../transport/encoder.js";
import type { HttpTransport, WireResponse } from "../transport/types.js";
import type { SignedCall, Stage } from "./types.js";

function withoutQuery(url: string): string {
	const q = url.indexOf("?");
	return q === -1 ? url : url.slice(0, q);
}

/**
 * Innermost stage: puts the signed payload on the wire, sends it and
 * decodes whatever came back. Headers are never logged.
 */
export function transportLayer(
	profile: ExchangeProfile,
	baseUrls: BaseUrls,
	transport: HttpTransport,
	logger: Logger,
): Stage<SignedCall> {
	return {
		name: "transport",
		async handle(call, schema) {
			const { request } = call;
			const baseUrl = call.host === undefined ? baseUrls.main : baseUrls.hosts[call.host];
			if (baseUrl === undefined) {
				return err(
					new ConstructRequestError(`${profile.id} has no ${call.host} host`, {
						exchange: profile.id,
						operation: request.operation,
						host: call.host,
					}),
				);
			}
			const wire = encodeWireRequest(baseUrl, request, call.payload);
			if (!wire.ok) return wire;

			const log = logger.child({ exchange: profile.id, operation: request.operation });
			log.debug({ method: wire.value.method, url: withoutQuery(wire.value.url) }, "sending request");

			let response: WireResponse;
			try {
				response = await transport.send(wire.value, { signal: call.signal });
			} catch (e) {
				const error = classifyTransportFailure(e);
				log.debug({ err: error }, "transport failed");
				return err(error);
			}

			log.debug({ status: response.status }, "response received");
			return decodeResponse(profile.id, profile.response, response, schema);
		},
	};
}
