import { unwrapCredentials } from "../auth/credentials.js";
import type { Credentials } from "../auth/types.js";
import type { ExchangeProfile } from "../exchanges/profile.js";
import { signerFor } from "../signing/index.js";
import { unsignedPayload } from "../signing/payload.js";
import type { SigningContext } from "../signing/types.js";
import { AuthError } from "../shared/errors.js";
import { err } from "../shared/result.js";
import type { Layer, PreparedCall, SignedCall } from "./types.js";

/**
 * Signing stage. Disabled operations pass through unsigned; private ones
 * are signed with the exchange's strategy, or rejected when the client
 * holds no credentials.
 */
export function authLayer(
	profile: ExchangeProfile,
	credentials: Credentials | undefined,
	ctx: SigningContext,
): Layer<PreparedCall, SignedCall> {
	const signer = signerFor(profile.signer);

	return {
		name: "auth",
		wrap(next) {
			return async (call, schema) => {
				const { request } = call;

				if (request.auth === "disabled") {
					const payload = unsignedPayload(request);
					if (!payload.ok) return payload;
					return next({ ...call, payload: payload.value }, schema);
				}

				if (credentials === undefined) {
					return err(
						new AuthError(`${request.operation} is private and the client has no credentials`, {
							exchange: request.exchange,
							operation: request.operation,
						}),
					);
				}

				const signed = await signer.sign(request, unwrapCredentials(credentials), ctx);
				if (!signed.ok) return signed;
				ctx.logger.debug(
					{ exchange: request.exchange, operation: request.operation, signer: signer.kind },
					"request signed",
				);
				return next({ ...call, payload: signed.value }, schema);
			};
		},
	};
}
