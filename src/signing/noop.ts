import { unsignedPayload } from "./payload.js";
import type { SigningStrategy } from "./types.js";

/**
 * For exchanges without a wired signer: the request goes out exactly as an
 * unsigned one would, whatever its auth tag says.
 */
export const noopSigner: SigningStrategy = {
	kind: "none",

	async sign(request, _keys, ctx) {
		ctx.logger.debug(
			{ exchange: request.exchange, operation: request.operation },
			"private operation sent unsigned: exchange has no signer",
		);
		return unsignedPayload(request);
	},
};
