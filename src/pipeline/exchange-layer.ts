import type { ExchangeProfile } from "../exchanges/profile.js";
import type { Logger } from "../lib/logger/index.js";
import { renderPath } from "../operation/operation.js";
import type { PreparedRequest } from "../signing/types.js";
import type { ExchangeCall, Layer, PreparedCall } from "./types.js";

/**
 * Outermost stage: renders the path template and tags the request with
 * the exchange's identity and encoding rules.
 */
export function exchangeLayer(
	profile: ExchangeProfile,
	logger: Logger,
): Layer<ExchangeCall, PreparedCall> {
	return {
		name: "exchange",
		wrap(next) {
			return async (call, schema) => {
				const { operation } = call;
				const path = renderPath(operation.path, call.pathParams);
				if (!path.ok) return path;

				const request: PreparedRequest = {
					exchange: profile.id,
					operation: operation.name,
					method: operation.method,
					path: path.value,
					fields: operation.fields,
					auth: operation.auth,
					rules: profile.encoding,
				};
				logger.debug(
					{ exchange: profile.id, operation: operation.name, auth: operation.auth },
					"request prepared",
				);
				return next({ request, host: operation.host, signal: call.signal }, schema);
			};
		},
	};
}
