import { ConstructRequestError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Field, Operation, OperationInit, PathParams } from "./types.js";

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

/**
 * Builds a frozen Operation. Fields are copied, so later changes to the
 * caller's array do not reach the wire.
 */
export function defineOperation<T>(init: OperationInit<T>): Operation<T> {
	const fields: readonly Field[] = Object.freeze(
		(init.fields ?? []).map((f): Field => Object.freeze([f[0], f[1]] as const)),
	);
	return Object.freeze({
		name: init.name,
		method: init.method,
		path: init.path,
		fields,
		auth: init.auth ?? "disabled",
		...(init.host === undefined ? {} : { host: init.host }),
		response: init.response,
	});
}

/**
 * Substitutes `{name}` placeholders with percent-encoded path parameters.
 * Fails when the template is not absolute, a placeholder has no value, or
 * a brace is left unmatched.
 */
export function renderPath(
	template: string,
	params: PathParams = {},
): Result<string, ConstructRequestError> {
	if (!template.startsWith("/")) {
		return err(new ConstructRequestError("path template must start with /", { template }));
	}

	const missing: string[] = [];
	const rendered = template.replace(PLACEHOLDER, (_match, name: string) => {
		const value = params[name];
		if (value === undefined) {
			missing.push(name);
			return "";
		}
		return encodeURIComponent(String(value));
	});

	if (missing.length > 0) {
		return err(
			new ConstructRequestError(`missing path parameter: ${missing.join(", ")}`, {
				template,
				missing,
			}),
		);
	}
	if (rendered.includes("{") || rendered.includes("}")) {
		return err(new ConstructRequestError("malformed path template", { template }));
	}
	return ok(rendered);
}

/** True when the path (rendered or not) already carries a query component. */
export function hasQuery(path: string): boolean {
	return path.includes("?");
}
