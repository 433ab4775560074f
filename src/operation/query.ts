/**
 * Field-set encoding: urlencoded query strings, JSON bodies, and the
 * bracket-key revert one exchange needs for list parameters.
 */

import { SerializeBodyError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Field, FieldValue, ListValue } from "./types.js";

/** How list fields are spelled on the wire. */
export type ListStyle = "brackets" | "comma";

export type Pair = readonly [name: string, value: string];

function isList(value: FieldValue): value is ListValue {
	return Array.isArray(value);
}

function scalar(name: string, value: string | number | boolean): Result<string, SerializeBodyError> {
	if (typeof value === "number" && !Number.isFinite(value)) {
		return err(new SerializeBodyError(`field ${name} is not a finite number`, { field: name }));
	}
	return ok(String(value));
}

/**
 * Expands fields into name/value pairs in declared order. Absent fields are
 * skipped; list fields become `name[]` pairs or one comma-joined pair.
 */
export function flattenFields(
	fields: readonly Field[],
	style: ListStyle,
): Result<Pair[], SerializeBodyError> {
	const pairs: Pair[] = [];
	for (const [name, value] of fields) {
		if (name.length === 0) {
			return err(new SerializeBodyError("field name must not be empty"));
		}
		if (value === undefined) continue;
		if (isList(value)) {
			const items: string[] = [];
			for (const item of value) {
				const encoded = scalar(name, item);
				if (!encoded.ok) return encoded;
				items.push(encoded.value);
			}
			if (items.length === 0) continue;
			if (style === "brackets") {
				for (const item of items) pairs.push([`${name}[]`, item]);
			} else {
				pairs.push([name, items.join(",")]);
			}
			continue;
		}
		const encoded = scalar(name, value);
		if (!encoded.ok) return encoded;
		pairs.push([name, encoded.value]);
	}
	return ok(pairs);
}

/** `application/x-www-form-urlencoded` serialization of pairs (space as `+`). */
export function encodePairs(pairs: readonly Pair[]): string {
	const params = new URLSearchParams();
	for (const [name, value] of pairs) params.append(name, value);
	return params.toString();
}

export function encodeQuery(
	fields: readonly Field[],
	style: ListStyle,
): Result<string, SerializeBodyError> {
	const pairs = flattenFields(fields, style);
	return pairs.ok ? ok(encodePairs(pairs.value)) : pairs;
}

/**
 * Turns `%5B`/`%5D` back into `[`/`]` in parameter names only. Values keep
 * their encoding. Applying it twice gives the same string.
 */
export function revertBracketKeys(query: string): string {
	if (query.length === 0) return query;
	return query
		.split("&")
		.map((pair) => {
			const eq = pair.indexOf("=");
			const key = eq === -1 ? pair : pair.slice(0, eq);
			const rest = eq === -1 ? "" : pair.slice(eq);
			return key.replace(/%5B/gi, "[").replace(/%5D/gi, "]") + rest;
		})
		.join("&");
}

/** Parses a query string back into ordered name/value pairs. */
export function decodeQuery(query: string): Pair[] {
	return [...new URLSearchParams(query)];
}

/**
 * JSON object of the fields. Lists stay arrays under their plain name;
 * absent fields are left out.
 */
export function encodeJsonBody(fields: readonly Field[]): Result<string, SerializeBodyError> {
	const body: Record<string, Exclude<FieldValue, undefined>> = {};
	for (const [name, value] of fields) {
		if (value === undefined) continue;
		const values = isList(value) ? value : [value];
		for (const v of values) {
			if (typeof v === "number" && !Number.isFinite(v)) {
				return err(new SerializeBodyError(`field ${name} is not a finite number`, { field: name }));
			}
		}
		body[name] = value;
	}
	return ok(JSON.stringify(body));
}
