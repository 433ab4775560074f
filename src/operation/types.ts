/**
 * Operation: an immutable description of one REST call.
 */

import type { Schema } from "../lib/validation/index.js";
import type { ApiHost } from "../shared/exchange-id.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

/** Whether an operation must be signed. */
export type AuthTag = "disabled" | "private";

/** A list field: encoded as `name[]=a&name[]=b` or `name=a,b` depending on the exchange. */
export type ListValue = readonly (string | number)[];

/** `undefined` marks an absent optional field; it is never encoded. */
export type FieldValue = string | number | boolean | ListValue | undefined;

/** One named field. Order in the list is the order on the wire. */
export type Field = readonly [name: string, value: FieldValue];

/** Path template parameters, e.g. `{ market: "KRW-BTC" }` for `/v1/orderbook/{market}`. */
export type PathParams = Readonly<Record<string, string | number>>;

export interface Operation<T> {
	/** Short identifier used in log lines, e.g. `binance.depth` */
	readonly name: string;
	readonly method: HttpMethod;
	/** Path template relative to the exchange base URL; may contain `{placeholders}` */
	readonly path: string;
	readonly fields: readonly Field[];
	readonly auth: AuthTag;
	/** Secondary host serving this operation; absent for the exchange's main host */
	readonly host?: ApiHost | undefined;
	/** Schema for the unwrapped success payload */
	readonly response: Schema<T>;
}

/** Input shape for defineOperation; `fields`, `auth` and `host` are optional. */
export interface OperationInit<T> {
	readonly name: string;
	readonly method: HttpMethod;
	readonly path: string;
	readonly fields?: readonly Field[] | undefined;
	readonly auth?: AuthTag | undefined;
	readonly host?: ApiHost | undefined;
	readonly response: Schema<T>;
}
