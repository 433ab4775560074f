/**
 * Error bodies, one schema per exchange, each normalised to code/message.
 */

import { z } from "../lib/validation/index.js";
import type { Schema } from "../lib/validation/index.js";
import type { ExchangeErrorFields } from "./types.js";

/** `{"code": -1121, "msg": "Invalid symbol."}` */
export const binanceError: Schema<ExchangeErrorFields> = z
	.object({ code: z.number().int(), msg: z.string() })
	.transform((e) => ({ code: String(e.code), message: e.msg }));

/** `{"code": "51000", "msg": "Parameter instId error"}` */
export const okxError: Schema<ExchangeErrorFields> = z
	.object({ code: z.string(), msg: z.string() })
	.transform((e) => ({ code: e.code, message: e.msg }));

/** `{"error": {"name": "invalid_query_payload", "message": "..."}}` */
export const upbitError: Schema<ExchangeErrorFields> = z
	.object({ error: z.object({ name: z.string(), message: z.string() }) })
	.transform((e) => ({ code: e.error.name, message: e.error.message }));

/** `{"status": "5600", "message": "..."}` */
export const bithumbError: Schema<ExchangeErrorFields> = z
	.object({ status: z.string(), message: z.string() })
	.transform((e) => ({ code: e.status, message: e.message }));

/** `{"code": 40101, "message": "..."}`; some endpoints send the code as a string. */
export const cryptocomError: Schema<ExchangeErrorFields> = z
	.object({ code: z.union([z.number(), z.string()]), message: z.string() })
	.transform((e) => ({ code: String(e.code), message: e.message }));

export function isStatusOk(status: number): boolean {
	return status === 200;
}

export function isStatus2xx(status: number): boolean {
	return status >= 200 && status < 300;
}
