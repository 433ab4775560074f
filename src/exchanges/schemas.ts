/**
 * Zod building blocks shared by the exchange response schemas.
 */

import type { OrderbookLevel } from "../client/common-types.js";
import { Decimal } from "../lib/decimal/index.js";
import { z } from "../lib/validation/index.js";
import type { Schema } from "../lib/validation/index.js";

/** Decimal from a JSON string or number. */
export const decimal: Schema<Decimal> = z
	.union([z.string(), z.number()])
	.transform((value, ctx) => {
		const parsed = Decimal.tryFrom(value);
		if (parsed === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid decimal: ${value}` });
			return z.NEVER;
		}
		return parsed;
	});

/** Like `decimal`, but `""` (an unset OKX field) reads as zero. */
export const decimalOrZero: Schema<Decimal> = z
	.union([z.literal(""), decimal])
	.transform((value) => (value === "" ? Decimal.zero() : value));

/** `null` when the exchange has nothing to report (empty book, no trades). */
export const nullableDecimal: Schema<Decimal | undefined> = decimal
	.nullable()
	.transform((value) => value ?? undefined);

/** Epoch milliseconds sent as a number or a numeric string. */
export const epochMs: Schema<number> = z
	.union([z.number().int(), z.string().regex(/^\d+$/)])
	.transform((value) => Number(value));

/** Non-negative integer sent as a string. */
export const intString: Schema<number> = z
	.string()
	.regex(/^\d+$/)
	.transform((value) => Number(value));

/** Book level sent as `[price, quantity]`. */
export const priceLevel: Schema<OrderbookLevel> = z
	.tuple([decimal, decimal])
	.transform(([price, quantity]) => ({ price, quantity }));

/** Book level `{ price, quantity }` as Bithumb sends it. */
export const objectLevel: Schema<OrderbookLevel> = z.object({ price: decimal, quantity: decimal });

/** Single-element array, unwrapped. */
export function single<T>(item: Schema<T>): Schema<T> {
	return z.tuple([item]).transform(([only]) => only);
}
