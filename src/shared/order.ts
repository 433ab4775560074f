/**
 * Exchange-neutral order intent, mapped onto each exchange's own order
 * parameters by its capability bindings.
 */

import type { Decimal } from "../lib/decimal/index.js";

export const Side = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type Side = (typeof Side)[keyof typeof Side];

export const TimeInForce = {
	GoodTilCanceled: "GTC",
	ImmediateOrCancel: "IOC",
	FillOrKill: "FOK",
	GoodTilCrossing: "GTX",
} as const;

export type TimeInForce = (typeof TimeInForce)[keyof typeof TimeInForce];

export type Order =
	| {
			readonly type: "market";
			readonly side: Side;
			/** Base quantity; on exchanges that size market buys in quote, the quote amount */
			readonly quantity: Decimal;
	  }
	| {
			readonly type: "limit";
			readonly side: Side;
			readonly quantity: Decimal;
			readonly price: Decimal;
			readonly timeInForce: TimeInForce;
	  };
