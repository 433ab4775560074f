/**
 * Bithumb REST operations. Success bodies are `{"status":"0000","data":...}`.
 *
 * The private operations are declared with their real endpoints, but the
 * exchange has no signer here: they go out exactly as a public call would.
 */

import type { Decimal } from "../../lib/decimal/index.js";
import { z } from "../../lib/validation/index.js";
import { defineOperation } from "../../operation/operation.js";
import type { Operation } from "../../operation/types.js";
import { decimal, epochMs, objectLevel } from "../schemas.js";

export const BithumbOrderType = { Bid: "bid", Ask: "ask" } as const;
export type BithumbOrderType = (typeof BithumbOrderType)[keyof typeof BithumbOrderType];

/** Path segment of `/trade/{placeOrMarket}`. */
export const TradeKind = { Place: "place", MarketBuy: "market_buy", MarketSell: "market_sell" } as const;
export type TradeKind = (typeof TradeKind)[keyof typeof TradeKind];

const orderType = z.nativeEnum(BithumbOrderType);

// ── Response schemas ─────────────────────────────────────────────────

export const bithumbOrderbook = z.object({
	order_currency: z.string(),
	payment_currency: z.string(),
	bids: z.array(objectLevel),
	asks: z.array(objectLevel),
	timestamp: epochMs,
});
export type BithumbOrderbook = z.infer<typeof bithumbOrderbook>;

const orderbookAllItem = z.object({
	order_currency: z.string(),
	bids: z.array(objectLevel),
	asks: z.array(objectLevel),
});
export type BithumbOrderbookAllItem = z.infer<typeof orderbookAllItem>;

/**
 * `{ timestamp, payment_currency, BTC: {...}, ETH: {...} }`: every key
 * besides the two scalars is a book for that order currency.
 */
export const bithumbOrderbookAll = z
	.object({ timestamp: epochMs, payment_currency: z.string() })
	.catchall(z.unknown())
	.transform((value, ctx) => {
		const { timestamp, payment_currency, ...rest } = value;
		const orderbooks: Record<string, BithumbOrderbookAllItem> = {};
		for (const [currency, raw] of Object.entries(rest)) {
			const parsed = orderbookAllItem.safeParse(raw);
			if (!parsed.success) {
				for (const issue of parsed.error.issues) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: [currency, ...issue.path],
						message: issue.message,
					});
				}
				return z.NEVER;
			}
			orderbooks[currency] = parsed.data;
		}
		return { timestamp, payment_currency, orderbooks };
	});
export type BithumbOrderbookAll = z.infer<typeof bithumbOrderbookAll>;

export const bithumbOrder = z.object({
	order_currency: z.string(),
	payment_currency: z.string(),
	order_id: z.string(),
	order_date: epochMs,
	type: orderType,
	watch_price: decimal,
	units: decimal,
	units_remaining: decimal,
	price: decimal,
});
export type BithumbOrder = z.infer<typeof bithumbOrder>;

// ── Public operations ────────────────────────────────────────────────

export interface OrderbookParams {
	readonly count?: number | undefined;
}

/** Path parameters: `orderCurrency`, `paymentCurrency`. */
export function orderbook(params: OrderbookParams = {}): Operation<BithumbOrderbook> {
	return defineOperation({
		name: "bithumb.orderbook",
		method: "GET",
		path: "/public/orderbook/{orderCurrency}_{paymentCurrency}",
		fields: [["count", params.count]],
		response: bithumbOrderbook,
	});
}

/** Path parameter: `paymentCurrency`. */
export function orderbookAll(params: OrderbookParams = {}): Operation<BithumbOrderbookAll> {
	return defineOperation({
		name: "bithumb.orderbookAll",
		method: "GET",
		path: "/public/orderbook/ALL_{paymentCurrency}",
		fields: [["count", params.count]],
		response: bithumbOrderbookAll,
	});
}

// ── Private operations (sent unsigned) ───────────────────────────────

export interface OrdersParams {
	readonly orderId?: string | undefined;
	readonly type?: BithumbOrderType | undefined;
	readonly count: number;
	readonly orderCurrency: string;
	readonly paymentCurrency: string;
}

export function orders(params: OrdersParams): Operation<BithumbOrder[]> {
	return defineOperation({
		name: "bithumb.orders",
		method: "POST",
		path: "/info/orders",
		auth: "private",
		fields: [
			["order_id", params.orderId],
			["type", params.type],
			["count", params.count],
			["order_currency", params.orderCurrency],
			["payment_currency", params.paymentCurrency],
		],
		response: z.array(bithumbOrder),
	});
}

export interface PlaceOrderParams {
	readonly orderCurrency: string;
	readonly paymentCurrency: string;
	readonly units: Decimal;
	readonly price?: Decimal | undefined;
	readonly type?: BithumbOrderType | undefined;
}

/** Path parameter: `placeOrMarket` (see TradeKind). */
export function placeOrder(params: PlaceOrderParams): Operation<{ order_id: string }> {
	return defineOperation({
		name: "bithumb.placeOrder",
		method: "POST",
		path: "/trade/{placeOrMarket}",
		auth: "private",
		fields: [
			["order_currency", params.orderCurrency],
			["payment_currency", params.paymentCurrency],
			["units", params.units.toString()],
			["price", params.price?.toString()],
			["type", params.type],
		],
		response: z.object({ order_id: z.string() }),
	});
}

export interface CancelOrderParams {
	readonly type: BithumbOrderType;
	readonly orderId: string;
	readonly orderCurrency: string;
	readonly paymentCurrency: string;
}

export function cancelOrder(params: CancelOrderParams): Operation<unknown> {
	return defineOperation({
		name: "bithumb.cancelOrder",
		method: "POST",
		path: "/trade/cancel",
		auth: "private",
		fields: [
			["type", params.type],
			["order_id", params.orderId],
			["order_currency", params.orderCurrency],
			["payment_currency", params.paymentCurrency],
		],
		response: z.unknown(),
	});
}
