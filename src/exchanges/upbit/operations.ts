/**
 * Upbit v1 REST operations. List fields go out as `name[]=a&name[]=b`.
 */

import type { Decimal } from "../../lib/decimal/index.js";
import { z } from "../../lib/validation/index.js";
import { defineOperation } from "../../operation/operation.js";
import type { Operation } from "../../operation/types.js";
import { decimal, epochMs } from "../schemas.js";

export const UpbitSide = { Bid: "bid", Ask: "ask" } as const;
export type UpbitSide = (typeof UpbitSide)[keyof typeof UpbitSide];

/** `price` is a market buy sized in quote currency, `market` a market sell sized in base. */
export const UpbitOrderType = { Limit: "limit", MarketBuy: "price", MarketSell: "market" } as const;
export type UpbitOrderType = (typeof UpbitOrderType)[keyof typeof UpbitOrderType];

export const OrderState = { Wait: "wait", Watch: "watch", Done: "done", Cancel: "cancel" } as const;
export type OrderState = (typeof OrderState)[keyof typeof OrderState];

export const SortOrder = { Asc: "asc", Desc: "desc" } as const;
export type SortOrder = (typeof SortOrder)[keyof typeof SortOrder];

const side = z.nativeEnum(UpbitSide);
const ordType = z.nativeEnum(UpbitOrderType);
const state = z.nativeEnum(OrderState);

// ── Response schemas ─────────────────────────────────────────────────

export const upbitOrderbook = z.object({
	market: z.string(),
	timestamp: epochMs,
	total_ask_size: decimal,
	total_bid_size: decimal,
	orderbook_units: z.array(
		z.object({
			ask_price: decimal,
			ask_size: decimal,
			bid_price: decimal,
			bid_size: decimal,
		}),
	),
});
export type UpbitOrderbook = z.infer<typeof upbitOrderbook>;

export const upbitAccount = z.object({
	currency: z.string(),
	balance: decimal,
	locked: decimal,
	avg_buy_price: decimal,
	avg_buy_price_modified: z.boolean(),
	unit_currency: z.string(),
});
export type UpbitAccount = z.infer<typeof upbitAccount>;

export const upbitOrder = z.object({
	uuid: z.string().uuid(),
	side,
	ord_type: ordType,
	price: decimal.nullish(),
	state,
	market: z.string(),
	created_at: z.string(),
	volume: decimal.nullish(),
	remaining_volume: decimal.nullish(),
	reserved_fee: decimal,
	remaining_fee: decimal,
	paid_fee: decimal,
	locked: decimal,
	executed_volume: decimal,
	trades_count: z.number().int(),
});
export type UpbitOrder = z.infer<typeof upbitOrder>;

// ── Operations ───────────────────────────────────────────────────────

export interface OrderbookParams {
	/** Market codes such as `KRW-BTC` */
	readonly markets: readonly string[];
}

export function orderbook(params: OrderbookParams): Operation<UpbitOrderbook[]> {
	return defineOperation({
		name: "upbit.orderbook",
		method: "GET",
		path: "/v1/orderbook",
		// Sent as one comma-joined value, not as a bracket list.
		fields: [["markets", params.markets.join(",")]],
		response: z.array(upbitOrderbook),
	});
}

export function accounts(): Operation<UpbitAccount[]> {
	return defineOperation({
		name: "upbit.accounts",
		method: "GET",
		path: "/v1/accounts",
		auth: "private",
		response: z.array(upbitAccount),
	});
}

export interface PlaceOrderParams {
	readonly market: string;
	readonly side: UpbitSide;
	readonly volume?: Decimal | undefined;
	readonly price?: Decimal | undefined;
	readonly ordType: UpbitOrderType;
	readonly identifier?: string | undefined;
}

export function placeOrder(params: PlaceOrderParams): Operation<UpbitOrder> {
	return defineOperation({
		name: "upbit.placeOrder",
		method: "POST",
		path: "/v1/orders",
		auth: "private",
		fields: [
			["market", params.market],
			["side", params.side],
			["volume", params.volume?.toString()],
			["price", params.price?.toString()],
			["ord_type", params.ordType],
			["identifier", params.identifier],
		],
		response: upbitOrder,
	});
}

export interface OrdersParams {
	readonly market: string;
	readonly uuids?: readonly string[] | undefined;
	readonly identifiers?: readonly string[] | undefined;
	readonly state?: OrderState | undefined;
	readonly states?: readonly OrderState[] | undefined;
	readonly page?: number | undefined;
	readonly limit?: number | undefined;
	readonly orderBy?: SortOrder | undefined;
}

export function orders(params: OrdersParams): Operation<UpbitOrder[]> {
	return defineOperation({
		name: "upbit.orders",
		method: "GET",
		path: "/v1/orders",
		auth: "private",
		fields: [
			["market", params.market],
			["uuids", params.uuids ?? []],
			["identifiers", params.identifiers ?? []],
			["state", params.state],
			["states", params.states],
			["page", params.page],
			["limit", params.limit],
			["order_by", params.orderBy ?? SortOrder.Desc],
		],
		response: z.array(upbitOrder),
	});
}

export interface CancelOrderParams {
	readonly uuid?: string | undefined;
	readonly identifier?: string | undefined;
}

export function cancelOrder(params: CancelOrderParams): Operation<UpbitOrder> {
	return defineOperation({
		name: "upbit.cancelOrder",
		method: "DELETE",
		path: "/v1/order",
		auth: "private",
		fields: [
			["uuid", params.uuid],
			["identifier", params.identifier],
		],
		response: upbitOrder,
	});
}
