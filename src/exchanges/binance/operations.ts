/**
 * Binance spot REST operations.
 */

import type { Decimal } from "../../lib/decimal/index.js";
import { z } from "../../lib/validation/index.js";
import { defineOperation } from "../../operation/operation.js";
import type { Operation } from "../../operation/types.js";
import { decimal, epochMs, priceLevel } from "../schemas.js";

export const BinanceSide = { Buy: "BUY", Sell: "SELL" } as const;
export type BinanceSide = (typeof BinanceSide)[keyof typeof BinanceSide];

export const BinanceOrderType = {
	Limit: "LIMIT",
	Market: "MARKET",
	StopLoss: "STOP_LOSS",
	StopLossLimit: "STOP_LOSS_LIMIT",
	TakeProfit: "TAKE_PROFIT",
	TakeProfitLimit: "TAKE_PROFIT_LIMIT",
	LimitMaker: "LIMIT_MAKER",
} as const;
export type BinanceOrderType = (typeof BinanceOrderType)[keyof typeof BinanceOrderType];

export const BinanceTimeInForce = { GTC: "GTC", IOC: "IOC", FOK: "FOK" } as const;
export type BinanceTimeInForce = (typeof BinanceTimeInForce)[keyof typeof BinanceTimeInForce];

const side = z.nativeEnum(BinanceSide);
const orderType = z.nativeEnum(BinanceOrderType);
const timeInForce = z.nativeEnum(BinanceTimeInForce);

// ── Response schemas ─────────────────────────────────────────────────

export const binanceTrade = z.object({
	id: z.number().int(),
	price: decimal,
	qty: decimal,
	quoteQty: decimal,
	time: epochMs,
	isBuyerMaker: z.boolean(),
	isBestMatch: z.boolean(),
});
export type BinanceTrade = z.infer<typeof binanceTrade>;

export const binanceDepth = z.object({
	lastUpdateId: z.number().int(),
	bids: z.array(priceLevel),
	asks: z.array(priceLevel),
});
export type BinanceDepth = z.infer<typeof binanceDepth>;

export const binanceAccount = z.object({
	makerCommission: decimal,
	takerCommission: decimal,
	buyerCommission: decimal,
	sellerCommission: decimal,
	canTrade: z.boolean(),
	canWithdraw: z.boolean(),
	canDeposit: z.boolean(),
	updateTime: epochMs,
	balances: z.array(z.object({ asset: z.string(), free: decimal, locked: decimal })),
});
export type BinanceAccount = z.infer<typeof binanceAccount>;

export const binanceOrderAck = z.object({
	symbol: z.string(),
	orderId: z.number().int(),
	orderListId: z.number().int(),
	clientOrderId: z.string().optional(),
	transactTime: epochMs,
	price: decimal.optional(),
	origQty: decimal.optional(),
	executedQty: decimal.optional(),
	cummulativeQuoteQty: decimal.optional(),
	status: z.string().optional(),
	timeInForce: timeInForce.optional(),
	type: orderType.optional(),
	side: side.optional(),
});
export type BinanceOrderAck = z.infer<typeof binanceOrderAck>;

export const binanceOpenOrder = z.object({
	symbol: z.string(),
	orderId: z.number().int(),
	orderListId: z.number().int(),
	clientOrderId: z.string(),
	price: decimal,
	origQty: decimal,
	executedQty: decimal,
	cummulativeQuoteQty: decimal,
	status: z.string(),
	timeInForce,
	type: orderType,
	side,
	stopPrice: decimal,
	icebergQty: decimal,
	time: epochMs,
	updateTime: epochMs,
	isWorking: z.boolean(),
	origQuoteOrderQty: decimal,
});
export type BinanceOpenOrder = z.infer<typeof binanceOpenOrder>;

export const binanceCancelAck = z.object({
	symbol: z.string(),
	orderId: z.number().int(),
	origClientOrderId: z.string(),
	status: z.string(),
});
export type BinanceCancelAck = z.infer<typeof binanceCancelAck>;

/** One entry of a cancel-all reply; an order list entry carries no `orderId`. */
export const binanceCancelledOrder = z.object({
	symbol: z.string(),
	orderId: z.number().int().optional(),
	orderListId: z.number().int().optional(),
	status: z.string().optional(),
});
export type BinanceCancelledOrder = z.infer<typeof binanceCancelledOrder>;

// ── Operations ───────────────────────────────────────────────────────

export interface TradesParams {
	readonly symbol: string;
	readonly limit?: number | undefined;
}

/** Recent trades. */
export function trades(params: TradesParams): Operation<BinanceTrade[]> {
	return defineOperation({
		name: "binance.trades",
		method: "GET",
		path: "/api/v3/trades",
		fields: [
			["symbol", params.symbol],
			["limit", params.limit],
		],
		response: z.array(binanceTrade),
	});
}

export interface DepthParams {
	readonly symbol: string;
	readonly limit?: number | undefined;
}

export function depth(params: DepthParams): Operation<BinanceDepth> {
	return defineOperation({
		name: "binance.depth",
		method: "GET",
		path: "/api/v3/depth",
		fields: [
			["symbol", params.symbol],
			["limit", params.limit],
		],
		response: binanceDepth,
	});
}

export function account(): Operation<BinanceAccount> {
	return defineOperation({
		name: "binance.account",
		method: "GET",
		path: "/api/v3/account",
		auth: "private",
		response: binanceAccount,
	});
}

export interface PlaceOrderParams {
	readonly symbol: string;
	readonly side: BinanceSide;
	readonly type: BinanceOrderType;
	readonly timeInForce?: BinanceTimeInForce | undefined;
	readonly quantity?: Decimal | undefined;
	readonly quoteOrderQty?: Decimal | undefined;
	readonly price?: Decimal | undefined;
	readonly newClientOrderId?: string | undefined;
	readonly stopPrice?: Decimal | undefined;
	readonly trailingDelta?: number | undefined;
	readonly icebergQty?: Decimal | undefined;
}

export function placeOrder(params: PlaceOrderParams): Operation<BinanceOrderAck> {
	return defineOperation({
		name: "binance.placeOrder",
		method: "POST",
		path: "/api/v3/order",
		auth: "private",
		fields: [
			["symbol", params.symbol],
			["side", params.side],
			["type", params.type],
			["timeInForce", params.timeInForce],
			["quantity", params.quantity?.toString()],
			["quoteOrderQty", params.quoteOrderQty?.toString()],
			["price", params.price?.toString()],
			["newClientOrderId", params.newClientOrderId],
			["stopPrice", params.stopPrice?.toString()],
			["trailingDelta", params.trailingDelta],
			["icebergQty", params.icebergQty?.toString()],
		],
		response: binanceOrderAck,
	});
}

export interface OpenOrdersParams {
	readonly symbol?: string | undefined;
}

export function openOrders(params: OpenOrdersParams = {}): Operation<BinanceOpenOrder[]> {
	return defineOperation({
		name: "binance.openOrders",
		method: "GET",
		path: "/api/v3/openOrders",
		auth: "private",
		fields: [["symbol", params.symbol]],
		response: z.array(binanceOpenOrder),
	});
}

export interface CancelOrderParams {
	readonly symbol: string;
	readonly orderId?: number | undefined;
	readonly origClientOrderId?: string | undefined;
}

export function cancelOrder(params: CancelOrderParams): Operation<BinanceCancelAck> {
	return defineOperation({
		name: "binance.cancelOrder",
		method: "DELETE",
		path: "/api/v3/order",
		auth: "private",
		fields: [
			["symbol", params.symbol],
			["orderId", params.orderId],
			["origClientOrderId", params.origClientOrderId],
		],
		response: binanceCancelAck,
	});
}

export interface CancelOpenOrdersParams {
	readonly symbol: string;
}

/** Cancels every open order on one symbol, order lists included. */
export function cancelOpenOrders(
	params: CancelOpenOrdersParams,
): Operation<BinanceCancelledOrder[]> {
	return defineOperation({
		name: "binance.cancelOpenOrders",
		method: "DELETE",
		path: "/api/v3/openOrders",
		auth: "private",
		fields: [["symbol", params.symbol]],
		response: z.array(binanceCancelledOrder),
	});
}
