/**
 * Binance USD-M futures REST operations. They are served from their own
 * host (`binance.futures`), signed the same way as spot.
 */

import type { Decimal } from "../../lib/decimal/index.js";
import { z } from "../../lib/validation/index.js";
import { defineOperation } from "../../operation/operation.js";
import type { Field, Operation } from "../../operation/types.js";
import { ApiHost } from "../../shared/exchange-id.js";
import { decimal, epochMs, priceLevel } from "../schemas.js";
import { BinanceSide } from "./operations.js";

const host = ApiHost.BinanceFutures;

export const FuturesPositionSide = { Both: "BOTH", Long: "LONG", Short: "SHORT" } as const;
export type FuturesPositionSide = (typeof FuturesPositionSide)[keyof typeof FuturesPositionSide];

export const FuturesOrderType = {
	Limit: "LIMIT",
	Market: "MARKET",
	Stop: "STOP",
	StopMarket: "STOP_MARKET",
	TakeProfit: "TAKE_PROFIT",
	TakeProfitMarket: "TAKE_PROFIT_MARKET",
	TrailingStopMarket: "TRAILING_STOP_MARKET",
} as const;
export type FuturesOrderType = (typeof FuturesOrderType)[keyof typeof FuturesOrderType];

/** Futures also take GTX (post-only). */
export const FuturesTimeInForce = { GTC: "GTC", IOC: "IOC", FOK: "FOK", GTX: "GTX" } as const;
export type FuturesTimeInForce = (typeof FuturesTimeInForce)[keyof typeof FuturesTimeInForce];

export const FuturesWorkingType = { MarkPrice: "MARK_PRICE", ContractPrice: "CONTRACT_PRICE" } as const;
export type FuturesWorkingType = (typeof FuturesWorkingType)[keyof typeof FuturesWorkingType];

const side = z.nativeEnum(BinanceSide);
const positionSide = z.nativeEnum(FuturesPositionSide);
const orderType = z.nativeEnum(FuturesOrderType);

// ── Response schemas ─────────────────────────────────────────────────

export const futuresTrade = z.object({
	id: z.number().int(),
	price: decimal,
	qty: decimal,
	quoteQty: decimal,
	time: epochMs,
	isBuyerMaker: z.boolean(),
});
export type FuturesTrade = z.infer<typeof futuresTrade>;

export const futuresDepth = z.object({
	lastUpdateId: z.number().int(),
	/** Message output time */
	E: epochMs,
	/** Transaction time */
	T: epochMs,
	bids: z.array(priceLevel),
	asks: z.array(priceLevel),
});
export type FuturesDepth = z.infer<typeof futuresDepth>;

export const futuresBalance = z.object({
	accountAlias: z.string(),
	asset: z.string(),
	balance: decimal,
	crossWalletBalance: decimal,
	crossUnPnl: decimal,
	availableBalance: decimal,
	maxWithdrawAmount: decimal,
	marginAvailable: z.boolean(),
	updateTime: epochMs,
});
export type FuturesBalance = z.infer<typeof futuresBalance>;

export const futuresPosition = z.object({
	symbol: z.string(),
	positionAmt: decimal,
	entryPrice: decimal,
	markPrice: decimal,
	unRealizedProfit: decimal,
	liquidationPrice: decimal,
	leverage: decimal,
	marginType: z.string(),
	isolatedMargin: decimal,
	positionSide,
	notional: decimal,
	isolatedWallet: decimal,
	updateTime: epochMs,
});
export type FuturesPosition = z.infer<typeof futuresPosition>;

/** Order as returned by place, query and cancel; each omits a few of the amounts. */
export const futuresOrder = z.object({
	orderId: z.number().int(),
	symbol: z.string(),
	clientOrderId: z.string(),
	status: z.string(),
	price: decimal,
	avgPrice: decimal.optional(),
	origQty: decimal,
	executedQty: decimal,
	cumQty: decimal.optional(),
	cumQuote: decimal.optional(),
	reduceOnly: z.boolean(),
	closePosition: z.boolean(),
	side,
	positionSide,
	stopPrice: decimal,
	timeInForce: z.string(),
	type: orderType,
	origType: orderType,
	workingType: z.string(),
	priceProtect: z.boolean(),
	time: epochMs.optional(),
	updateTime: epochMs,
});
export type FuturesOrder = z.infer<typeof futuresOrder>;

/** `{"code": "200", "msg": "The operation of cancel all open order is done."}` */
export const futuresCancelAllAck = z.object({
	code: z.union([z.number(), z.string()]),
	msg: z.string(),
});
export type FuturesCancelAllAck = z.infer<typeof futuresCancelAllAck>;

// ── Operations ───────────────────────────────────────────────────────

export interface SymbolParams {
	readonly symbol: string;
	readonly limit?: number | undefined;
}

export function trades(params: SymbolParams): Operation<FuturesTrade[]> {
	return defineOperation({
		name: "binance.futures.trades",
		method: "GET",
		path: "/fapi/v1/trades",
		host,
		fields: [
			["symbol", params.symbol],
			["limit", params.limit],
		],
		response: z.array(futuresTrade),
	});
}

export function depth(params: SymbolParams): Operation<FuturesDepth> {
	return defineOperation({
		name: "binance.futures.depth",
		method: "GET",
		path: "/fapi/v1/depth",
		host,
		fields: [
			["symbol", params.symbol],
			["limit", params.limit],
		],
		response: futuresDepth,
	});
}

export function balance(): Operation<FuturesBalance[]> {
	return defineOperation({
		name: "binance.futures.balance",
		method: "GET",
		path: "/fapi/v2/balance",
		host,
		auth: "private",
		response: z.array(futuresBalance),
	});
}

export interface PositionRiskParams {
	readonly symbol?: string | undefined;
}

/** Positions, one per symbol in one-way mode and two in hedge mode. */
export function positionRisk(params: PositionRiskParams = {}): Operation<FuturesPosition[]> {
	return defineOperation({
		name: "binance.futures.positionRisk",
		method: "GET",
		path: "/fapi/v2/positionRisk",
		host,
		auth: "private",
		fields: [["symbol", params.symbol]],
		response: z.array(futuresPosition),
	});
}

export interface FuturesOrderParams {
	readonly symbol: string;
	readonly side: BinanceSide;
	readonly positionSide?: FuturesPositionSide | undefined;
	readonly type: FuturesOrderType;
	readonly timeInForce?: FuturesTimeInForce | undefined;
	readonly quantity?: Decimal | undefined;
	readonly reduceOnly?: boolean | undefined;
	readonly price?: Decimal | undefined;
	readonly newClientOrderId?: string | undefined;
	readonly stopPrice?: Decimal | undefined;
	readonly closePosition?: boolean | undefined;
	readonly activationPrice?: Decimal | undefined;
	readonly callbackRate?: Decimal | undefined;
	readonly workingType?: FuturesWorkingType | undefined;
	readonly priceProtect?: boolean | undefined;
	readonly newOrderRespType?: "ACK" | "RESULT" | undefined;
}

/** `priceProtect` is the one flag sent as `TRUE` / `FALSE`. */
function upperBool(value: boolean | undefined): string | undefined {
	if (value === undefined) return undefined;
	return value ? "TRUE" : "FALSE";
}

export function placeOrder(params: FuturesOrderParams): Operation<FuturesOrder> {
	return defineOperation({
		name: "binance.futures.placeOrder",
		method: "POST",
		path: "/fapi/v1/order",
		host,
		auth: "private",
		fields: [
			["symbol", params.symbol],
			["side", params.side],
			["positionSide", params.positionSide],
			["type", params.type],
			["timeInForce", params.timeInForce],
			["quantity", params.quantity?.toString()],
			["reduceOnly", params.reduceOnly],
			["price", params.price?.toString()],
			["newClientOrderId", params.newClientOrderId],
			["stopPrice", params.stopPrice?.toString()],
			["closePosition", params.closePosition],
			["activationPrice", params.activationPrice?.toString()],
			["callbackRate", params.callbackRate?.toString()],
			["workingType", params.workingType],
			["priceProtect", upperBool(params.priceProtect)],
			["newOrderRespType", params.newOrderRespType],
		],
		response: futuresOrder,
	});
}

export interface OrderRef {
	readonly symbol: string;
	readonly orderId?: number | undefined;
	readonly origClientOrderId?: string | undefined;
}

function orderRefFields(ref: OrderRef): readonly Field[] {
	return [
		["symbol", ref.symbol],
		["orderId", ref.orderId],
		["origClientOrderId", ref.origClientOrderId],
	];
}

export function openOrder(ref: OrderRef): Operation<FuturesOrder> {
	return defineOperation({
		name: "binance.futures.openOrder",
		method: "GET",
		path: "/fapi/v1/openOrder",
		host,
		auth: "private",
		fields: orderRefFields(ref),
		response: futuresOrder,
	});
}

export interface OpenOrdersParams {
	readonly symbol?: string | undefined;
}

export function openOrders(params: OpenOrdersParams = {}): Operation<FuturesOrder[]> {
	return defineOperation({
		name: "binance.futures.openOrders",
		method: "GET",
		path: "/fapi/v1/openOrders",
		host,
		auth: "private",
		fields: [["symbol", params.symbol]],
		response: z.array(futuresOrder),
	});
}

export function cancelOrder(ref: OrderRef): Operation<FuturesOrder> {
	return defineOperation({
		name: "binance.futures.cancelOrder",
		method: "DELETE",
		path: "/fapi/v1/order",
		host,
		auth: "private",
		fields: orderRefFields(ref),
		response: futuresOrder,
	});
}

export interface CancelAllParams {
	readonly symbol: string;
}

export function cancelAllOpenOrders(params: CancelAllParams): Operation<FuturesCancelAllAck> {
	return defineOperation({
		name: "binance.futures.cancelAllOpenOrders",
		method: "DELETE",
		path: "/fapi/v1/allOpenOrders",
		host,
		auth: "private",
		fields: [["symbol", params.symbol]],
		response: futuresCancelAllAck,
	});
}
