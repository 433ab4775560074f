import { bind } from "../../client/capability.js";
import type { CapabilityTable } from "../../client/capability.js";
import type { OpenOrder, Position, PositionSide, Trade } from "../../client/common-types.js";
import { ConstructRequestError } from "../../shared/errors.js";
import type { NotSupportedError } from "../../shared/errors.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import { MarketKind } from "../../shared/market.js";
import type { Market } from "../../shared/market.js";
import type { Order, Side } from "../../shared/order.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";
import { byMarketKind, levels, unsupportedOrder } from "../support.js";
import * as futures from "./futures.js";
import type { FuturesOrderParams } from "./futures.js";
import * as ops from "./operations.js";
import type { PlaceOrderParams } from "./operations.js";

const id = ExchangeId.Binance;

/** `BTC/USDT` → `BTCUSDT`, for spot and USD-M futures alike */
export function binanceSymbol(market: Market): string {
	return `${market.base}${market.quote}`;
}

function toSide(side: Order["side"]): ops.BinanceSide {
	return side === "buy" ? ops.BinanceSide.Buy : ops.BinanceSide.Sell;
}

function fromSide(side: ops.BinanceSide): Side {
	return side === ops.BinanceSide.Buy ? "buy" : "sell";
}

function orderId(raw: string): Result<number, ConstructRequestError> {
	if (!/^\d+$/.test(raw)) {
		return err(new ConstructRequestError("binance order ids are numeric", { orderId: raw }));
	}
	return ok(Number(raw));
}

const byMarket = ({ market }: { readonly market: Market }): MarketKind => market.kind;

export function orderParams(symbol: string, order: Order): Result<PlaceOrderParams, NotSupportedError> {
	if (order.type === "market") {
		return ok({
			symbol,
			side: toSide(order.side),
			type: ops.BinanceOrderType.Market,
			quantity: order.quantity,
		});
	}
	if (order.timeInForce === "GTX") {
		return err(unsupportedOrder(id, "GTX time in force on spot"));
	}
	return ok({
		symbol,
		side: toSide(order.side),
		type: ops.BinanceOrderType.Limit,
		timeInForce: order.timeInForce,
		quantity: order.quantity,
		price: order.price,
	});
}

/** One-way mode order on a USD-M perpetual. */
export function futuresOrderParams(
	symbol: string,
	order: Order,
	reduceOnly: boolean,
): FuturesOrderParams {
	const common = {
		symbol,
		side: toSide(order.side),
		positionSide: futures.FuturesPositionSide.Both,
		quantity: order.quantity,
		reduceOnly,
		newOrderRespType: "RESULT",
	} as const;
	if (order.type === "market") {
		return { ...common, type: futures.FuturesOrderType.Market };
	}
	return {
		...common,
		type: futures.FuturesOrderType.Limit,
		timeInForce: order.timeInForce,
		price: order.price,
	};
}

function spotOpenOrder(o: ops.BinanceOpenOrder): OpenOrder {
	return {
		orderId: String(o.orderId),
		symbol: o.symbol,
		side: fromSide(o.side),
		price: o.price,
		quantity: o.origQty,
		remaining: o.origQty.sub(o.executedQty),
	};
}

function futuresOpenOrder(o: futures.FuturesOrder): OpenOrder {
	return {
		orderId: String(o.orderId),
		symbol: o.symbol,
		side: fromSide(o.side),
		price: o.price,
		quantity: o.origQty,
		remaining: o.origQty.sub(o.executedQty),
	};
}

function toTrade(t: {
	readonly id: number;
	readonly price: Trade["price"];
	readonly qty: Trade["quantity"];
	readonly time: number;
	readonly isBuyerMaker: boolean;
}): Trade {
	return {
		id: String(t.id),
		price: t.price,
		quantity: t.qty,
		// buyer is maker: the taker sold
		side: t.isBuyerMaker ? "sell" : "buy",
		timestamp: t.time,
	};
}

const POSITION_SIDES: Readonly<Record<futures.FuturesPositionSide, PositionSide>> = {
	BOTH: "both",
	LONG: "long",
	SHORT: "short",
};

function toPosition(market: Market, p: futures.FuturesPosition): Position {
	return {
		market,
		side: POSITION_SIDES[p.positionSide],
		quantity: p.positionAmt,
		entryPrice: p.entryPrice,
		markPrice: p.markPrice,
		liquidationPrice: p.liquidationPrice,
		unrealizedPnl: p.unRealizedProfit,
		leverage: p.leverage,
	};
}

/**
 * Spot markets go to `api.binance.com`, USD-M perpetuals (`swap`) to the
 * futures host. Coin-margined markets are not bound.
 */
export const binanceCapabilities: CapabilityTable = {
	getOrderbook: byMarketKind(id, "getOrderbook", byMarket, {
		[MarketKind.Spot]: bind(
			"getOrderbook",
			({ market, ticks }) =>
				ok({ operation: ops.depth({ symbol: binanceSymbol(market), limit: ticks }) }),
			(depth) => ok({ bids: levels(depth.bids), asks: levels(depth.asks) }),
		),
		[MarketKind.Swap]: bind(
			"getOrderbook",
			({ market, ticks }) =>
				ok({ operation: futures.depth({ symbol: binanceSymbol(market), limit: ticks }) }),
			(depth) => ok({ bids: levels(depth.bids), asks: levels(depth.asks), timestamp: depth.T }),
		),
	}),

	getTrades: byMarketKind(id, "getTrades", byMarket, {
		[MarketKind.Spot]: bind(
			"getTrades",
			({ market }) => ok({ operation: ops.trades({ symbol: binanceSymbol(market) }) }),
			(trades) => ok(trades.map(toTrade)),
		),
		[MarketKind.Swap]: bind(
			"getTrades",
			({ market }) => ok({ operation: futures.trades({ symbol: binanceSymbol(market) }) }),
			(trades) => ok(trades.map(toTrade)),
		),
	}),

	getBalance: bind(
		"getBalance",
		() => ok({ operation: ops.account() }),
		(account) =>
			ok(account.balances.map((b) => ({ asset: b.asset, free: b.free, locked: b.locked }))),
	),

	placeOrder: byMarketKind(id, "placeOrder", byMarket, {
		[MarketKind.Spot]: bind(
			"placeOrder",
			({ market, order, reduceOnly }) => {
				if (reduceOnly === true) return err(unsupportedOrder(id, "reduce-only orders on spot"));
				const params = orderParams(binanceSymbol(market), order);
				if (!params.ok) return params;
				return ok({ operation: ops.placeOrder(params.value) });
			},
			(ack) => ok({ orderId: String(ack.orderId) }),
		),
		[MarketKind.Swap]: bind(
			"placeOrder",
			({ market, order, reduceOnly }) =>
				ok({
					operation: futures.placeOrder(
						futuresOrderParams(binanceSymbol(market), order, reduceOnly ?? false),
					),
				}),
			(ack) => ok({ orderId: String(ack.orderId) }),
		),
	}),

	cancelOrder: byMarketKind(id, "cancelOrder", byMarket, {
		[MarketKind.Spot]: bind(
			"cancelOrder",
			({ market, orderId: raw }) => {
				const parsed = orderId(raw);
				if (!parsed.ok) return parsed;
				return ok({
					operation: ops.cancelOrder({ symbol: binanceSymbol(market), orderId: parsed.value }),
				});
			},
			(ack) => ok({ orderId: String(ack.orderId) }),
		),
		[MarketKind.Swap]: bind(
			"cancelOrder",
			({ market, orderId: raw }) => {
				const parsed = orderId(raw);
				if (!parsed.ok) return parsed;
				return ok({
					operation: futures.cancelOrder({ symbol: binanceSymbol(market), orderId: parsed.value }),
				});
			},
			(ack) => ok({ orderId: String(ack.orderId) }),
		),
	}),

	getOrders: byMarketKind(id, "getOrders", byMarket, {
		[MarketKind.Spot]: bind(
			"getOrders",
			({ market }) => ok({ operation: ops.openOrders({ symbol: binanceSymbol(market) }) }),
			(orders) => ok(orders.map(spotOpenOrder)),
		),
		[MarketKind.Swap]: bind(
			"getOrders",
			({ market }) => ok({ operation: futures.openOrders({ symbol: binanceSymbol(market) }) }),
			(orders) => ok(orders.map(futuresOpenOrder)),
		),
	}),

	getAllOrders: byMarketKind(id, "getAllOrders", ({ kind }) => kind ?? MarketKind.Spot, {
		[MarketKind.Spot]: bind(
			"getAllOrders",
			() => ok({ operation: ops.openOrders() }),
			(orders) => ok(orders.map(spotOpenOrder)),
		),
		[MarketKind.Swap]: bind(
			"getAllOrders",
			() => ok({ operation: futures.openOrders() }),
			(orders) => ok(orders.map(futuresOpenOrder)),
		),
	}),

	cancelAllOrders: byMarketKind(id, "cancelAllOrders", byMarket, {
		[MarketKind.Spot]: bind(
			"cancelAllOrders",
			({ market }) => ok({ operation: ops.cancelOpenOrders({ symbol: binanceSymbol(market) }) }),
			(cancelled) =>
				ok({
					orderIds: cancelled.flatMap((c) => (c.orderId === undefined ? [] : [String(c.orderId)])),
				}),
		),
		[MarketKind.Swap]: bind(
			"cancelAllOrders",
			({ market }) =>
				ok({ operation: futures.cancelAllOpenOrders({ symbol: binanceSymbol(market) }) }),
			() => ok({ orderIds: undefined }),
		),
	}),

	getPosition: byMarketKind(id, "getPosition", byMarket, {
		[MarketKind.Swap]: bind(
			"getPosition",
			({ market }) => ok({ operation: futures.positionRisk({ symbol: binanceSymbol(market) }) }),
			(positions, { market }) => ok(positions.map((p) => toPosition(market, p))),
		),
	}),
};
