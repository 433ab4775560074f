import { bind } from "../../client/capability.js";
import type { CapabilityTable } from "../../client/capability.js";
import { DeserializeResponseError } from "../../shared/errors.js";
import type { NotSupportedError } from "../../shared/errors.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import type { Market } from "../../shared/market.js";
import type { Order, Side } from "../../shared/order.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";
import { spotOnly, unsupportedOrder } from "../support.js";
import * as ops from "./operations.js";
import type { PlaceOrderParams } from "./operations.js";

const id = ExchangeId.Upbit;

/** `spot:BTC/KRW` → `KRW-BTC` (quote first) */
export function upbitMarket(market: Market): string {
	return `${market.quote}-${market.base}`;
}

function fromSide(side: ops.UpbitSide): Side {
	return side === ops.UpbitSide.Bid ? "buy" : "sell";
}

/**
 * Upbit sizes a market buy by the quote amount to spend, so the order's
 * quantity goes out as `price`. Limit orders are good-til-cancelled only.
 */
export function orderParams(
	marketCode: string,
	order: Order,
): Result<PlaceOrderParams, NotSupportedError> {
	const side = order.side === "buy" ? ops.UpbitSide.Bid : ops.UpbitSide.Ask;
	if (order.type === "market") {
		return ok(
			order.side === "buy"
				? { market: marketCode, side, ordType: ops.UpbitOrderType.MarketBuy, price: order.quantity }
				: { market: marketCode, side, ordType: ops.UpbitOrderType.MarketSell, volume: order.quantity },
		);
	}
	if (order.timeInForce !== "GTC") {
		return err(unsupportedOrder(id, `${order.timeInForce} time in force`));
	}
	return ok({
		market: marketCode,
		side,
		ordType: ops.UpbitOrderType.Limit,
		volume: order.quantity,
		price: order.price,
	});
}

export const upbitCapabilities: CapabilityTable = {
	getOrderbook: bind(
		"getOrderbook",
		({ market }) => {
			const spot = spotOnly(id, market);
			if (!spot.ok) return spot;
			return ok({ operation: ops.orderbook({ markets: [upbitMarket(spot.value)] }) });
		},
		(books) => {
			const [book, ...extra] = books;
			if (book === undefined || extra.length > 0) {
				return err(
					new DeserializeResponseError(`expected one orderbook, got ${books.length}`, {
						exchange: id,
					}),
				);
			}
			return ok({
				bids: book.orderbook_units.map((u) => ({ price: u.bid_price, quantity: u.bid_size })),
				asks: book.orderbook_units.map((u) => ({ price: u.ask_price, quantity: u.ask_size })),
				timestamp: book.timestamp,
			});
		},
	),

	getBalance: bind(
		"getBalance",
		() => ok({ operation: ops.accounts() }),
		(accounts) =>
			ok(accounts.map((a) => ({ asset: a.currency, free: a.balance, locked: a.locked }))),
	),

	placeOrder: bind(
		"placeOrder",
		({ market, order }) => {
			const spot = spotOnly(id, market);
			if (!spot.ok) return spot;
			const params = orderParams(upbitMarket(spot.value), order);
			if (!params.ok) return params;
			return ok({ operation: ops.placeOrder(params.value) });
		},
		(placed) => ok({ orderId: placed.uuid }),
	),

	cancelOrder: bind(
		"cancelOrder",
		({ orderId }) => ok({ operation: ops.cancelOrder({ uuid: orderId }) }),
		(cancelled) => ok({ orderId: cancelled.uuid }),
	),

	getOrders: bind(
		"getOrders",
		({ market }) => {
			const spot = spotOnly(id, market);
			if (!spot.ok) return spot;
			return ok({
				operation: ops.orders({
					market: upbitMarket(spot.value),
					state: ops.OrderState.Wait,
					orderBy: ops.SortOrder.Desc,
				}),
			});
		},
		(orders) =>
			ok(
				orders.map((o) => ({
					orderId: o.uuid,
					side: fromSide(o.side),
					price: o.price ?? undefined,
					quantity: o.volume ?? undefined,
					remaining: o.remaining_volume ?? undefined,
				})),
			),
	),
};
