import { describe, expect, it } from "vitest";
import { Decimal } from "../../lib/decimal/index.js";
import {
	BinanceOrderType,
	BinanceSide,
	account,
	cancelOrder,
	depth,
	openOrders,
	placeOrder,
	trades,
} from "./operations.js";

describe("binance operations", () => {
	it("trades is a public GET with symbol then limit", () => {
		const op = trades({ symbol: "BTCUSDT", limit: 5 });
		expect(op).toMatchObject({
			name: "binance.trades",
			method: "GET",
			path: "/api/v3/trades",
			auth: "disabled",
		});
		expect(op.fields).toEqual([
			["symbol", "BTCUSDT"],
			["limit", 5],
		]);
	});

	it("account is private and has no fields", () => {
		const op = account();
		expect(op.auth).toBe("private");
		expect(op.method).toBe("GET");
		expect(op.fields).toEqual([]);
	});

	it("placeOrder keeps field order and writes decimals as plain strings", () => {
		const op = placeOrder({
			symbol: "LTCBTC",
			side: BinanceSide.Buy,
			type: BinanceOrderType.Limit,
			timeInForce: "GTC",
			quantity: Decimal.from("1"),
			price: Decimal.from("0.1000"),
		});
		expect(op.method).toBe("POST");
		expect(op.auth).toBe("private");
		expect(op.fields.filter(([, value]) => value !== undefined)).toEqual([
			["symbol", "LTCBTC"],
			["side", "BUY"],
			["type", "LIMIT"],
			["timeInForce", "GTC"],
			["quantity", "1"],
			["price", "0.1"],
		]);
	});

	it("openOrders is a private GET and cancelOrder a private DELETE", () => {
		expect(openOrders()).toMatchObject({ method: "GET", path: "/api/v3/openOrders", auth: "private" });
		expect(openOrders().fields).toEqual([["symbol", undefined]]);
		const cancel = cancelOrder({ symbol: "LTCBTC", orderId: 28 });
		expect(cancel).toMatchObject({ method: "DELETE", path: "/api/v3/order", auth: "private" });
		expect(cancel.fields).toEqual([
			["symbol", "LTCBTC"],
			["orderId", 28],
			["origClientOrderId", undefined],
		]);
	});
});

describe("binance response schemas", () => {
	it("parses recent trades", () => {
		const parsed = trades({ symbol: "BNBBTC" }).response.parse([
			{
				id: 28457,
				price: "4.00000100",
				qty: "12.00000000",
				quoteQty: "48.000012",
				time: 1499865549590,
				isBuyerMaker: true,
				isBestMatch: true,
			},
		]);
		expect(parsed).toHaveLength(1);
		expect(parsed[0]?.price.toString()).toBe("4.000001");
		expect(parsed[0]?.qty.toString()).toBe("12");
		expect(parsed[0]?.time).toBe(1499865549590);
	});

	it("parses depth levels from [price, qty] pairs", () => {
		const parsed = depth({ symbol: "BNBBTC" }).response.parse({
			lastUpdateId: 1027024,
			bids: [["4.00000000", "431.00000000"]],
			asks: [
				["4.00000200", "12.00000000"],
				["4.00000300", "1.50000000"],
			],
		});
		expect(parsed.lastUpdateId).toBe(1027024);
		expect(parsed.bids.map((l) => [l.price.toString(), l.quantity.toString()])).toEqual([["4", "431"]]);
		expect(parsed.asks).toHaveLength(2);
	});

	it("parses an order ack with only the ACK fields", () => {
		const parsed = placeOrder({
			symbol: "BTCUSDT",
			side: BinanceSide.Sell,
			type: BinanceOrderType.Market,
		}).response.parse({
			symbol: "BTCUSDT",
			orderId: 28,
			orderListId: -1,
			clientOrderId: "client-1",
			transactTime: 1507725176595,
		});
		expect(parsed.orderId).toBe(28);
		expect(parsed.status).toBeUndefined();
	});

	it("rejects a non-numeric order id", () => {
		const result = cancelOrder({ symbol: "BTCUSDT" }).response.safeParse({
			symbol: "BTCUSDT",
			orderId: "not-a-number",
			origClientOrderId: "x",
			status: "CANCELED",
		});
		expect(result.success).toBe(false);
	});
});
