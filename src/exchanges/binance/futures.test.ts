import { describe, expect, it } from "vitest";
import { Decimal } from "../../lib/decimal/index.js";
import { validate } from "../../lib/validation/index.js";
import {
	FuturesOrderType,
	FuturesPositionSide,
	balance,
	cancelAllOpenOrders,
	cancelOrder,
	depth,
	futuresCancelAllAck,
	futuresPosition,
	openOrder,
	openOrders,
	placeOrder,
	positionRisk,
	trades,
} from "./futures.js";
import { BinanceSide } from "./operations.js";

describe("binance futures operations", () => {
	it("every operation targets the futures host", () => {
		const all = [
			trades({ symbol: "BTCUSDT" }),
			depth({ symbol: "BTCUSDT" }),
			balance(),
			positionRisk(),
			openOrder({ symbol: "BTCUSDT", orderId: 1 }),
			openOrders(),
			cancelOrder({ symbol: "BTCUSDT", orderId: 1 }),
			cancelAllOpenOrders({ symbol: "BTCUSDT" }),
		];
		expect(all.map((op) => op.host)).toEqual(new Array<string>(8).fill("binance.futures"));
	});

	it("market data is public and reads under /fapi/v1", () => {
		const op = depth({ symbol: "ETHUSDT", limit: 50 });
		expect(op).toMatchObject({
			name: "binance.futures.depth",
			method: "GET",
			path: "/fapi/v1/depth",
			auth: "disabled",
		});
		expect(op.fields).toEqual([
			["symbol", "ETHUSDT"],
			["limit", 50],
		]);
		expect(trades({ symbol: "ETHUSDT" }).path).toBe("/fapi/v1/trades");
	});

	it("account reads are private and live under /fapi/v2", () => {
		expect(balance()).toMatchObject({ path: "/fapi/v2/balance", auth: "private" });
		expect(positionRisk({ symbol: "BTCUSDT" })).toMatchObject({
			path: "/fapi/v2/positionRisk",
			auth: "private",
		});
		expect(positionRisk().fields).toEqual([["symbol", undefined]]);
	});

	it("placeOrder writes priceProtect in upper case and reduceOnly as a boolean", () => {
		const op = placeOrder({
			symbol: "BTCUSDT",
			side: BinanceSide.Buy,
			positionSide: FuturesPositionSide.Both,
			type: FuturesOrderType.StopMarket,
			quantity: Decimal.from("0.002"),
			reduceOnly: false,
			stopPrice: Decimal.from("31000.50"),
			priceProtect: true,
		});
		expect(op).toMatchObject({ method: "POST", path: "/fapi/v1/order", auth: "private" });
		expect(op.fields.filter(([, value]) => value !== undefined)).toEqual([
			["symbol", "BTCUSDT"],
			["side", "BUY"],
			["positionSide", "BOTH"],
			["type", "STOP_MARKET"],
			["quantity", "0.002"],
			["reduceOnly", false],
			["stopPrice", "31000.5"],
			["priceProtect", "TRUE"],
		]);
	});

	it("cancelOrder and cancelAllOpenOrders are private DELETEs", () => {
		const cancel = cancelOrder({ symbol: "BTCUSDT", origClientOrderId: "client-1" });
		expect(cancel).toMatchObject({ method: "DELETE", path: "/fapi/v1/order" });
		expect(cancel.fields).toEqual([
			["symbol", "BTCUSDT"],
			["orderId", undefined],
			["origClientOrderId", "client-1"],
		]);
		expect(cancelAllOpenOrders({ symbol: "BTCUSDT" })).toMatchObject({
			method: "DELETE",
			path: "/fapi/v1/allOpenOrders",
			auth: "private",
		});
	});
});

describe("binance futures response schemas", () => {
	const longLeg = {
		symbol: "BTCUSDT",
		positionAmt: "0.010",
		entryPrice: "30000",
		markPrice: "30500",
		unRealizedProfit: "5",
		liquidationPrice: "0",
		leverage: "20",
		marginType: "isolated",
		isolatedMargin: "15.5",
		positionSide: "LONG",
		notional: "305",
		isolatedWallet: "15",
		updateTime: 1_700_000_000_000,
	};

	it("parses both legs of a hedge-mode position", () => {
		const result = validate(positionRisk().response, [
			longLeg,
			{ ...longLeg, positionAmt: "0", positionSide: "SHORT" },
		]);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.map((p) => p.positionSide)).toEqual(["LONG", "SHORT"]);
			expect(result.value[0]?.isolatedMargin.toString()).toBe("15.5");
		}
	});

	it("rejects an unknown position side", () => {
		expect(validate(futuresPosition, { ...longLeg, positionSide: "NET" }).ok).toBe(false);
	});

	it("accepts the cancel-all reply with a string or numeric code", () => {
		expect(validate(futuresCancelAllAck, { code: "200", msg: "done" }).ok).toBe(true);
		expect(validate(futuresCancelAllAck, { code: 200, msg: "done" }).ok).toBe(true);
	});
});
