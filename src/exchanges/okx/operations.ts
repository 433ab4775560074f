/**
 * OKX v5 REST operations. Every success body is `{"code":"0","data":[...]}`;
 * the schemas below describe `data`.
 */

import { z } from "../../lib/validation/index.js";
import { defineOperation } from "../../operation/operation.js";
import type { Operation } from "../../operation/types.js";
import { decimal, decimalOrZero, epochMs, intString, single } from "../schemas.js";

export const InstType = {
	Spot: "SPOT",
	Swap: "SWAP",
	Futures: "FUTURES",
	Option: "OPTION",
} as const;
export type InstType = (typeof InstType)[keyof typeof InstType];

// ── Response schemas ─────────────────────────────────────────────────

export const okxTicker = z.object({
	instType: z.string(),
	instId: z.string(),
	last: decimal,
	lastSz: decimal,
	askPx: decimalOrZero,
	askSz: decimal,
	bidPx: decimalOrZero,
	bidSz: decimal,
	ts: epochMs,
});
export type OkxTicker = z.infer<typeof okxTicker>;

/** `[price, size, "0", numOrders]`; the third slot is deprecated. */
const bookLevel = z
	.tuple([decimal, decimal, z.string(), intString])
	.transform(([price, quantity, , numOrders]) => ({ price, quantity, numOrders }));

export const okxBook = z.object({
	asks: z.array(bookLevel),
	bids: z.array(bookLevel),
	ts: epochMs,
});
export type OkxBook = z.infer<typeof okxBook>;

export const okxBalanceDetail = z.object({
	ccy: z.string(),
	eq: decimal,
	uTime: epochMs,
	isoEq: decimalOrZero,
	availEq: decimalOrZero,
	disEq: decimalOrZero,
	availBal: decimalOrZero,
	frozenBal: decimalOrZero,
	ordFrozen: decimalOrZero,
	liab: decimalOrZero,
	upl: decimalOrZero,
	crossLiab: decimalOrZero,
	isoLiab: decimalOrZero,
	mgnRatio: decimalOrZero,
	interest: decimalOrZero,
	maxLoan: decimalOrZero,
	eqUsd: decimalOrZero,
});
export type OkxBalanceDetail = z.infer<typeof okxBalanceDetail>;

export const okxBalance = z.object({
	uTime: epochMs,
	totalEq: decimal,
	isoEq: decimalOrZero,
	adjEq: decimalOrZero,
	ordFroz: decimalOrZero,
	imr: decimalOrZero,
	mmr: decimalOrZero,
	mgnRatio: decimalOrZero,
	notionalUsd: decimalOrZero,
	details: z.array(okxBalanceDetail),
});
export type OkxBalance = z.infer<typeof okxBalance>;

// ── Operations ───────────────────────────────────────────────────────

export interface TickerParams {
	readonly instId: string;
}

export function ticker(params: TickerParams): Operation<OkxTicker> {
	return defineOperation({
		name: "okx.ticker",
		method: "GET",
		path: "/api/v5/market/ticker",
		fields: [["instId", params.instId]],
		response: single(okxTicker),
	});
}

export interface TickersParams {
	readonly instType: InstType;
	readonly uly?: string | undefined;
	readonly instFamily?: string | undefined;
}

export function tickers(params: TickersParams): Operation<OkxTicker[]> {
	return defineOperation({
		name: "okx.tickers",
		method: "GET",
		path: "/api/v5/market/tickers",
		fields: [
			["instType", params.instType],
			["uly", params.uly],
			["instFamily", params.instFamily],
		],
		response: z.array(okxTicker),
	});
}

export interface BooksParams {
	readonly instId: string;
	/** Depth per side */
	readonly sz?: number | undefined;
}

export function books(params: BooksParams): Operation<OkxBook> {
	return defineOperation({
		name: "okx.books",
		method: "GET",
		path: "/api/v5/market/books",
		fields: [
			["instId", params.instId],
			["sz", params.sz],
		],
		response: single(okxBook),
	});
}

export interface BalanceParams {
	/** Comma-separated currencies, e.g. `BTC,ETH` */
	readonly ccy?: string | undefined;
}

export function balance(params: BalanceParams = {}): Operation<OkxBalance> {
	return defineOperation({
		name: "okx.balance",
		method: "GET",
		path: "/api/v5/account/balance",
		auth: "private",
		fields: [["ccy", params.ccy]],
		response: single(okxBalance),
	});
}
