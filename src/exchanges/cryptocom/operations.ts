/**
 * Crypto.com v2 public REST operations. Payloads arrive under `data`.
 */

import { z } from "../../lib/validation/index.js";
import { defineOperation } from "../../operation/operation.js";
import type { Operation } from "../../operation/types.js";
import { decimal, epochMs, nullableDecimal, single } from "../schemas.js";

export const CryptocomSide = { Buy: "BUY", Sell: "SELL" } as const;
export type CryptocomSide = (typeof CryptocomSide)[keyof typeof CryptocomSide];

// ── Response schemas ─────────────────────────────────────────────────

/** Single-letter keys expanded; `null` prices (no trades, empty book) read as undefined. */
export const cryptocomTicker = z
	.object({
		h: nullableDecimal,
		l: nullableDecimal,
		a: nullableDecimal,
		i: z.string(),
		v: decimal,
		vv: decimal,
		oi: nullableDecimal.optional(),
		c: nullableDecimal,
		b: nullableDecimal,
		k: nullableDecimal,
		t: epochMs,
	})
	.transform((t) => ({
		instrumentName: t.i,
		high24h: t.h,
		low24h: t.l,
		lastPrice: t.a,
		volume24h: t.v,
		volume24hUsd: t.vv,
		openInterest: t.oi,
		priceChange24h: t.c,
		bestBid: t.b,
		bestAsk: t.k,
		timestamp: t.t,
	}));
export type CryptocomTicker = z.infer<typeof cryptocomTicker>;

export const cryptocomTrade = z
	.object({
		p: decimal,
		q: decimal,
		s: z.nativeEnum(CryptocomSide),
		i: z.string(),
		t: epochMs,
		d: z.string(),
	})
	.transform((t) => ({
		price: t.p,
		quantity: t.q,
		side: t.s,
		instrumentName: t.i,
		timestamp: t.t,
		id: t.d,
	}));
export type CryptocomTrade = z.infer<typeof cryptocomTrade>;

/** `[price, quantity, orderCount]` */
const bookLevel = z
	.tuple([decimal, decimal, decimal])
	.transform(([price, quantity]) => ({ price, quantity }));

export const cryptocomBook = z
	.object({ asks: z.array(bookLevel), bids: z.array(bookLevel), t: epochMs })
	.transform((b) => ({ asks: b.asks, bids: b.bids, timestamp: b.t }));
export type CryptocomBook = z.infer<typeof cryptocomBook>;

// ── Operations ───────────────────────────────────────────────────────

export interface TickerParams {
	/** Omit for every instrument */
	readonly instrumentName?: string | undefined;
}

export function ticker(params: TickerParams = {}): Operation<CryptocomTicker[]> {
	return defineOperation({
		name: "cryptocom.ticker",
		method: "GET",
		path: "/v2/public/get-ticker",
		fields: [["instrument_name", params.instrumentName]],
		response: z.array(cryptocomTicker),
	});
}

export interface TradesParams {
	readonly instrumentName: string;
}

export function trades(params: TradesParams): Operation<CryptocomTrade[]> {
	return defineOperation({
		name: "cryptocom.trades",
		method: "GET",
		path: "/v2/public/get-trades",
		fields: [["instrument_name", params.instrumentName]],
		response: z.array(cryptocomTrade),
	});
}

export interface BookParams {
	readonly instrumentName: string;
	readonly depth?: number | undefined;
}

export function book(params: BookParams): Operation<CryptocomBook> {
	return defineOperation({
		name: "cryptocom.book",
		method: "GET",
		path: "/v2/public/get-book",
		fields: [
			["instrument_name", params.instrumentName],
			["depth", params.depth],
		],
		response: single(cryptocomBook),
	});
}
