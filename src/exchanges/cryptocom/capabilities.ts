import { bind } from "../../client/capability.js";
import type { CapabilityTable } from "../../client/capability.js";
import type { Ticker } from "../../client/common-types.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import { market as makeMarket, sameMarket } from "../../shared/market.js";
import type { Market } from "../../shared/market.js";
import { ok } from "../../shared/result.js";
import { levels, spotOnly, splitSymbol } from "../support.js";
import * as ops from "./operations.js";

const id = ExchangeId.Cryptocom;

/** `spot:BTC/USDT` → `BTC_USDT` */
export function instrumentName(market: Market): string {
	return `${market.base}_${market.quote}`;
}

export const cryptocomCapabilities: CapabilityTable = {
	getTickers: bind(
		"getTickers",
		() => ok({ operation: ops.ticker() }),
		(tickers, { markets }) => {
			const out: Ticker[] = [];
			for (const t of tickers) {
				const pair = splitSymbol(t.instrumentName, "_");
				if (pair === undefined) continue;
				const m = makeMarket(pair.base, pair.quote);
				if (markets !== undefined && !markets.some((wanted) => sameMarket(wanted, m))) continue;
				out.push({ market: m, bid: t.bestBid, ask: t.bestAsk });
			}
			return ok(out);
		},
	),

	getTrades: bind(
		"getTrades",
		({ market }) => {
			const spot = spotOnly(id, market);
			if (!spot.ok) return spot;
			return ok({ operation: ops.trades({ instrumentName: instrumentName(spot.value) }) });
		},
		(trades) =>
			ok(
				trades.map((t) => ({
					id: t.id,
					price: t.price,
					quantity: t.quantity,
					side: t.side === ops.CryptocomSide.Buy ? ("buy" as const) : ("sell" as const),
					timestamp: t.timestamp,
				})),
			),
	),

	getOrderbook: bind(
		"getOrderbook",
		({ market, ticks }) => {
			const spot = spotOnly(id, market);
			if (!spot.ok) return spot;
			return ok({
				operation: ops.book({ instrumentName: instrumentName(spot.value), depth: ticks }),
			});
		},
		(book) => ok({ bids: levels(book.bids), asks: levels(book.asks), timestamp: book.timestamp }),
	),
};
