import { bind } from "../../client/capability.js";
import type { CapabilityTable } from "../../client/capability.js";
import type { Ticker } from "../../client/common-types.js";
import type { Decimal } from "../../lib/decimal/index.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import { market as makeMarket, sameMarket } from "../../shared/market.js";
import type { Market } from "../../shared/market.js";
import type { NotSupportedError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";
import { levels, splitSymbol, unsupportedOrder } from "../support.js";
import * as ops from "./operations.js";

const id = ExchangeId.Okx;

/** `spot:BTC/USDT` → `BTC-USDT`, `swap:BTC/USDT` → `BTC-USDT-SWAP` */
export function okxInstId(market: Market): Result<string, NotSupportedError> {
	switch (market.kind) {
		case "spot":
			return ok(`${market.base}-${market.quote}`);
		case "swap":
			return ok(`${market.base}-${market.quote}-SWAP`);
		case "inverse":
			return err(unsupportedOrder(id, "coin-margined markets"));
	}
}

// OKX sends "" for an empty side, read as zero.
function nonZero(value: Decimal): Decimal | undefined {
	return value.isZero() ? undefined : value;
}

export const okxCapabilities: CapabilityTable = {
	// Spot tickers only.
	getTickers: bind(
		"getTickers",
		() => ok({ operation: ops.tickers({ instType: ops.InstType.Spot }) }),
		(tickers, { markets }) => {
			const out: Ticker[] = [];
			for (const t of tickers) {
				const pair = splitSymbol(t.instId, "-");
				if (pair === undefined) continue;
				const m = makeMarket(pair.base, pair.quote);
				if (markets !== undefined && !markets.some((wanted) => sameMarket(wanted, m))) continue;
				out.push({ market: m, bid: nonZero(t.bidPx), ask: nonZero(t.askPx) });
			}
			return ok(out);
		},
	),

	getOrderbook: bind(
		"getOrderbook",
		({ market, ticks }) => {
			const instId = okxInstId(market);
			if (!instId.ok) return instId;
			return ok({ operation: ops.books({ instId: instId.value, sz: ticks }) });
		},
		(book) => ok({ bids: levels(book.bids), asks: levels(book.asks), timestamp: book.ts }),
	),

	getBalance: bind(
		"getBalance",
		() => ok({ operation: ops.balance() }),
		(balance) =>
			ok(
				balance.details.map((d) => ({ asset: d.ccy, free: d.availBal, locked: d.frozenBal })),
			),
	),
};
