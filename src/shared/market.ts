/**
 * Market: an exchange-neutral trading pair, written `kind:BASE/QUOTE`
 * (e.g. `spot:BTC/USDT`). Each exchange formats it into its own symbol.
 */

import { ConstructRequestError } from "./errors.js";
import { err, ok } from "./result.js";
import type { Result } from "./result.js";

export const MarketKind = {
	Spot: "spot",
	/** USD(-stablecoin)-margined perpetual */
	Swap: "swap",
	/** Coin-margined perpetual */
	Inverse: "inverse",
} as const;

export type MarketKind = (typeof MarketKind)[keyof typeof MarketKind];

export interface Market {
	readonly base: string;
	readonly quote: string;
	readonly kind: MarketKind;
}

const KINDS: ReadonlySet<string> = new Set(Object.values(MarketKind));

function isMarketKind(value: string): value is MarketKind {
	return KINDS.has(value);
}

export function market(base: string, quote: string, kind: MarketKind = MarketKind.Spot): Market {
	return Object.freeze({ base, quote, kind });
}

/**
 * Parses `kind:BASE/QUOTE`.
 * @example parseMarket("swap:BTC/USDT")
 */
export function parseMarket(text: string): Result<Market, ConstructRequestError> {
	const colon = text.indexOf(":");
	const slash = text.indexOf("/", colon + 1);
	if (colon <= 0 || slash < 0) {
		return err(new ConstructRequestError(`cannot parse market ${text}`, { market: text }));
	}
	const kind = text.slice(0, colon);
	const base = text.slice(colon + 1, slash);
	const quote = text.slice(slash + 1);
	if (base.length === 0 || quote.length === 0 || quote.includes("/")) {
		return err(new ConstructRequestError(`cannot parse market ${text}`, { market: text }));
	}
	if (!isMarketKind(kind)) {
		return err(new ConstructRequestError(`invalid market kind ${kind}`, { market: text }));
	}
	return ok(market(base, quote, kind));
}

export function formatMarket(m: Market): string {
	return `${m.kind}:${m.base}/${m.quote}`;
}

export function sameMarket(a: Market, b: Market): boolean {
	return a.base === b.base && a.quote === b.quote && a.kind === b.kind;
}
