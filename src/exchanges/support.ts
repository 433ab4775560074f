/**
 * Helpers shared by the per-exchange capability bindings.
 */

import type { Capability, CapabilityArgs, CapabilityBinding } from "../client/capability.js";
import type { OrderbookLevel } from "../client/common-types.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import { NotSupportedError } from "../shared/errors.js";
import { formatMarket } from "../shared/market.js";
import type { Market, MarketKind } from "../shared/market.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export function spotOnly(exchange: ExchangeId, market: Market): Result<Market, NotSupportedError> {
	if (market.kind !== "spot") {
		return err(
			new NotSupportedError(`${exchange} supports spot markets only`, {
				exchange,
				market: formatMarket(market),
			}),
		);
	}
	return ok(market);
}

/**
 * One binding per market kind, picked from the call's arguments. A kind
 * with no binding is a NotSupportedError before anything is sent.
 */
export function byMarketKind<C extends Capability>(
	exchange: ExchangeId,
	capability: C,
	kindOf: (args: CapabilityArgs[C]) => MarketKind,
	bindings: Readonly<Partial<Record<MarketKind, CapabilityBinding<C>>>>,
): CapabilityBinding<C> {
	return {
		capability,
		async run(args, execute) {
			const kind = kindOf(args);
			const binding = bindings[kind];
			if (binding === undefined) {
				return err(
					new NotSupportedError(`${exchange} does not support ${capability} on ${kind} markets`, {
						exchange,
						capability,
						kind,
					}),
				);
			}
			return binding.run(args, execute);
		},
	};
}

export function unsupportedOrder(exchange: ExchangeId, detail: string): NotSupportedError {
	return new NotSupportedError(`${exchange} does not support ${detail}`, { exchange });
}

/** Splits an exchange symbol such as `BTC-USDT` back into a spot market. */
export function splitSymbol(
	symbol: string,
	separator: string,
): { readonly base: string; readonly quote: string } | undefined {
	const at = symbol.indexOf(separator);
	if (at <= 0 || at === symbol.length - separator.length) return undefined;
	return { base: symbol.slice(0, at), quote: symbol.slice(at + separator.length) };
}

export function levels(items: readonly OrderbookLevel[]): OrderbookLevel[] {
	return items.map(({ price, quantity }) => ({ price, quantity }));
}
