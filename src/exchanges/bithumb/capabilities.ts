import { bind } from "../../client/capability.js";
import type { CapabilityTable } from "../../client/capability.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import { ok } from "../../shared/result.js";
import { levels, spotOnly } from "../support.js";
import * as ops from "./operations.js";

const id = ExchangeId.Bithumb;

// Private capabilities stay unbound: the exchange has no signer.
export const bithumbCapabilities: CapabilityTable = {
	getOrderbook: bind(
		"getOrderbook",
		({ market, ticks }) => {
			const spot = spotOnly(id, market);
			if (!spot.ok) return spot;
			return ok({
				operation: ops.orderbook({ count: ticks }),
				pathParams: { orderCurrency: spot.value.base, paymentCurrency: spot.value.quote },
			});
		},
		(book) => ok({ bids: levels(book.bids), asks: levels(book.asks), timestamp: book.timestamp }),
	),
};
