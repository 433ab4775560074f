/**
 * Exchange-neutral shapes returned by capability calls.
 */

import type { Decimal } from "../lib/decimal/index.js";
import type { Market } from "../shared/market.js";
import type { Side } from "../shared/order.js";

export interface OrderbookLevel {
	readonly price: Decimal;
	readonly quantity: Decimal;
}

export interface Orderbook {
	readonly bids: readonly OrderbookLevel[];
	readonly asks: readonly OrderbookLevel[];
	/** Exchange timestamp in epoch ms, when the exchange sends one */
	readonly timestamp?: number | undefined;
}

/** Best bid and ask; undefined on an empty side. */
export interface Ticker {
	readonly market: Market;
	readonly bid: Decimal | undefined;
	readonly ask: Decimal | undefined;
}

export interface Trade {
	readonly id: string;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly side: Side;
	readonly timestamp: number;
}

export interface Balance {
	readonly asset: string;
	readonly free: Decimal;
	readonly locked: Decimal;
}

export interface OrderAck {
	readonly orderId: string;
}

/** Ids are listed only where the exchange reports them. */
export interface CancelAllAck {
	readonly orderIds: readonly string[] | undefined;
}

export interface OpenOrder {
	readonly orderId: string;
	/** Exchange symbol, e.g. `BTCUSDT` */
	readonly symbol?: string | undefined;
	readonly side: Side;
	readonly price: Decimal | undefined;
	readonly quantity: Decimal | undefined;
	readonly remaining: Decimal | undefined;
}

export const PositionSide = {
	/** One-way mode: a single net position */
	Both: "both",
	Long: "long",
	Short: "short",
} as const;

export type PositionSide = (typeof PositionSide)[keyof typeof PositionSide];

/** A derivatives position. One-way accounts report one per market, hedge-mode accounts two. */
export interface Position {
	readonly market: Market;
	readonly side: PositionSide;
	/** Signed size in base units; negative when short */
	readonly quantity: Decimal;
	readonly entryPrice: Decimal;
	readonly markPrice: Decimal;
	readonly liquidationPrice: Decimal;
	readonly unrealizedPnl: Decimal;
	readonly leverage: Decimal;
}
