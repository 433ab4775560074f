/**
 * Capabilities: operations most exchanges offer in some form, called
 * with exchange-neutral arguments. Each exchange binds the subset it
 * supports; anything else is a NotSupportedError at the call boundary.
 */

import type { Operation, PathParams } from "../operation/types.js";
import type { SdkError } from "../shared/errors.js";
import type { Market, MarketKind } from "../shared/market.js";
import type { Order } from "../shared/order.js";
import type { Result } from "../shared/result.js";
import type {
	Balance,
	CancelAllAck,
	OpenOrder,
	OrderAck,
	Orderbook,
	Position,
	Ticker,
	Trade,
} from "./common-types.js";

export const CAPABILITIES = [
	"getOrderbook",
	"getTickers",
	"getTrades",
	"getBalance",
	"placeOrder",
	"cancelOrder",
	"getOrders",
	"getAllOrders",
	"cancelAllOrders",
	"getPosition",
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export interface CapabilityArgs {
	readonly getOrderbook: {
		readonly market: Market;
		/** Desired levels per side; exchanges treat it as a hint */
		readonly ticks?: number | undefined;
	};
	readonly getTickers: {
		/** Keep only these markets; all markets when omitted */
		readonly markets?: readonly Market[] | undefined;
	};
	readonly getTrades: { readonly market: Market };
	readonly getBalance: Readonly<Record<string, never>>;
	readonly placeOrder: {
		readonly market: Market;
		readonly order: Order;
		/** Derivatives only; the order may only shrink a position */
		readonly reduceOnly?: boolean | undefined;
	};
	readonly cancelOrder: { readonly market: Market; readonly orderId: string };
	/** Open orders in one market */
	readonly getOrders: { readonly market: Market };
	/** Open orders across every market of one kind; spot when omitted */
	readonly getAllOrders: { readonly kind?: MarketKind | undefined };
	/** Cancels every open order in one market */
	readonly cancelAllOrders: { readonly market: Market };
	readonly getPosition: { readonly market: Market };
}

export interface CapabilityResult {
	readonly getOrderbook: Orderbook;
	readonly getTickers: readonly Ticker[];
	readonly getTrades: readonly Trade[];
	readonly getBalance: readonly Balance[];
	readonly placeOrder: OrderAck;
	readonly cancelOrder: OrderAck;
	readonly getOrders: readonly OpenOrder[];
	readonly getAllOrders: readonly OpenOrder[];
	readonly cancelAllOrders: CancelAllAck;
	readonly getPosition: readonly Position[];
}

/** An operation together with the path parameters it needs. */
export interface BoundCall<T> {
	readonly operation: Operation<T>;
	readonly pathParams?: PathParams | undefined;
}

export type Executor = <T>(call: BoundCall<T>) => Promise<Result<T, SdkError>>;

export interface CapabilityBinding<C extends Capability> {
	readonly capability: C;
	run(args: CapabilityArgs[C], execute: Executor): Promise<Result<CapabilityResult[C], SdkError>>;
}

export type CapabilityTable = { readonly [C in Capability]?: CapabilityBinding<C> };

/**
 * Binds a capability to one exchange operation: `build` maps neutral
 * arguments to the call, `toCommon` maps the decoded payload back.
 */
export function bind<C extends Capability, R>(
	capability: C,
	build: (args: CapabilityArgs[C]) => Result<BoundCall<R>, SdkError>,
	toCommon: (raw: R, args: CapabilityArgs[C]) => Result<CapabilityResult[C], SdkError>,
): CapabilityBinding<C> {
	return {
		capability,
		async run(args, execute) {
			const call = build(args);
			if (!call.ok) return call;
			const raw = await execute(call.value);
			if (!raw.ok) return raw;
			return toCommon(raw.value, args);
		},
	};
}

export function isCapability(value: string): value is Capability {
	return CAPABILITIES.some((c) => c === value);
}
