export {
	type CallOptions,
	type ClientDeps,
	type ClientOptions,
	ExchangeClient,
	PrivateExchangeClient,
} from "./exchange-client.js";
export {
	type BoundCall,
	type Capability,
	type CapabilityArgs,
	type CapabilityBinding,
	type CapabilityResult,
	type CapabilityTable,
	type Executor,
	CAPABILITIES,
	bind,
	isCapability,
} from "./capability.js";
export {
	type Balance,
	type CancelAllAck,
	type OpenOrder,
	type OrderAck,
	type Orderbook,
	type OrderbookLevel,
	type Position,
	PositionSide,
	type Ticker,
	type Trade,
} from "./common-types.js";
