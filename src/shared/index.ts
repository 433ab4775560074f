export { type Result, ok, err, tryCatch } from "./result.js";

export {
	ErrorCategory,
	SdkError,
	ConstructRequestError,
	SerializeBodyError,
	TransportError,
	RequestFailedError,
	DeserializeResponseError,
	AuthError,
	NotSupportedError,
	ConfigError,
	classifyTransportFailure,
	isConstructRequestError,
	isSerializeBodyError,
	isTransportError,
	isRequestFailed,
	isDeserializeResponseError,
	isAuthError,
	isNotSupportedError,
	isConfigError,
} from "./errors.js";

export { API_HOSTS, ApiHost, EXCHANGE_IDS, ExchangeId, envPrefix, isExchangeId } from "./exchange-id.js";
export type { HostId } from "./exchange-id.js";
export { type Market, MarketKind, formatMarket, market, parseMarket, sameMarket } from "./market.js";
export { type Order, Side, TimeInForce } from "./order.js";
export {
	type Clock,
	type NonceSource,
	SystemClock,
	FakeClock,
	UuidNonceSource,
	FixedNonceSource,
	Duration,
} from "./time.js";
export { type SdkConfig, DEFAULT_SDK_CONFIG, configFromEnv, resolveConfig } from "./config.js";
