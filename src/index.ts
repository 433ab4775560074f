// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";
export { Decimal } from "./lib/decimal/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	LOG_LEVELS,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export {
	type Schema,
	type ValidationIssue,
	ValidationError,
	validate,
} from "./lib/validation/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export {
	type ApiKeySet,
	type Credentials,
	createCredentials,
	credentialsFromEnv,
	unwrapCredentials,
} from "./auth/index.js";

// ── Operations ───────────────────────────────────────────────────────
export {
	type AuthTag,
	type Field,
	type FieldValue,
	type HttpMethod,
	type ListStyle,
	type Operation,
	type OperationInit,
	type PathParams,
	defineOperation,
	encodeQuery,
	renderPath,
} from "./operation/index.js";

// ── Signing ──────────────────────────────────────────────────────────
export {
	type PreparedRequest,
	type SignedPayload,
	type SignerKind,
	type SigningContext,
	type SigningStrategy,
	signerFor,
} from "./signing/index.js";

// ── Transport & Decoding ─────────────────────────────────────────────
export {
	type EncodingRules,
	type HttpTransport,
	type WireRequest,
	type WireResponse,
	type WriteBody,
	FakeTransport,
	FetchTransport,
	encodeWireRequest,
} from "./transport/index.js";
export { type Envelope, type ResponseRules, decodeResponse } from "./decoding/index.js";

// ── Pipeline ─────────────────────────────────────────────────────────
export {
	type ExchangeCall,
	type Handler,
	type Layer,
	type PreparedCall,
	type SignedCall,
	type Stage,
	Pipeline,
	authLayer,
	exchangeLayer,
	transportLayer,
} from "./pipeline/index.js";

// ── Exchanges ────────────────────────────────────────────────────────
export {
	type BaseUrls,
	type ExchangeEntry,
	type ExchangeProfile,
	binance,
	bithumb,
	cryptocom,
	exchangeEntry,
	okx,
	profileFor,
	resolveBaseUrls,
	upbit,
} from "./exchanges/index.js";

// ── Client ───────────────────────────────────────────────────────────
export {
	type Balance,
	type CallOptions,
	type CancelAllAck,
	type Capability,
	type CapabilityArgs,
	type CapabilityResult,
	type ClientOptions,
	type OpenOrder,
	type OrderAck,
	type Orderbook,
	type OrderbookLevel,
	type Position,
	type Ticker,
	type Trade,
	CAPABILITIES,
	PositionSide,
	ExchangeClient,
	PrivateExchangeClient,
	isCapability,
} from "./client/index.js";
