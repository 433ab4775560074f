export type {
	EncodingRules,
	HttpTransport,
	TransportOptions,
	WireRequest,
	WireResponse,
	WriteBody,
} from "./types.js";
export { encodeWireRequest } from "./encoder.js";
export { type FetchFn, type FetchTransportConfig, FetchTransport } from "./fetch-transport.js";
export { FakeTransport } from "./fake-transport.js";
