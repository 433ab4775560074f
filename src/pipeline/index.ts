export type {
	ExchangeCall,
	Handler,
	Layer,
	OperationDescriptor,
	PreparedCall,
	SignedCall,
	Stage,
} from "./types.js";
export { Pipeline } from "./pipeline.js";
export { exchangeLayer } from "./exchange-layer.js";
export { authLayer } from "./auth-layer.js";
export { transportLayer } from "./transport-layer.js";
