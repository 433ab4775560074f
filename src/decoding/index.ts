export type { Envelope, ExchangeErrorFields, ResponseRules } from "./types.js";
export { bodyExcerpt, decodeResponse } from "./decoder.js";
export {
	binanceError,
	bithumbError,
	cryptocomError,
	isStatus2xx,
	isStatusOk,
	okxError,
	upbitError,
} from "./error-schemas.js";
