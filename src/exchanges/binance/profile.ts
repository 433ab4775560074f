import { binanceError, isStatusOk } from "../../decoding/error-schemas.js";
import { ApiHost, ExchangeId } from "../../shared/exchange-id.js";
import type { ExchangeProfile } from "../profile.js";

export const binanceProfile: ExchangeProfile = {
	id: ExchangeId.Binance,
	baseUrl: "https://api.binance.com",
	hosts: { [ApiHost.BinanceFutures]: "https://fapi.binance.com" },
	signer: "query-hmac",
	encoding: { listStyle: "comma", revertBracketKeys: false, writeBody: "form" },
	response: { isSuccess: isStatusOk, envelope: "bare", errorSchema: binanceError },
};
