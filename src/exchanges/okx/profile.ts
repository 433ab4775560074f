import { isStatus2xx, okxError } from "../../decoding/error-schemas.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import type { ExchangeProfile } from "../profile.js";

export const okxProfile: ExchangeProfile = {
	id: ExchangeId.Okx,
	baseUrl: "https://aws.okx.com",
	signer: "header-hmac",
	encoding: { listStyle: "comma", revertBracketKeys: false, writeBody: "raw" },
	response: { isSuccess: isStatus2xx, envelope: "data", errorSchema: okxError },
};
