import { bithumbError, isStatus2xx } from "../../decoding/error-schemas.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import type { ExchangeProfile } from "../profile.js";

// No signer: private operations go out unsigned.
export const bithumbProfile: ExchangeProfile = {
	id: ExchangeId.Bithumb,
	baseUrl: "https://api.bithumb.com",
	signer: "none",
	encoding: { listStyle: "comma", revertBracketKeys: false, writeBody: "raw" },
	response: { isSuccess: isStatus2xx, envelope: "status-data", errorSchema: bithumbError },
};
