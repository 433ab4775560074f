import { cryptocomError, isStatus2xx } from "../../decoding/error-schemas.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import type { ExchangeProfile } from "../profile.js";

export const cryptocomProfile: ExchangeProfile = {
	id: ExchangeId.Cryptocom,
	baseUrl: "https://api.crypto.com",
	signer: "none",
	encoding: { listStyle: "comma", revertBracketKeys: false, writeBody: "raw" },
	response: { isSuccess: isStatus2xx, envelope: "data", errorSchema: cryptocomError },
};
