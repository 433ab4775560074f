import { isStatus2xx, upbitError } from "../../decoding/error-schemas.js";
import { ExchangeId } from "../../shared/exchange-id.js";
import type { ExchangeProfile } from "../profile.js";

export const upbitProfile: ExchangeProfile = {
	id: ExchangeId.Upbit,
	baseUrl: "https://api.upbit.com",
	signer: "bearer-jwt",
	encoding: { listStyle: "brackets", revertBracketKeys: true, writeBody: "json" },
	response: { isSuccess: isStatus2xx, envelope: "bare", errorSchema: upbitError },
};
