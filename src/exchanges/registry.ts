import type { CapabilityTable } from "../client/capability.js";
import type { ExchangeId } from "../shared/exchange-id.js";
import { binanceCapabilities } from "./binance/capabilities.js";
import { binanceProfile } from "./binance/profile.js";
import { bithumbCapabilities } from "./bithumb/capabilities.js";
import { bithumbProfile } from "./bithumb/profile.js";
import { cryptocomCapabilities } from "./cryptocom/capabilities.js";
import { cryptocomProfile } from "./cryptocom/profile.js";
import { okxCapabilities } from "./okx/capabilities.js";
import { okxProfile } from "./okx/profile.js";
import type { ExchangeProfile } from "./profile.js";
import { upbitCapabilities } from "./upbit/capabilities.js";
import { upbitProfile } from "./upbit/profile.js";

export interface ExchangeEntry {
	readonly profile: ExchangeProfile;
	readonly capabilities: CapabilityTable;
}

const EXCHANGES: Readonly<Record<ExchangeId, ExchangeEntry>> = {
	binance: { profile: binanceProfile, capabilities: binanceCapabilities },
	okx: { profile: okxProfile, capabilities: okxCapabilities },
	upbit: { profile: upbitProfile, capabilities: upbitCapabilities },
	bithumb: { profile: bithumbProfile, capabilities: bithumbCapabilities },
	cryptocom: { profile: cryptocomProfile, capabilities: cryptocomCapabilities },
};

export function exchangeEntry(exchange: ExchangeId): ExchangeEntry {
	return EXCHANGES[exchange];
}

export function profileFor(exchange: ExchangeId): ExchangeProfile {
	return EXCHANGES[exchange].profile;
}
