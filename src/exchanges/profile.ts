/**
 * ExchangeProfile: everything the pipeline needs to know about one
 * exchange: where it lives, how it signs, how it encodes and how it answers.
 */

import type { ResponseRules } from "../decoding/types.js";
import type { SignerKind } from "../signing/types.js";
import { API_HOSTS } from "../shared/exchange-id.js";
import type { ApiHost, ExchangeId, HostId } from "../shared/exchange-id.js";
import type { EncodingRules } from "../transport/types.js";

export interface ExchangeProfile {
	readonly id: ExchangeId;
	/** Default base URL, no trailing slash */
	readonly baseUrl: string;
	/** Default base URLs of the exchange's secondary hosts */
	readonly hosts?: Readonly<Partial<Record<ApiHost, string>>> | undefined;
	readonly signer: SignerKind;
	readonly encoding: EncodingRules;
	readonly response: ResponseRules;
}

/** Where one client sends its requests, overrides applied. */
export interface BaseUrls {
	readonly main: string;
	readonly hosts: Readonly<Partial<Record<ApiHost, string>>>;
}

/**
 * Base URLs for `profile`, each taken from `overrides` when present there.
 * Only hosts the profile declares are kept.
 */
export function resolveBaseUrls(
	profile: ExchangeProfile,
	overrides: Readonly<Partial<Record<HostId, string>>> = {},
): BaseUrls {
	const hosts: Partial<Record<ApiHost, string>> = {};
	for (const host of API_HOSTS) {
		const fallback = profile.hosts?.[host];
		if (fallback !== undefined) hosts[host] = overrides[host] ?? fallback;
	}
	return { main: overrides[profile.id] ?? profile.baseUrl, hosts };
}
