/**
 * ExchangeId: the closed set of venues the pipeline can talk to.
 */

/** Supported exchanges. */
export const ExchangeId = {
	Binance: "binance",
	Okx: "okx",
	Upbit: "upbit",
	Bithumb: "bithumb",
	Cryptocom: "cryptocom",
} as const;

export type ExchangeId = (typeof ExchangeId)[keyof typeof ExchangeId];

/** All exchange ids in declaration order. */
export const EXCHANGE_IDS: readonly ExchangeId[] = Object.values(ExchangeId);

/** Narrow an arbitrary string to an ExchangeId. */
export function isExchangeId(value: string): value is ExchangeId {
	return (EXCHANGE_IDS as readonly string[]).includes(value);
}

/**
 * Secondary API hosts, named `<exchange>.<host>`. Operations on the
 * exchange's main host name none.
 */
export const ApiHost = {
	/** binance USD-M futures (`fapi`) */
	BinanceFutures: "binance.futures",
} as const;

export type ApiHost = (typeof ApiHost)[keyof typeof ApiHost];

export const API_HOSTS: readonly ApiHost[] = Object.values(ApiHost);

/** Anything with its own base URL: an exchange's main host or a secondary one. */
export type HostId = ExchangeId | ApiHost;

/** Upper-case prefix used for environment variables, e.g. `BINANCE_FUTURES`. */
export function envPrefix(id: HostId): string {
	return id.toUpperCase().replace(/\./g, "_");
}
