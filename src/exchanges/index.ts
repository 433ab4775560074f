export { type BaseUrls, type ExchangeProfile, resolveBaseUrls } from "./profile.js";
export { type ExchangeEntry, exchangeEntry, profileFor } from "./registry.js";
export * as binance from "./binance/index.js";
export * as okx from "./okx/index.js";
export * as upbit from "./upbit/index.js";
export * as bithumb from "./bithumb/index.js";
export * as cryptocom from "./cryptocom/index.js";
