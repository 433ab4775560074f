export * from "./operations.js";
export * as futures from "./futures.js";
export { binanceProfile } from "./profile.js";
export { binanceCapabilities } from "./capabilities.js";
