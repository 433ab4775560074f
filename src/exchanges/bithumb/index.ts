export * from "./operations.js";
export { bithumbProfile } from "./profile.js";
export { bithumbCapabilities } from "./capabilities.js";
