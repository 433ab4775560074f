export * from "./operations.js";
export { okxProfile } from "./profile.js";
export { okxCapabilities } from "./capabilities.js";
