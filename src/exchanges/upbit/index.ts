export * from "./operations.js";
export { upbitProfile } from "./profile.js";
export { upbitCapabilities } from "./capabilities.js";
