export * from "./operations.js";
export { cryptocomProfile } from "./profile.js";
export { cryptocomCapabilities } from "./capabilities.js";
