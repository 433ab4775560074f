export type { ApiKeySet, Credentials } from "./types.js";
export { createCredentials, credentialsFromEnv, unwrapCredentials } from "./credentials.js";
