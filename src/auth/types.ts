/**
 * Auth bounded context: type definitions.
 *
 * Credentials are opaque branded types that prevent accidental logging
 * of secrets. ApiKeySet holds the raw material before sealing.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Domain types ─────────────────────────────────────────────────────

/** Raw key material for one exchange account, before sealing. */
export interface ApiKeySet {
	readonly apiKey: string;
	/** HMAC or JWT signing secret */
	readonly secret: string;
	/** Only okx requires one */
	readonly passphrase?: string | undefined;
}

/**
 * Opaque credential container. `toString`, `toJSON` and Node's inspect hook
 * all render "[REDACTED]".
 *
 * Use createCredentials() to seal an ApiKeySet, and unwrapCredentials() to read it back.
 */
export type Credentials = Brand<{ readonly __opaque: true }, "Credentials">;
