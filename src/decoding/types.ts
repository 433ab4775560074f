import type { Schema } from "../lib/validation/index.js";

/** Code and message an exchange put in its error body. */
export interface ExchangeErrorFields {
	readonly code: string | undefined;
	readonly message: string | undefined;
}

/**
 * Where the payload sits in a success body.
 * - `bare`: the body is the payload
 * - `data`: `{ "data": payload }`
 * - `status-data`: `{ "status": "0000", "data": payload }`
 */
export type Envelope = "bare" | "data" | "status-data";

export interface ResponseRules {
	readonly isSuccess: (status: number) => boolean;
	readonly envelope: Envelope;
	/** Parses a failure body into code/message; no match means an unrecognised body */
	readonly errorSchema: Schema<ExchangeErrorFields>;
}
