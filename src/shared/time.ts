/**
 * Time and nonce sources: injectable so signing is deterministic in tests.
 *
 * Signers call Clock.now() and NonceSource.next() exactly once per request,
 * at the moment of signing, instead of touching Date.now() or crypto directly.
 */

import { randomUUID } from "node:crypto";

/** Injectable time source -- all SDK code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance expects non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Nonce ────────────────────────────────────────────────────────────

/** Source of single-use request nonces. */
export interface NonceSource {
	next(): string;
}

/** Random UUID v4 nonces. */
export const UuidNonceSource: NonceSource = {
	next: () => randomUUID(),
};

/** Replays a fixed list of nonces in order, then repeats the last one. */
export class FixedNonceSource implements NonceSource {
	private readonly values: readonly string[];
	private index = 0;

	constructor(...values: readonly string[]) {
		if (values.length === 0) {
			throw new Error("FixedNonceSource needs at least one value");
		}
		this.values = values;
	}

	next(): string {
		const value = this.values[Math.min(this.index, this.values.length - 1)] ?? "";
		this.index++;
		return value;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
} as const;
