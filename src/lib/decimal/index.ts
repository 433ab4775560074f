/**
 * Decimal: exact decimal values for prices, sizes and balances, backed by
 * decimal.js-light. Exchanges send these as strings; parsing them into
 * binary floats would lose digits.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error if value is not finite (for numbers) or not a decimal literal (for strings)
	 * @example Decimal.from("0.00012000")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(trimmed));
	}

	/** Like from(), but returns undefined instead of throwing. */
	static tryFrom(value: string | number): Decimal | undefined {
		try {
			return Decimal.from(value);
		} catch {
			return undefined;
		}
	}

	static zero(): Decimal {
		return new Decimal(new DecimalLight(0));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: Decimal): number {
		return this.raw.comparedTo(other.raw);
	}

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example Decimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toJSON(): string {
		return this.toString();
	}
}
