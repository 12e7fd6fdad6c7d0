/**
 * @strongbox/ledger — Exact fixed-point currency values.
 *
 * A Cents value is a non-negative count of minor units (hundredths),
 * bounded by the unsigned 64-bit range. All arithmetic is bigint.
 *
 * Rules:
 * - No floating-point operations, including when formatting
 * - Out-of-range results are rejected, never wrapped or clamped
 * - Values are immutable; arithmetic returns new instances
 */

import { LedgerError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

const MAX_MINOR_UNITS = 0xffff_ffff_ffff_ffffn;
const MINOR_PER_UNIT = 100n;

/**
 * Accepted amount text: "12", "12.3", "12.34", ".3", ".34".
 * ASCII digits only; the integer part may be omitted only when a
 * decimal part follows.
 */
const AMOUNT_PATTERN = /^(?:(\d+)|(\d*)\.(\d{1,2}))$/;

// ─── Cents ───────────────────────────────────────────────────────────────

export class Cents {
  static readonly ZERO = new Cents(0n);
  static readonly MAX = new Cents(MAX_MINOR_UNITS);

  private constructor(private readonly _minor: bigint) {}

  /**
   * Parse decimal text into minor units.
   *
   * ".1" → 10, ".02" → 2, "40.2" → 4020, "7" → 700
   *
   * Throws INVALID_AMOUNT when the text is not a non-negative number
   * with at most two decimal places, AMOUNT_OVERFLOW when it is but
   * exceeds the representable maximum.
   */
  static parse(text: string): Cents {
    const match = AMOUNT_PATTERN.exec(text);
    if (match === null) {
      throw new LedgerError({ code: "INVALID_AMOUNT", text });
    }

    const [, wholeOnly, intPart, decPart] = match;
    const integerText = wholeOnly ?? intPart ?? "";
    const integer = integerText === "" ? 0n : BigInt(integerText);

    // One decimal digit is tenths: ".1" is ten hundredths
    const decimal = decPart === undefined ? 0n : BigInt(decPart.padEnd(2, "0"));

    const scaled = integer * MINOR_PER_UNIT;
    if (scaled > MAX_MINOR_UNITS) {
      throw new LedgerError({ code: "AMOUNT_OVERFLOW", text });
    }
    const total = scaled + decimal;
    if (total > MAX_MINOR_UNITS) {
      throw new LedgerError({ code: "AMOUNT_OVERFLOW", text });
    }

    return new Cents(total);
  }

  /**
   * Build a value from a raw minor-unit count (e.g. a persisted balance).
   */
  static fromMinorUnits(minor: bigint): Cents {
    if (minor < 0n) {
      throw new LedgerError({ code: "INVALID_AMOUNT", text: minor.toString() });
    }
    if (minor > MAX_MINOR_UNITS) {
      throw new LedgerError({ code: "AMOUNT_OVERFLOW", text: minor.toString() });
    }
    return new Cents(minor);
  }

  get minorUnits(): bigint {
    return this._minor;
  }

  /**
   * Sum of both values, or undefined if it exceeds the maximum.
   */
  checkedAdd(other: Cents): Cents | undefined {
    const sum = this._minor + other._minor;
    return sum > MAX_MINOR_UNITS ? undefined : new Cents(sum);
  }

  /**
   * Difference of both values, or undefined if it would be negative.
   */
  checkedSub(other: Cents): Cents | undefined {
    const diff = this._minor - other._minor;
    return diff < 0n ? undefined : new Cents(diff);
  }

  equals(other: Cents): boolean {
    return this._minor === other._minor;
  }

  compare(other: Cents): -1 | 0 | 1 {
    if (this._minor < other._minor) return -1;
    if (this._minor > other._minor) return 1;
    return 0;
  }

  isZero(): boolean {
    return this._minor === 0n;
  }

  /**
   * "<units>.<two digits>", e.g. 4023n → "40.23", 9n → "0.09".
   */
  format(): string {
    const units = this._minor / MINOR_PER_UNIT;
    const hundredths = (this._minor % MINOR_PER_UNIT).toString().padStart(2, "0");
    return `${units.toString()}.${hundredths}`;
  }

  /** Formatted with the base currency symbol: "$40.23". */
  display(): string {
    return `$${this.format()}`;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}
