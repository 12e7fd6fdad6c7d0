/**
 * Property-Based Tests for @strongbox/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Format → parse is the identity on every representable value
 * 2. Parse rejects text outside the amount grammar
 * 3. Transfers conserve the combined balance
 * 4. A failed transfer changes neither account
 * 5. Balances never leave [0, 2^64 - 1] under random operation sequences
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Ledger } from "../src/ledger.js";
import { Cents } from "../src/cents.js";
import { LedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const MAX = Cents.MAX.minorUnits;

/** Any representable minor-unit count. */
const arbMinor = fc.bigInt({ min: 0n, max: MAX });

/** Small balances, where overdrafts are common. */
const arbSmallMinor = fc.bigInt({ min: 0n, max: 100_000n });

/** Minor units rendered as two-decimal amount text. */
const arbAmountText = arbSmallMinor.map((m) => Cents.fromMinorUnits(m).format());

// =============================================================================
// Property: Round-trip
// =============================================================================

describe("property: format then parse is the identity", () => {
  it("for every representable value", () => {
    fc.assert(
      fc.property(arbMinor, (m) => {
        const value = Cents.fromMinorUnits(m);
        expect(Cents.parse(value.format()).minorUnits).toBe(m);
      }),
      { numRuns: 500 },
    );
  });

  it("a one-digit decimal equals the same digit followed by zero", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 1_000_000n }), fc.integer({ min: 0, max: 9 }), (int, d) => {
        const one = Cents.parse(`${int.toString()}.${String(d)}`);
        const two = Cents.parse(`${int.toString()}.${String(d)}0`);
        expect(one.equals(two)).toBe(true);
      }),
    );
  });
});

// =============================================================================
// Property: Grammar rejection
// =============================================================================

describe("property: malformed text is rejected", () => {
  function rejects(text: string): boolean {
    try {
      Cents.parse(text);
      return false;
    } catch (err) {
      return err instanceof LedgerError && err.code === "INVALID_AMOUNT";
    }
  }

  it("any amount with a leading minus sign", () => {
    fc.assert(fc.property(arbAmountText, (t) => rejects(`-${t}`)));
  });

  it("any amount with three or more decimal digits", () => {
    fc.assert(
      fc.property(arbSmallMinor, fc.stringMatching(/^\d{3,6}$/), (int, dec) =>
        rejects(`${int.toString()}.${dec}`),
      ),
    );
  });

  it("any amount with a second separator", () => {
    fc.assert(
      fc.property(arbAmountText, fc.stringMatching(/^\d{0,2}$/), (t, tail) =>
        rejects(`${t}.${tail}`),
      ),
    );
  });

  it("any amount with a non-digit character appended", () => {
    fc.assert(
      fc.property(arbAmountText, fc.constantFrom("a", " ", "_", ",", "e", "$"), (t, c) =>
        rejects(`${t}${c}`),
      ),
    );
  });
});

// =============================================================================
// Property: Transfers
// =============================================================================

describe("property: transfer atomicity", () => {
  it("conserves the combined balance when both legs succeed", () => {
    fc.assert(
      fc.property(arbSmallMinor, arbSmallMinor, arbSmallMinor, (fromBal, toBal, amt) => {
        fc.pre(amt <= fromBal);
        const ledger = Ledger.fromRecords([
          { name: "from", balance: fromBal },
          { name: "to", balance: toBal },
        ]);

        const result = ledger.transfer("from", "to", Cents.fromMinorUnits(amt).format());

        expect(result.from.balance.minorUnits).toBe(fromBal - amt);
        expect(result.to.balance.minorUnits).toBe(toBal + amt);
        expect(result.from.balance.minorUnits + result.to.balance.minorUnits).toBe(
          fromBal + toBal,
        );
      }),
      { numRuns: 300 },
    );
  });

  it("changes neither account when the withdrawal would overdraft", () => {
    fc.assert(
      fc.property(arbSmallMinor, arbMinor, arbSmallMinor, (fromBal, toBal, amt) => {
        fc.pre(amt > fromBal);
        const ledger = Ledger.fromRecords([
          { name: "from", balance: fromBal },
          { name: "to", balance: toBal },
        ]);

        expect(() =>
          ledger.transfer("from", "to", Cents.fromMinorUnits(amt).format()),
        ).toThrow(LedgerError);

        expect(ledger.toRecords()).toEqual([
          { name: "from", balance: fromBal },
          { name: "to", balance: toBal },
        ]);
      }),
      { numRuns: 300 },
    );
  });

  it("changes neither account when the deposit would overflow", () => {
    fc.assert(
      fc.property(
        arbSmallMinor,
        fc.bigInt({ min: 1n, max: 100_000n }),
        (headroom, amt) => {
          fc.pre(amt > headroom);
          const toBal = MAX - headroom;
          const ledger = Ledger.fromRecords([
            { name: "from", balance: amt },
            { name: "to", balance: toBal },
          ]);

          expect(() =>
            ledger.transfer("from", "to", Cents.fromMinorUnits(amt).format()),
          ).toThrow(/balance overflow/);

          expect(ledger.toRecords()).toEqual([
            { name: "from", balance: amt },
            { name: "to", balance: toBal },
          ]);
        },
      ),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Bounds under random operations
// =============================================================================

type Op =
  | { readonly kind: "deposit"; readonly who: number; readonly amount: string }
  | { readonly kind: "withdraw"; readonly who: number; readonly amount: string }
  | { readonly kind: "transfer"; readonly who: number; readonly to: number; readonly amount: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), who: fc.nat(2), amount: arbAmountText }),
  fc.record({ kind: fc.constant("withdraw" as const), who: fc.nat(2), amount: arbAmountText }),
  fc.record({
    kind: fc.constant("transfer" as const),
    who: fc.nat(2),
    to: fc.nat(2),
    amount: arbAmountText,
  }),
);

describe("property: balances stay in range", () => {
  it("after any sequence of operations, every balance is within bounds and failures are typed", () => {
    const names = ["a", "b", "c"];

    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const ledger = Ledger.fromRecords(names.map((name) => ({ name, balance: 5_000n })));

        for (const op of ops) {
          const before = ledger.toRecords();
          const who = names[op.who] ?? "a";
          try {
            if (op.kind === "deposit") ledger.deposit(who, op.amount);
            else if (op.kind === "withdraw") ledger.withdraw(who, op.amount);
            else ledger.transfer(who, names[op.to] ?? "a", op.amount);
          } catch (err) {
            expect(err).toBeInstanceOf(LedgerError);
            expect(ledger.toRecords()).toEqual(before);
          }
        }

        for (const record of ledger.toRecords()) {
          expect(record.balance >= 0n).toBe(true);
          expect(record.balance <= MAX).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });
});
