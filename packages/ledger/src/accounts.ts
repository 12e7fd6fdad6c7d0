/**
 * @strongbox/ledger — Account.
 *
 * A named balance. Deposits and withdrawals replace the balance only
 * after the new value has been computed; a failed operation leaves the
 * account untouched.
 */

import { Cents } from "./cents.js";
import type { AccountSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

export class Account {
  private _balance: Cents;

  private constructor(
    public readonly name: string,
    balance: Cents,
  ) {
    this._balance = balance;
  }

  /**
   * Open an account. Throws EMPTY_ACCOUNT_NAME for a zero-length name.
   */
  static open(name: string, balance: Cents = Cents.ZERO): Account {
    if (name.length === 0) {
      throw new LedgerError({ code: "EMPTY_ACCOUNT_NAME" });
    }
    return new Account(name, balance);
  }

  get balance(): Cents {
    return this._balance;
  }

  /**
   * Throws BALANCE_OVERFLOW if the new balance would exceed the maximum.
   */
  deposit(amount: Cents): Cents {
    const next = this._balance.checkedAdd(amount);
    if (next === undefined) {
      throw new LedgerError({
        code: "BALANCE_OVERFLOW",
        name: this.name,
        depositAmount: amount,
      });
    }
    this._balance = next;
    return next;
  }

  /**
   * Throws ACCOUNT_OVERDRAFT if the balance would go negative.
   */
  withdraw(amount: Cents): Cents {
    const next = this._balance.checkedSub(amount);
    if (next === undefined) {
      throw new LedgerError({
        code: "ACCOUNT_OVERDRAFT",
        name: this.name,
        balance: this._balance,
        withdrawAmount: amount,
      });
    }
    this._balance = next;
    return next;
  }

  /** Independent copy; mutating it never affects this account. */
  clone(): Account {
    return new Account(this.name, this._balance);
  }

  snapshot(): AccountSnapshot {
    return { name: this.name, balance: this._balance };
  }
}
