/**
 * @strongbox/ledger — Core Ledger class.
 *
 * Owns an ordered list of uniquely named accounts and applies
 * create / deposit / withdraw / transfer against them.
 *
 * API surface:
 * - create() — Open a new account with an initial balance
 * - deposit() — Add to an account
 * - withdraw() — Remove from an account (never below zero)
 * - transfer() — Move an amount between two accounts, all-or-nothing
 * - accounts() / getAccount() / hasAccount() — Read-only views
 * - toRecords() / fromRecords() — Persisted shape
 *
 * Validation order is fixed: names are checked before the amount text
 * is parsed, so a missing or duplicate account is reported first.
 */

import { Account } from "./accounts.js";
import { Cents } from "./cents.js";
import type {
  AccountRecord,
  AccountSnapshot,
  LedgerEvent,
  LedgerOptions,
  TransferResult,
} from "./types.js";
import { LedgerError, LedgerInvariantError } from "./types.js";

export class Ledger {
  private readonly _accounts: Account[] = [];
  private readonly _log: ((event: LedgerEvent) => void) | undefined;

  constructor(options?: LedgerOptions) {
    this._log = options?.log;
  }

  /**
   * Rebuild a ledger from persisted records, preserving their order.
   * Fails fast on empty or duplicate names and out-of-range balances.
   */
  static fromRecords(
    records: readonly AccountRecord[],
    options?: LedgerOptions,
  ): Ledger {
    const ledger = new Ledger(options);
    for (const record of records) {
      if (ledger.hasAccount(record.name)) {
        throw new LedgerError({ code: "DUPLICATE_ACCOUNT_NAME", name: record.name });
      }
      ledger._accounts.push(
        Account.open(record.name, Cents.fromMinorUnits(record.balance)),
      );
    }
    return ledger;
  }

  // ─── Commands ────────────────────────────────────────────────────────

  create(name: string, amountText: string): AccountSnapshot {
    if (name.length === 0) {
      throw new LedgerError({ code: "EMPTY_ACCOUNT_NAME" });
    }
    if (this.hasAccount(name)) {
      throw new LedgerError({ code: "DUPLICATE_ACCOUNT_NAME", name });
    }

    const account = Account.open(name, Cents.parse(amountText));
    this._accounts.push(account);

    const snapshot = account.snapshot();
    this._emit({ type: "account.created", account: snapshot });
    return snapshot;
  }

  deposit(name: string, amountText: string): AccountSnapshot {
    const account = this._require(name);
    const amount = Cents.parse(amountText);

    account.deposit(amount);

    const snapshot = account.snapshot();
    this._emit({ type: "account.deposited", account: snapshot, amount });
    return snapshot;
  }

  withdraw(name: string, amountText: string): AccountSnapshot {
    const account = this._require(name);
    const amount = Cents.parse(amountText);

    account.withdraw(amount);

    const snapshot = account.snapshot();
    this._emit({ type: "account.withdrawn", account: snapshot, amount });
    return snapshot;
  }

  /**
   * Move `amountText` from one account to another.
   *
   * The withdrawal is first tried against a copy of the source. Only
   * the deposit touches real state before both legs are known to
   * succeed, and a failed deposit changes nothing. The real withdrawal
   * is committed last.
   */
  transfer(fromName: string, toName: string, amountText: string): TransferResult {
    const from = this._require(fromName);
    const to = this._require(toName);
    const amount = Cents.parse(amountText);

    // Trial leg: overdraft surfaces here with the real balance
    from.clone().withdraw(amount);

    to.deposit(amount);

    try {
      from.withdraw(amount);
    } catch (err: unknown) {
      throw new LedgerInvariantError(
        `transfer withdrawal from ${fromName} failed after its trial succeeded`,
        { cause: err },
      );
    }

    const result: TransferResult = {
      from: from.snapshot(),
      to: to.snapshot(),
      amount,
    };
    this._emit({ type: "transfer.completed", transfer: result });
    return result;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  accounts(): readonly AccountSnapshot[] {
    return this._accounts.map((a) => a.snapshot());
  }

  getAccount(name: string): AccountSnapshot | undefined {
    return this._find(name)?.snapshot();
  }

  hasAccount(name: string): boolean {
    return this._find(name) !== undefined;
  }

  get count(): number {
    return this._accounts.length;
  }

  toRecords(): AccountRecord[] {
    return this._accounts.map((a) => ({
      name: a.name,
      balance: a.balance.minorUnits,
    }));
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _find(name: string): Account | undefined {
    return this._accounts.find((a) => a.name === name);
  }

  private _require(name: string): Account {
    const account = this._find(name);
    if (account === undefined) {
      throw new LedgerError({ code: "ACCOUNT_NOT_FOUND", name });
    }
    return account;
  }

  private _emit(event: LedgerEvent): void {
    this._log?.(event);
  }
}
