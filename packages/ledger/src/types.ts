/**
 * @strongbox/ledger — Shared types for the ledger engine.
 *
 * Rules:
 * - Snapshots handed to callers are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A thrown LedgerError means nothing was mutated
 */

import type { Cents } from "./cents.js";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Read-only view of an account at a point in time.
 * Never aliases the live account held by the ledger.
 */
export interface AccountSnapshot {
  readonly name: string;
  readonly balance: Cents;
}

/**
 * Persisted shape of an account. Balance is in minor units.
 */
export interface AccountRecord {
  readonly name: string;
  readonly balance: bigint;
}

/**
 * Result of a successful transfer: both post-transfer balances.
 */
export interface TransferResult {
  readonly from: AccountSnapshot;
  readonly to: AccountSnapshot;
  readonly amount: Cents;
}

// ─── Events ──────────────────────────────────────────────────────────────

/** Informational events emitted after a successful operation. */
export type LedgerEvent =
  | { readonly type: "account.created"; readonly account: AccountSnapshot }
  | {
      readonly type: "account.deposited";
      readonly account: AccountSnapshot;
      readonly amount: Cents;
    }
  | {
      readonly type: "account.withdrawn";
      readonly account: AccountSnapshot;
      readonly amount: Cents;
    }
  | { readonly type: "transfer.completed"; readonly transfer: TransferResult };

export interface LedgerOptions {
  /** Receives an event after every successful mutation. */
  readonly log?: ((event: LedgerEvent) => void) | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Context carried by each ledger error, keyed by code.
 */
export type LedgerErrorDetail =
  | { readonly code: "INVALID_AMOUNT"; readonly text: string }
  | { readonly code: "AMOUNT_OVERFLOW"; readonly text: string }
  | { readonly code: "EMPTY_ACCOUNT_NAME" }
  | { readonly code: "DUPLICATE_ACCOUNT_NAME"; readonly name: string }
  | { readonly code: "ACCOUNT_NOT_FOUND"; readonly name: string }
  | {
      readonly code: "BALANCE_OVERFLOW";
      readonly name: string;
      readonly depositAmount: Cents;
    }
  | {
      readonly code: "ACCOUNT_OVERDRAFT";
      readonly name: string;
      readonly balance: Cents;
      readonly withdrawAmount: Cents;
    };

/** Error codes for ledger operations. */
export type LedgerErrorCode = LedgerErrorDetail["code"];

function describe(detail: LedgerErrorDetail): string {
  switch (detail.code) {
    case "INVALID_AMOUNT":
      return `invalid amount ${JSON.stringify(detail.text)}, must be a non-negative number only containing digits up to two decimal places`;
    case "AMOUNT_OVERFLOW":
      return `amount ${detail.text} would overflow`;
    case "EMPTY_ACCOUNT_NAME":
      return "account name cannot be empty";
    case "DUPLICATE_ACCOUNT_NAME":
      return `account with name ${detail.name} already exists`;
    case "ACCOUNT_NOT_FOUND":
      return `account with name ${detail.name} not found`;
    case "BALANCE_OVERFLOW":
      return `account ${detail.name} would have balance overflow if ${detail.depositAmount.display()} was deposited`;
    case "ACCOUNT_OVERDRAFT":
      return `account ${detail.name} would overdraft if ${detail.withdrawAmount.display()} was withdrawn from balance ${detail.balance.display()}`;
  }
}

/**
 * Structured error from the ledger engine.
 * Recoverable: the ledger is left exactly as it was before the call.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly detail: LedgerErrorDetail;

  constructor(detail: LedgerErrorDetail) {
    super(describe(detail));
    this.name = "LedgerError";
    this.code = detail.code;
    this.detail = detail;
  }
}

export function isLedgerError(value: unknown): value is LedgerError {
  return value instanceof LedgerError;
}

/**
 * Raised when an internal invariant breaks (e.g. the committed leg of a
 * transfer fails after its trial succeeded). Not a user-facing error.
 */
export class LedgerInvariantError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerInvariantError";
  }
}
