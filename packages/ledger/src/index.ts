/**
 * @strongbox/ledger — Named accounts with exact, overflow-checked balances.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Guarantees:
 * - No balance ever goes below zero or above 2^64 - 1 minor units
 * - Amounts are parsed from text and held as bigint (no floating point)
 * - Every failed operation leaves the ledger unchanged
 * - Transfers apply both legs or neither
 */

// Core engine
export { Ledger } from "./ledger.js";

// Accounts
export { Account } from "./accounts.js";

// Currency value
export { Cents } from "./cents.js";

// Types
export type {
  AccountRecord,
  AccountSnapshot,
  TransferResult,
  LedgerEvent,
  LedgerOptions,
  LedgerErrorCode,
  LedgerErrorDetail,
} from "./types.js";

export { LedgerError, LedgerInvariantError, isLedgerError } from "./types.js";
