/**
 * @strongbox/store — Load and save the account list.
 *
 * Implementations:
 * - CsvAccountStore: `name,balance` CSV file
 * - InMemoryAccountStore: tests and embedding
 */

export { CsvAccountStore, AccountRowSchema, CSV_COLUMNS } from "./csv-store.js";
export type { CsvAccountStoreOptions, AccountRow } from "./csv-store.js";

export { InMemoryAccountStore } from "./in-memory-store.js";

export type { AccountStore, StoreErrorCode } from "./types.js";
export { StoreError } from "./types.js";
