/**
 * @strongbox/store — Store interface and errors.
 *
 * A store loads the whole account list at startup and saves the whole
 * list at shutdown. Order is preserved in both directions.
 */

import type { AccountRecord } from "@strongbox/ledger";

export interface AccountStore {
  /** Read every record, in stored order. A missing store reads as empty. */
  load(): AccountRecord[];

  /** Replace the stored records with `records`, in order. */
  save(records: readonly AccountRecord[]): void;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "READ_FAILED"
  | "MALFORMED_RECORD"
  | "WRITE_FAILED";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly filePath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
