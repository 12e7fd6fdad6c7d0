/**
 * @strongbox/store — In-memory AccountStore.
 *
 * Suitable for tests and for embedding the ledger without a file.
 */

import type { AccountRecord } from "@strongbox/ledger";
import type { AccountStore } from "./types.js";

export class InMemoryAccountStore implements AccountStore {
  private _records: AccountRecord[];

  constructor(initial: readonly AccountRecord[] = []) {
    this._records = initial.map((r) => ({ ...r }));
  }

  load(): AccountRecord[] {
    return this._records.map((r) => ({ ...r }));
  }

  save(records: readonly AccountRecord[]): void {
    this._records = records.map((r) => ({ ...r }));
  }

  /** Current contents, without copying. */
  get records(): readonly AccountRecord[] {
    return this._records;
  }
}
