/**
 * @strongbox/store — CSV file AccountStore.
 *
 * File format (header first, one row per account, stored order):
 *
 *   name,balance
 *   alice,4000
 *   bob,125
 *
 * `balance` is the count of minor units as an unsigned integer.
 *
 * Properties:
 * - A missing file loads as an empty account list
 * - Every row is validated on load; the first bad row aborts the load
 * - Save rewrites the whole file (no crash-consistency guarantee)
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type { AccountRecord } from "@strongbox/ledger";
import type { AccountStore } from "./types.js";
import { StoreError } from "./types.js";

// =============================================================================
// Row Schema
// =============================================================================

export const CSV_COLUMNS = ["name", "balance"] as const;

export const AccountRowSchema = z.object({
  name: z.string().min(1, "name must not be empty"),
  balance: z
    .string()
    .regex(/^\d+$/, "balance must be a whole number of minor units"),
});

export type AccountRow = z.infer<typeof AccountRowSchema>;

// =============================================================================
// Store
// =============================================================================

export interface CsvAccountStoreOptions {
  /** Path to the CSV file */
  readonly filePath: string;
}

export class CsvAccountStore implements AccountStore {
  private readonly _filePath: string;

  constructor(options: CsvAccountStoreOptions) {
    this._filePath = options.filePath;
  }

  get filePath(): string {
    return this._filePath;
  }

  load(): AccountRecord[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    let content: string;
    try {
      content = readFileSync(this._filePath, "utf-8");
    } catch (err: unknown) {
      throw new StoreError(
        "READ_FAILED",
        `Cannot read account file "${this._filePath}"`,
        this._filePath,
        { cause: err },
      );
    }

    return this._parse(content);
  }

  save(records: readonly AccountRecord[]): void {
    const rows: AccountRow[] = records.map((r) => ({
      name: r.name,
      balance: r.balance.toString(),
    }));
    const content = stringify(rows, {
      header: true,
      columns: [...CSV_COLUMNS],
    });

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      writeFileSync(this._filePath, content, "utf-8");
    } catch (err: unknown) {
      throw new StoreError(
        "WRITE_FAILED",
        `Cannot write account file "${this._filePath}"`,
        this._filePath,
        { cause: err },
      );
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _parse(content: string): AccountRecord[] {
    let rows: unknown;
    try {
      rows = parse(content, {
        bom: true,
        columns: true,
        skip_empty_lines: true,
      });
    } catch (err: unknown) {
      throw new StoreError(
        "MALFORMED_RECORD",
        `Account file "${this._filePath}" is not valid CSV`,
        this._filePath,
        { cause: err },
      );
    }

    if (!Array.isArray(rows)) {
      throw new StoreError(
        "MALFORMED_RECORD",
        `Account file "${this._filePath}" is not valid CSV`,
        this._filePath,
      );
    }

    return rows.map((row: unknown, index) => {
      const result = AccountRowSchema.safeParse(row);
      if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue?.path.join(".") ?? "row";
        throw new StoreError(
          "MALFORMED_RECORD",
          `Account file "${this._filePath}" row ${index + 1}: ${field}: ${issue?.message ?? "invalid"}`,
          this._filePath,
        );
      }
      return { name: result.data.name, balance: BigInt(result.data.balance) };
    });
  }
}
