/**
 * @strongbox/cli — Terminal output.
 *
 * Command results go to `out`, failures to `err`. Lines are written
 * without a trailing newline; the writer adds it.
 */

import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { AccountSnapshot, TransferResult } from "@strongbox/ledger";

export interface OutputWriters {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

export interface OutputOptions {
  /** Force color on or off. Default: chalk's own terminal detection. */
  readonly color?: boolean | undefined;
}

export class Output {
  private readonly _writers: OutputWriters;
  private readonly _chalk: ChalkInstance;

  constructor(writers: OutputWriters, options?: OutputOptions) {
    this._writers = writers;
    if (options?.color === undefined) {
      this._chalk = chalk;
    } else {
      this._chalk = new Chalk({ level: options.color ? 1 : 0 });
    }
  }

  created(account: AccountSnapshot): void {
    this._writers.out(
      this._chalk.green(
        `Account created with name ${account.name} and balance ${account.balance.display()}`,
      ),
    );
  }

  balance(account: AccountSnapshot): void {
    this._writers.out(
      this._chalk.green(`Account balance is now ${account.balance.display()}`),
    );
  }

  transferred(result: TransferResult): void {
    this._writers.out(
      this._chalk.green(
        `${result.from.name} balance is now ${result.from.balance.display()}, ` +
          `${result.to.name} balance is now ${result.to.balance.display()}`,
      ),
    );
  }

  accounts(accounts: readonly AccountSnapshot[]): void {
    if (accounts.length === 0) {
      this._writers.out(this._chalk.gray("No accounts"));
      return;
    }
    for (const account of accounts) {
      this._writers.out(
        `name: ${this._chalk.white.bold(account.name)}\tbalance: ${this._chalk.yellow(account.balance.display())}`,
      );
    }
  }

  error(message: string): void {
    this._writers.err(this._chalk.red(`Error: ${message}`));
  }

  /** Raw passthrough for commander's own help and version text. */
  raw(stream: "out" | "err", text: string): void {
    this._writers[stream](text.replace(/\n$/, ""));
  }
}
