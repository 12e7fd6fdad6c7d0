/**
 * @strongbox/cli — Subcommands.
 *
 * Each mutating command loads the ledger, applies one operation and
 * saves. A failed operation prints the error and saves nothing.
 */

import type { Command } from "commander";
import { z } from "zod";
import type { Logger } from "pino";
import { Ledger, isLedgerError } from "@strongbox/ledger";
import type { AccountStore } from "@strongbox/store";
import { StoreError } from "@strongbox/store";
import { ledgerEventLogger } from "./logger.js";
import type { Output } from "./output.js";

// =============================================================================
// Option Schemas
// =============================================================================

export const SingleAccountOptionsSchema = z.object({
  name: z.string(),
  amount: z.string(),
});

export type SingleAccountOptions = z.infer<typeof SingleAccountOptionsSchema>;

export const TransferOptionsSchema = z.object({
  from: z.string(),
  to: z.string(),
  amount: z.string(),
});

export type TransferOptions = z.infer<typeof TransferOptionsSchema>;

// =============================================================================
// Context
// =============================================================================

export interface CommandContext {
  /** Resolved after option parsing, so `--file` is honoured. */
  readonly openStore: () => AccountStore;
  readonly logger: Logger;
  readonly output: Output;
  /** Set to non-zero when a command fails. */
  exitCode: number;
}

/**
 * Load the ledger, run `operation`, and save on success.
 * Domain and store failures are reported and recorded in the exit code;
 * anything else propagates. Both are logged below the default level.
 */
function withLedger(
  ctx: CommandContext,
  operation: (ledger: Ledger) => void,
  options: { readonly save: boolean },
): void {
  try {
    const store = ctx.openStore();
    const ledger = Ledger.fromRecords(store.load(), {
      log: ledgerEventLogger(ctx.logger),
    });
    ctx.logger.debug({ accounts: ledger.count }, "Ledger loaded");

    operation(ledger);

    if (options.save) {
      store.save(ledger.toRecords());
      ctx.logger.debug({ accounts: ledger.count }, "Ledger saved");
    }
  } catch (err: unknown) {
    if (isLedgerError(err)) {
      ctx.logger.info({ code: err.code }, err.message);
      ctx.output.error(err.message);
      ctx.exitCode = 1;
      return;
    }
    if (err instanceof StoreError) {
      ctx.logger.warn({ code: err.code, filePath: err.filePath }, err.message);
      ctx.output.error(err.message);
      ctx.exitCode = 1;
      return;
    }
    throw err;
  }
}

function parseOptions<T>(
  ctx: CommandContext,
  schema: z.ZodType<T>,
  raw: unknown,
): T | undefined {
  const result = schema.safeParse(raw);
  if (!result.success) {
    ctx.output.error(result.error.issues[0]?.message ?? "Invalid options");
    ctx.exitCode = 1;
    return undefined;
  }
  return result.data;
}

// =============================================================================
// Registration
// =============================================================================

export function registerCommands(program: Command, ctx: CommandContext): void {
  program
    .command("show")
    .description("Show all accounts")
    .action(() => {
      withLedger(ctx, (ledger) => ctx.output.accounts(ledger.accounts()), { save: false });
    });

  program
    .command("create")
    .description("Create account")
    .requiredOption("-n, --name <name>", "account name")
    .requiredOption("-a, --amount <amount>", "initial balance, e.g. 20 or 20.50")
    .action((raw: unknown) => {
      const opts = parseOptions(ctx, SingleAccountOptionsSchema, raw);
      if (opts === undefined) return;
      withLedger(ctx, (ledger) => ctx.output.created(ledger.create(opts.name, opts.amount)), {
        save: true,
      });
    });

  program
    .command("deposit")
    .description("Deposit amount to account")
    .requiredOption("-n, --name <name>", "account name")
    .requiredOption("-a, --amount <amount>", "amount to deposit")
    .action((raw: unknown) => {
      const opts = parseOptions(ctx, SingleAccountOptionsSchema, raw);
      if (opts === undefined) return;
      withLedger(ctx, (ledger) => ctx.output.balance(ledger.deposit(opts.name, opts.amount)), {
        save: true,
      });
    });

  program
    .command("withdraw")
    .description("Withdraw amount from account")
    .requiredOption("-n, --name <name>", "account name")
    .requiredOption("-a, --amount <amount>", "amount to withdraw")
    .action((raw: unknown) => {
      const opts = parseOptions(ctx, SingleAccountOptionsSchema, raw);
      if (opts === undefined) return;
      withLedger(ctx, (ledger) => ctx.output.balance(ledger.withdraw(opts.name, opts.amount)), {
        save: true,
      });
    });

  program
    .command("transfer")
    .description("Transfer amount between accounts")
    .requiredOption("-f, --from <name>", "account to withdraw from")
    .requiredOption("-t, --to <name>", "account to deposit into")
    .requiredOption("-a, --amount <amount>", "amount to transfer")
    .action((raw: unknown) => {
      const opts = parseOptions(ctx, TransferOptionsSchema, raw);
      if (opts === undefined) return;
      withLedger(
        ctx,
        (ledger) => ctx.output.transferred(ledger.transfer(opts.from, opts.to, opts.amount)),
        { save: true },
      );
    });
}
