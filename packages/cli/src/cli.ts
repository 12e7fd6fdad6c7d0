/**
 * @strongbox/cli — Program factory.
 *
 * Builds a fresh commander program per invocation and runs it against
 * injected I/O. Separated from main.ts so tests can drive the CLI
 * without touching process state.
 */

import { Command, CommanderError } from "commander";
import { ZodError } from "zod";
import type { Logger } from "pino";
import type { AccountStore } from "@strongbox/store";
import { CsvAccountStore } from "@strongbox/store";
import { describeConfigError, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { Output } from "./output.js";
import type { OutputWriters } from "./output.js";
import { registerCommands } from "./commands.js";
import type { CommandContext } from "./commands.js";

export const VERSION = "0.1.0";

// =============================================================================
// Options
// =============================================================================

export interface RunCliOptions {
  readonly writers: OutputWriters;
  /** Environment to read config from. Default: process.env */
  readonly env?: Record<string, string | undefined>;
  /** Default: pino on stderr at LOG_LEVEL */
  readonly logger?: Logger;
  /** Default: CsvAccountStore at the resolved file path */
  readonly createStore?: (filePath: string) => AccountStore;
  readonly color?: boolean;
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Run one CLI invocation.
 *
 * @param args - user arguments, without the node binary and script path
 * @returns the process exit code
 */
export function runCli(args: readonly string[], options: RunCliOptions): number {
  const output = new Output(options.writers, { color: options.color });

  let config: AppConfig;
  try {
    config = loadConfig(options.env);
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      output.error(`Invalid configuration: ${describeConfigError(err)}`);
      return 1;
    }
    throw err;
  }

  const logger = options.logger ?? createLogger(config);
  const createStore =
    options.createStore ?? ((filePath: string) => new CsvAccountStore({ filePath }));

  const program = new Command();
  program
    .name("strongbox")
    .description("Named accounts with exact balances")
    .version(VERSION)
    .option("--file <path>", "account file", config.STRONGBOX_DATA_FILE)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.raw("out", text),
      writeErr: (text) => output.raw("err", text),
    });

  const ctx: CommandContext = {
    openStore: () => {
      const { file } = program.opts<{ file: string }>();
      logger.debug({ file }, "Opening account file");
      return createStore(file);
    },
    logger,
    output,
    exitCode: 0,
  };

  registerCommands(program, ctx);

  try {
    program.parse([...args], { from: "user" });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  return ctx.exitCode;
}
