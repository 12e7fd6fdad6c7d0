/**
 * @strongbox/cli — Command-line front end for the Strongbox ledger.
 */

export { runCli, VERSION } from "./cli.js";
export type { RunCliOptions } from "./cli.js";
export { loadConfig, describeConfigError, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, ledgerEventFields, ledgerEventLogger } from "./logger.js";
export { Output } from "./output.js";
export type { OutputOptions, OutputWriters } from "./output.js";
export {
  registerCommands,
  SingleAccountOptionsSchema,
  TransferOptionsSchema,
} from "./commands.js";
export type { CommandContext, SingleAccountOptions, TransferOptions } from "./commands.js";
