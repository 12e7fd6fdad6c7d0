/**
 * @strongbox/cli — Structured logging.
 *
 * JSON lines on stderr via pino, so stdout carries only command output.
 * Ledger events are logged at info level with their balances as text.
 */

import { destination, pino } from "pino";
import type { Logger } from "pino";
import type { LedgerEvent } from "@strongbox/ledger";
import type { AppConfig } from "./config.js";

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL">): Logger {
  return pino(
    { name: "strongbox", level: config.LOG_LEVEL },
    destination({ dest: 2, sync: true }),
  );
}

/**
 * Flatten a ledger event into log fields.
 */
export function ledgerEventFields(event: LedgerEvent): Record<string, string> {
  switch (event.type) {
    case "account.created":
      return {
        event: event.type,
        account: event.account.name,
        balance: event.account.balance.format(),
      };
    case "account.deposited":
    case "account.withdrawn":
      return {
        event: event.type,
        account: event.account.name,
        amount: event.amount.format(),
        balance: event.account.balance.format(),
      };
    case "transfer.completed":
      return {
        event: event.type,
        from: event.transfer.from.name,
        to: event.transfer.to.name,
        amount: event.transfer.amount.format(),
        fromBalance: event.transfer.from.balance.format(),
        toBalance: event.transfer.to.balance.format(),
      };
  }
}

export function ledgerEventLogger(logger: Logger): (event: LedgerEvent) => void {
  return (event) => {
    logger.info(ledgerEventFields(event), event.type);
  };
}
