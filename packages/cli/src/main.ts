#!/usr/bin/env node
/**
 * @strongbox/cli — Entry point.
 *
 * Wires runCli to the process streams and exit code.
 */

import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv.slice(2), {
    writers: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
  });
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
