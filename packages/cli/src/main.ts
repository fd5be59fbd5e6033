#!/usr/bin/env tsx
/**
 * @pocket-ledger/cli — Entry point.
 *
 * Loads config, builds the logger and the file-backed service, then runs
 * one command from the process arguments.
 */

import chalk from "chalk";
import { JsonFileDocumentStore } from "@pocket-ledger/store";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runCli } from "./commands.js";
import { PersonalLedgerService } from "./services/personal-ledger-service.js";

function main(): number {
  const config = loadConfig();
  const logger = createLogger(config);

  const service = new PersonalLedgerService({
    store: new JsonFileDocumentStore({ filePath: config.LEDGER_FILE }),
    decimals: config.LEDGER_DECIMALS,
    logger,
  });

  logger.debug({ file: config.LEDGER_FILE }, "Ledger opened");

  return runCli(
    process.argv.slice(2),
    service,
    {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
    chalk,
  );
}

try {
  process.exitCode = main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
