/**
 * @pocket-ledger/cli — Terminal front end and composition root.
 *
 * Re-exports the pieces an embedding front end needs: the service,
 * configuration and the command runner.
 */

export { PersonalLedgerService } from "./services/personal-ledger-service.js";
export type { PersonalLedgerServiceConfig } from "./services/personal-ledger-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { runCli, UsageError, USAGE } from "./commands.js";
export type { CliIo } from "./commands.js";
export * from "./render.js";
