/**
 * Command dispatch for the `pocket-ledger` front end.
 *
 * Commands:
 *   add <amount> <category> [note...]
 *   balance
 *   report [--sort field] [--desc] [--from DD.MM.YYYY] [--to DD.MM.YYYY] [--category name]
 *   limit <category> <amount>
 *   limits
 *   categories
 *
 * Exit codes: 0 success, 1 operation failed, 2 usage error.
 */

import { parseArgs } from "node:util";
import type { ChalkInstance } from "chalk";
import { z } from "zod";
import { LedgerError } from "@pocket-ledger/ledger";
import { DocumentStoreError } from "@pocket-ledger/store";
import type { PersonalLedgerService } from "./services/personal-ledger-service.js";
import {
  renderAdded,
  renderBalance,
  renderCategories,
  renderError,
  renderLimits,
  renderReport,
  renderWarning,
} from "./render.js";

export const USAGE = [
  "Usage: pocket-ledger <command>",
  "",
  "  add <amount> <category> [note...]   Record a transaction (negative = debit)",
  "  balance                             Show the current balance",
  "  report [--sort date|amount|category|note] [--desc]",
  "         [--from DD.MM.YYYY] [--to DD.MM.YYYY] [--category name]",
  "  limit <category> <amount>           Set a category limit",
  "  limits                              List category limits",
  "  categories                          List categories in use",
] as const;

export interface CliIo {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

/**
 * Bad command line: wrong command, missing or malformed arguments.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Plain decimal text: no hex, binary or octal prefixes. */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const NumberArgSchema = z.string().trim().regex(DECIMAL_PATTERN).pipe(z.coerce.number().finite());

function parseNumberArg(name: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new UsageError(`Missing ${name}`);
  }
  const result = NumberArgSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(`Invalid ${name}: "${raw}"`);
  }
  return result.data;
}

function requireArg(name: string, raw: string | undefined): string {
  if (raw === undefined) {
    throw new UsageError(`Missing ${name}`);
  }
  return raw;
}

function parseReportArgs(args: readonly string[]) {
  try {
    const { values } = parseArgs({
      args: [...args],
      allowPositionals: false,
      strict: true,
      options: {
        sort: { type: "string" },
        desc: { type: "boolean", default: false },
        from: { type: "string" },
        to: { type: "string" },
        category: { type: "string" },
      },
    });
    return values;
  } catch (err) {
    if (err instanceof TypeError) {
      throw new UsageError(err.message);
    }
    throw err;
  }
}

function dispatch(
  command: string | undefined,
  args: readonly string[],
  service: PersonalLedgerService,
  out: (line: string) => void,
  chalk: ChalkInstance,
): void {
  switch (command) {
    case "add": {
      const amount = parseNumberArg("amount", args[0]);
      const category = requireArg("category", args[1]);
      const note = args.slice(2).join(" ");
      const { transaction, warnings } = service.addTransaction(amount, category, note);
      for (const warning of warnings) {
        out(renderWarning(warning, chalk));
      }
      out(renderAdded(transaction, chalk));
      return;
    }
    case "balance":
      out(renderBalance(service.balance(), chalk));
      return;
    case "report": {
      const values = parseReportArgs(args);
      const query = {
        sortBy: values.sort,
        descending: values.desc,
        startDate: values.from,
        endDate: values.to,
        category: values.category,
      };
      for (const line of renderReport(service.report(query), query, chalk)) {
        out(line);
      }
      return;
    }
    case "limit": {
      const category = requireArg("category", args[0]);
      const limit = parseNumberArg("limit", args[1]);
      const entry = service.setLimit(category, limit);
      out(chalk.green(`Limit for category '${entry.category}' set to ${String(entry.limit)}`));
      return;
    }
    case "limits":
      for (const line of renderLimits(service.listLimits(), chalk)) {
        out(line);
      }
      return;
    case "categories":
      for (const line of renderCategories(service.listCategories(), chalk)) {
        out(line);
      }
      return;
    default:
      throw new UsageError(command === undefined ? "Missing command" : `Unknown command "${command}"`);
  }
}

/**
 * Run one command line against the service.
 *
 * @returns The process exit code
 */
export function runCli(
  argv: readonly string[],
  service: PersonalLedgerService,
  io: CliIo,
  chalk: ChalkInstance,
): number {
  const [command, ...args] = argv;

  try {
    dispatch(command, args, service, io.out, chalk);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(renderError(err.message, chalk));
      for (const line of USAGE) {
        io.err(line);
      }
      return 2;
    }
    if (err instanceof LedgerError || err instanceof DocumentStoreError) {
      io.err(renderError(err.message, chalk));
      return 1;
    }
    throw err;
  }
}
