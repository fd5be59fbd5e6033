/**
 * Terminal rendering for ledger results.
 *
 * Pure functions from values to lines; the caller decides where they go.
 */

import type { ChalkInstance } from "chalk";
import { format, parseISO } from "date-fns";
import { resolveSortField } from "@pocket-ledger/ledger";
import type { LedgerWarning, ReportQuery } from "@pocket-ledger/ledger";
import type { CategoryLimit, Transaction } from "@pocket-ledger/types";

/** Column widths: date, amount, type, category. Note is last and unpadded. */
const COLUMNS = [25, 10, 15, 20] as const;

export function formatMoney(amount: number): string {
  return amount.toFixed(2);
}

/**
 * Stored timestamp as `dd.MM.yy, HH:mm:ss`.
 */
export function formatReportDate(timestamp: string): string {
  return format(parseISO(timestamp), "dd.MM.yy, HH:mm:ss");
}

function row(cells: readonly [string, string, string, string, string]): string {
  const [date, amount, type, category, note] = cells;
  return [
    date.padEnd(COLUMNS[0]),
    amount.padEnd(COLUMNS[1]),
    type.padEnd(COLUMNS[2]),
    category.padEnd(COLUMNS[3]),
    note,
  ].join(" ").trimEnd();
}

export function renderReport(
  transactions: readonly Transaction[],
  query: Pick<ReportQuery, "sortBy" | "descending">,
  chalk: ChalkInstance,
): string[] {
  const field = resolveSortField(query.sortBy);
  const direction = query.descending === true ? "descending" : "ascending";
  const lines = [chalk.bold(`Report (sorted by ${field}, ${direction})`)];

  if (transactions.length === 0) {
    lines.push(chalk.gray("No transactions"));
    return lines;
  }

  lines.push(chalk.gray(row(["Date", "Amount", "Type", "Category", "Note"])));
  for (const t of transactions) {
    const line = row([formatReportDate(t.timestamp), formatMoney(t.amount), t.type, t.category, t.note]);
    lines.push(t.type === "debit" ? chalk.red(line) : chalk.green(line));
  }
  return lines;
}

export function renderAdded(transaction: Transaction, chalk: ChalkInstance): string {
  return chalk.green(
    `Transaction (${transaction.type}) added: ${formatMoney(transaction.amount)} ${transaction.category}`,
  );
}

export function renderWarning(warning: LedgerWarning, chalk: ChalkInstance): string {
  return chalk.yellow(`! ${warning.message}`);
}

export function renderBalance(balance: number, chalk: ChalkInstance): string {
  return `Balance: ${chalk.bold(formatMoney(balance))}`;
}

export function renderLimits(limits: readonly CategoryLimit[], chalk: ChalkInstance): string[] {
  if (limits.length === 0) {
    return [chalk.gray("No limits set")];
  }
  return limits.map((l) => `${l.category}: ${formatMoney(l.limit)}`);
}

export function renderCategories(categories: ReadonlySet<string>, chalk: ChalkInstance): string[] {
  if (categories.size === 0) {
    return [chalk.gray("No categories")];
  }
  return [...categories];
}

export function renderError(message: string, chalk: ChalkInstance): string {
  return chalk.red(`Error: ${message}`);
}
