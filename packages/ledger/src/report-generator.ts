/**
 * @pocket-ledger/ledger — Report generation.
 *
 * A report is a filtered, sorted, read-only view over the stored
 * transactions. Pipeline: date filter → category filter → stable sort.
 *
 * Rules:
 * - Date bounds are calendar dates (`DD.MM.YYYY`), both inclusive
 * - A malformed bound fails the whole report
 * - Unrecognized sort fields sort by note
 * - Equal sort keys keep insertion order in either direction
 */

import { format, isValid, parse } from "date-fns";
import type { Transaction } from "@pocket-ledger/types";
import type { DocumentStore } from "@pocket-ledger/store";
import { LedgerError } from "./types.js";
import type { ReportQuery, SortField } from "./types.js";

// ─── Sort Fields ─────────────────────────────────────────────────────────

const SORT_FIELDS: ReadonlyMap<string, SortField> = new Map<string, SortField>([
  ["date", "date"],
  ["amount", "amount"],
  ["category", "category"],
  ["note", "note"],
  // Russian field labels
  ["дата", "date"],
  ["сумма", "amount"],
  ["категория", "category"],
  ["примечание", "note"],
]);

/**
 * Resolve a requested sort field. Absent means "date"; anything
 * unrecognized means "note".
 */
export function resolveSortField(requested: string | undefined): SortField {
  if (requested === undefined) {
    return "date";
  }
  return SORT_FIELDS.get(requested) ?? "note";
}

function compareKeys(a: Transaction, b: Transaction, field: SortField): number {
  switch (field) {
    case "amount":
      return a.amount - b.amount;
    case "date":
      return compareText(a.timestamp, b.timestamp);
    case "category":
      return compareText(a.category, b.category);
    case "note":
      return compareText(a.note, b.note);
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Stable sort by one field. Does not modify the input.
 */
export function sortTransactions(
  transactions: readonly Transaction[],
  field: SortField,
  descending = false,
): Transaction[] {
  const direction = descending ? -1 : 1;
  return [...transactions].sort((a, b) => direction * compareKeys(a, b, field));
}

// ─── Date Filter ─────────────────────────────────────────────────────────

const DATE_BOUND_PATTERN = /^\d{1,2}\.\d{1,2}\.\d{4}$/;

/**
 * Parse a `DD.MM.YYYY` bound into an ISO calendar date (`YYYY-MM-DD`).
 *
 * @throws {LedgerError} INVALID_DATE_FORMAT on malformed or impossible dates
 */
export function parseDateBound(value: string): string {
  const parsed = DATE_BOUND_PATTERN.test(value)
    ? parse(value, "dd.MM.yyyy", new Date(2000, 0, 1))
    : undefined;
  if (parsed === undefined || !isValid(parsed)) {
    throw new LedgerError(
      "INVALID_DATE_FORMAT",
      `Invalid date "${value}": use DD.MM.YYYY`,
    );
  }
  return format(parsed, "yyyy-MM-dd");
}

/**
 * Calendar date (`YYYY-MM-DD`) of a stored timestamp.
 */
export function calendarDateOf(timestamp: string): string {
  return timestamp.slice(0, 10);
}

/**
 * Apply the date and category filters of a query, in that order.
 *
 * Both date bounds are parsed before anything is filtered, so a bad bound
 * never yields a partial result.
 */
export function filterTransactions(
  transactions: readonly Transaction[],
  query: Pick<ReportQuery, "startDate" | "endDate" | "category">,
): Transaction[] {
  let result = [...transactions];

  const start = query.startDate ? parseDateBound(query.startDate) : undefined;
  const end = query.endDate ? parseDateBound(query.endDate) : undefined;

  if (start !== undefined || end !== undefined) {
    result = result.filter((t) => {
      const day = calendarDateOf(t.timestamp);
      if (start !== undefined && day < start) return false;
      if (end !== undefined && day > end) return false;
      return true;
    });
  }

  if (query.category) {
    const category = query.category;
    result = result.filter((t) => t.category === category);
  }

  return result;
}

// ─── Generator ───────────────────────────────────────────────────────────

/**
 * Builds reports from the stored ledger. Never writes.
 */
export class ReportGenerator {
  private readonly _store: DocumentStore;

  constructor(store: DocumentStore) {
    this._store = store;
  }

  /**
   * Filtered, sorted view of the stored transactions.
   *
   * @throws {LedgerError} INVALID_DATE_FORMAT if a date bound is malformed
   */
  report(query: ReportQuery = {}): readonly Transaction[] {
    const { transactions } = this._store.load();
    const filtered = filterTransactions(transactions, query);
    return sortTransactions(filtered, resolveSortField(query.sortBy), query.descending ?? false);
  }

  /**
   * Distinct categories among stored transactions, in first-seen order.
   */
  listCategories(): ReadonlySet<string> {
    const { transactions } = this._store.load();
    return new Set(transactions.map((t) => t.category));
  }
}
