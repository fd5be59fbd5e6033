/**
 * @pocket-ledger/ledger — Transaction ingestion.
 *
 * Validates a new transaction, evaluates the category limit, appends the
 * transaction and persists the whole ledger.
 *
 * The limit check sums every stored transaction of the category, credits
 * included, plus the new amount: a limit caps the net category total, not
 * gross spending. Exceeding it yields a warning; the append still happens.
 */

import { format } from "date-fns";
import { transactionTypeOf } from "@pocket-ledger/types";
import type { CategoryLimit, Transaction } from "@pocket-ledger/types";
import type { DocumentStore } from "@pocket-ledger/store";
import { computeCategoryTotal } from "./balance-aggregator.js";
import { assertDecimals, fromScaled, toScaled } from "./money-math.js";
import { DEFAULT_DECIMALS, LedgerError } from "./types.js";
import type {
  AddTransactionResult,
  EngineOptions,
  LedgerWarning,
  LimitExceededWarning,
} from "./types.js";

/** Stored timestamp layout: local time, microsecond precision. */
export const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSSSS";

/**
 * Format a clock reading as a stored timestamp.
 */
export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/**
 * Pad a stored timestamp to six fractional digits. Older documents omit
 * the fraction when it is zero.
 */
export function normalizeTimestamp(timestamp: string): string {
  const [base, fraction = ""] = timestamp.split(".");
  return `${base}.${fraction.padEnd(6, "0")}`;
}

/**
 * Evaluate a category limit against the stored transactions plus a new amount.
 *
 * @returns A warning when the projected net total exceeds the limit
 */
export function checkCategoryLimit(
  transactions: readonly Transaction[],
  category: string,
  amount: number,
  limit: CategoryLimit | undefined,
  decimals: number,
): LimitExceededWarning | undefined {
  if (limit === undefined) {
    return undefined;
  }

  const projected = computeCategoryTotal(transactions, category, decimals) + toScaled(amount, decimals);
  if (projected <= toScaled(limit.limit, decimals)) {
    return undefined;
  }

  const projectedTotal = fromScaled(projected, decimals);
  return {
    code: "LIMIT_EXCEEDED",
    category,
    projectedTotal,
    limit: limit.limit,
    message: `Limit for category '${category}' exceeded: total ${projectedTotal.toFixed(2)}, limit ${limit.limit.toFixed(2)}`,
  };
}

/**
 * Appends transactions to the stored ledger.
 */
export class TransactionEngine {
  private readonly _store: DocumentStore;
  private readonly _decimals: number;
  private readonly _now: () => Date;

  constructor(store: DocumentStore, options?: EngineOptions) {
    this._store = store;
    this._decimals = options?.decimals ?? DEFAULT_DECIMALS;
    this._now = options?.now ?? (() => new Date());
    assertDecimals(this._decimals);
  }

  /**
   * Record a new transaction.
   *
   * Validation rules (fail-closed, checked before anything is read):
   * 1. Category must be a non-empty string
   * 2. Amount must be a finite number
   *
   * Throws LedgerError("INVALID_INPUT") if either fails.
   */
  add(amount: number, category: string, note = ""): AddTransactionResult {
    if (category.length === 0) {
      throw new LedgerError("INVALID_INPUT", "Category must not be empty");
    }
    if (!Number.isFinite(amount)) {
      throw new LedgerError("INVALID_INPUT", `Amount must be a finite number, got ${String(amount)}`);
    }

    const type = transactionTypeOf(amount);
    const document = this._store.load();

    const warnings: LedgerWarning[] = [];
    const warning = checkCategoryLimit(
      document.transactions,
      category,
      amount,
      document.limits.get(category),
      this._decimals,
    );
    if (warning !== undefined) {
      warnings.push(warning);
    }

    const transaction: Transaction = {
      amount,
      category,
      note,
      timestamp: this._nextTimestamp(document.transactions),
      type,
    };

    this._store.save({
      transactions: [...document.transactions, transaction],
      limits: document.limits,
    });

    return { transaction, warnings };
  }

  /**
   * Current clock reading, never earlier than the last stored timestamp.
   */
  private _nextTimestamp(transactions: readonly Transaction[]): string {
    const timestamp = formatTimestamp(this._now());
    const last = transactions[transactions.length - 1];
    if (last === undefined) {
      return timestamp;
    }
    const floor = normalizeTimestamp(last.timestamp);
    return timestamp < floor ? floor : timestamp;
  }
}
