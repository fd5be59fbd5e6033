/**
 * @pocket-ledger/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Transactions are appended, never edited
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Limit exceedance is a warning value, never an error
 */

import type { Transaction } from "@pocket-ledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_INPUT"
  | "INVALID_DATE_FORMAT"
  | "INVALID_AMOUNT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Engine Options ──────────────────────────────────────────────────────

/** Default number of fractional digits used for fixed-point sums. */
export const DEFAULT_DECIMALS = 6;

/**
 * Options shared by the engine components.
 */
export interface EngineOptions {
  /** Fractional digits kept when summing amounts. Defaults to 6. */
  readonly decimals?: number | undefined;

  /** Clock used for new transaction timestamps. Defaults to `new Date()`. */
  readonly now?: (() => Date) | undefined;
}

// ─── Warnings ────────────────────────────────────────────────────────────

/**
 * A new transaction pushed its category's net total above the limit.
 * The transaction is still recorded.
 */
export interface LimitExceededWarning {
  readonly code: "LIMIT_EXCEEDED";
  readonly category: string;
  /** Net category total including the new transaction. */
  readonly projectedTotal: number;
  readonly limit: number;
  readonly message: string;
}

/** Advisory signals returned alongside a successful operation. */
export type LedgerWarning = LimitExceededWarning;

/**
 * Result of a successful add.
 */
export interface AddTransactionResult {
  readonly transaction: Transaction;
  readonly warnings: readonly LedgerWarning[];
}

// ─── Report Types ────────────────────────────────────────────────────────

/** Fields a report can be sorted by. */
export type SortField = "date" | "amount" | "category" | "note";

/**
 * Report criteria. Empty strings count as absent.
 */
export interface ReportQuery {
  /**
   * Sort field. Unrecognized values sort by note.
   * Defaults to "date".
   */
  readonly sortBy?: string | undefined;

  readonly descending?: boolean | undefined;

  /** Inclusive lower bound, `DD.MM.YYYY`. */
  readonly startDate?: string | undefined;

  /** Inclusive upper bound, `DD.MM.YYYY`. */
  readonly endDate?: string | undefined;

  /** Exact, case-sensitive category match. */
  readonly category?: string | undefined;
}
