/**
 * @pocket-ledger/ledger — Personal ledger engine.
 *
 * Records signed transactions under free-form categories, evaluates
 * advisory per-category limits, aggregates the balance and produces
 * filtered, sorted reports.
 *
 * Design rules:
 * - Every operation loads the full document from its DocumentStore
 * - Mutating operations save the full document back
 * - No in-memory state is shared between operations
 * - Fail-closed: invalid input throws LedgerError
 * - Limit exceedance is reported as a warning, never thrown
 */

// Components
export { TransactionEngine, checkCategoryLimit, formatTimestamp, normalizeTimestamp, TIMESTAMP_FORMAT } from "./transaction-engine.js";
export { BalanceAggregator, computeBalance, computeCategoryTotal } from "./balance-aggregator.js";
export {
  ReportGenerator,
  filterTransactions,
  sortTransactions,
  resolveSortField,
  parseDateBound,
  calendarDateOf,
} from "./report-generator.js";
export { LimitManager } from "./limit-manager.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  toScaled,
  fromScaled,
  sumAmounts,
  assertDecimals,
} from "./money-math.js";

// Types
export type {
  LedgerErrorCode,
  EngineOptions,
  LimitExceededWarning,
  LedgerWarning,
  AddTransactionResult,
  SortField,
  ReportQuery,
} from "./types.js";

export { LedgerError, DEFAULT_DECIMALS } from "./types.js";
