/**
 * PersonalLedgerService — Composition root for the ledger engine.
 *
 * The front end calls this service; it never touches the engine
 * components directly. Every call reloads the document through the
 * configured store, so two services on the same store always agree.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  BalanceAggregator,
  LimitManager,
  ReportGenerator,
  TransactionEngine,
} from "@pocket-ledger/ledger";
import type { AddTransactionResult, ReportQuery } from "@pocket-ledger/ledger";
import type { DocumentStore } from "@pocket-ledger/store";
import type { CategoryLimit, Transaction } from "@pocket-ledger/types";

// =============================================================================
// Configuration
// =============================================================================

export interface PersonalLedgerServiceConfig {
  readonly store: DocumentStore;
  /** Fractional digits for sums. Defaults to the engine default. */
  readonly decimals?: number | undefined;
  readonly now?: (() => Date) | undefined;
  /** Defaults to a silent logger. */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class PersonalLedgerService {
  private readonly _transactions: TransactionEngine;
  private readonly _balance: BalanceAggregator;
  private readonly _reports: ReportGenerator;
  private readonly _limits: LimitManager;
  private readonly _logger: Logger;

  constructor(config: PersonalLedgerServiceConfig) {
    const options = { decimals: config.decimals, now: config.now };
    this._transactions = new TransactionEngine(config.store, options);
    this._balance = new BalanceAggregator(config.store, options);
    this._reports = new ReportGenerator(config.store);
    this._limits = new LimitManager(config.store);
    this._logger = config.logger ?? pino({ level: "silent" });
  }

  // ─── Transactions ──────────────────────────────────────────────────

  /**
   * Record a transaction. Limit warnings come back in `warnings` and are
   * logged; they never prevent the append.
   */
  addTransaction(amount: number, category: string, note = ""): AddTransactionResult {
    const result = this._transactions.add(amount, category, note);
    const { transaction } = result;

    this._logger.debug(
      { category, amount, type: transaction.type, timestamp: transaction.timestamp },
      "Transaction added",
    );
    for (const warning of result.warnings) {
      this._logger.warn(
        { category: warning.category, projectedTotal: warning.projectedTotal, limit: warning.limit },
        warning.message,
      );
    }

    return result;
  }

  balance(): number {
    return this._balance.balance();
  }

  // ─── Reports ───────────────────────────────────────────────────────

  report(query?: ReportQuery): readonly Transaction[] {
    const transactions = this._reports.report(query);
    this._logger.debug({ query, count: transactions.length }, "Report generated");
    return transactions;
  }

  /** Distinct categories present among transactions, for filter choices. */
  listCategories(): ReadonlySet<string> {
    return this._reports.listCategories();
  }

  // ─── Limits ────────────────────────────────────────────────────────

  setLimit(category: string, limit: number): CategoryLimit {
    const entry = this._limits.setLimit(category, limit);
    this._logger.debug({ category, limit }, "Limit set");
    return entry;
  }

  listLimits(): readonly CategoryLimit[] {
    return this._limits.listLimits();
  }
}
