/**
 * @pocket-ledger/store — Persisted document codec.
 *
 * Converts between the domain LedgerDocument and the on-disk JSON shape:
 *
 * {
 *   "transactions": [
 *     {"amount": -120.5, "category": "Food", "note": "", "date": "2024-06-15T10:30:00.000000", "type": "списание"}
 *   ],
 *   "limits": {"Food": 1000}
 * }
 *
 * The `type` labels and the `date` key are fixed by existing documents.
 * On decode, `type` is recomputed from `amount`; on encode it is written
 * from the same derivation.
 */

import { z } from "zod";
import { transactionTypeOf } from "@pocket-ledger/types";
import type {
  CategoryLimit,
  LedgerDocument,
  Transaction,
  TransactionType,
} from "@pocket-ledger/types";
import { DocumentStoreError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

/** Stored labels for each transaction type. */
export const TYPE_LABELS = {
  debit: "списание",
  credit: "начисление",
} as const satisfies Record<TransactionType, string>;

/** Local date-time with zero to six fractional digits. */
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,6})?$/;

export const PersistedTransactionSchema = z.object({
  amount: z.number().finite(),
  category: z.string(),
  note: z.string(),
  date: z.string().regex(TIMESTAMP_PATTERN, "Expected YYYY-MM-DDTHH:mm:ss[.ffffff]"),
  type: z.enum([TYPE_LABELS.debit, TYPE_LABELS.credit]),
});

const LimitValueSchema = z.number().finite().nonnegative();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Category → limit object. Every own key is kept, `__proto__` included,
 * since categories are free-form text.
 */
const PersistedLimitsSchema = z
  .custom<Record<string, unknown>>(isPlainObject, { message: "Expected object" })
  .transform((raw, ctx) => {
    const entries: [string, number][] = [];
    for (const [category, value] of Object.entries(raw)) {
      const result = LimitValueSchema.safeParse(value);
      if (!result.success) {
        for (const issue of result.error.issues) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [category], message: issue.message });
        }
        return z.NEVER;
      }
      entries.push([category, result.data]);
    }
    return Object.fromEntries(entries);
  });

export const PersistedDocumentSchema = z.object({
  transactions: z.array(PersistedTransactionSchema).default([]),
  limits: PersistedLimitsSchema.default({}),
});

export type PersistedTransaction = z.infer<typeof PersistedTransactionSchema>;
export type PersistedDocument = z.infer<typeof PersistedDocumentSchema>;

// =============================================================================
// Decode
// =============================================================================

/**
 * Validate raw JSON and convert it to a LedgerDocument.
 *
 * @param source - Where the value came from, for error messages
 * @throws {DocumentStoreError} CORRUPT_DOCUMENT if the shape is wrong
 */
export function decodeDocument(raw: unknown, source: string): LedgerDocument {
  const result = PersistedDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DocumentStoreError(
      "CORRUPT_DOCUMENT",
      `Malformed ledger document in ${source}${where}: ${issue?.message ?? "invalid shape"}`,
      source,
      { cause: result.error },
    );
  }

  const transactions: Transaction[] = result.data.transactions.map((t) => ({
    amount: t.amount,
    category: t.category,
    note: t.note,
    timestamp: t.date,
    type: transactionTypeOf(t.amount),
  }));

  const limits = new Map<string, CategoryLimit>();
  for (const [category, limit] of Object.entries(result.data.limits)) {
    limits.set(category, { category, limit });
  }

  return { transactions, limits };
}

/**
 * Parse document text and decode it.
 *
 * @throws {DocumentStoreError} CORRUPT_DOCUMENT on invalid JSON or shape
 */
export function parseDocument(text: string, source: string): LedgerDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DocumentStoreError(
      "CORRUPT_DOCUMENT",
      `Ledger document in ${source} is not valid JSON`,
      source,
      { cause: err },
    );
  }
  return decodeDocument(raw, source);
}

// =============================================================================
// Encode
// =============================================================================

/**
 * Convert a LedgerDocument to its persisted shape.
 */
export function encodeDocument(document: LedgerDocument): PersistedDocument {
  const limits = Object.fromEntries(
    [...document.limits.values()].map(({ category, limit }) => [category, limit]),
  );

  return {
    transactions: document.transactions.map((t) => ({
      amount: t.amount,
      category: t.category,
      note: t.note,
      date: t.timestamp,
      type: TYPE_LABELS[transactionTypeOf(t.amount)],
    })),
    limits,
  };
}

/**
 * Serialize a LedgerDocument to document text (4-space indentation).
 */
export function serializeDocument(document: LedgerDocument): string {
  return JSON.stringify(encodeDocument(document), null, 4);
}
