/**
 * @pocket-ledger/store — Core types.
 *
 * The document store reads and writes the entire ledger as one unit.
 *
 * Design principles:
 * - A missing document is an empty ledger, not an error
 * - A malformed document is never repaired; it fails the operation
 * - A save replaces the whole document
 * - No locking: one caller at a time
 */

import type { LedgerDocument } from "@pocket-ledger/types";

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Whole-document persistence for the ledger.
 *
 * Every engine operation calls `load()` afresh. Implementations must not
 * hand out shared mutable state between calls.
 */
export interface DocumentStore {
  /**
   * Read the full ledger.
   *
   * @returns The stored ledger, or an empty one if nothing is stored yet
   * @throws {DocumentStoreError} CORRUPT_DOCUMENT or READ_FAILED
   */
  load(): LedgerDocument;

  /**
   * Replace the stored ledger with `document`.
   *
   * @throws {DocumentStoreError} WRITE_FAILED
   */
  save(document: LedgerDocument): void;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for DocumentStore operations.
 */
export type DocumentStoreErrorCode =
  | "CORRUPT_DOCUMENT"
  | "READ_FAILED"
  | "WRITE_FAILED";

/**
 * Error thrown by DocumentStore operations.
 */
export class DocumentStoreError extends Error {
  constructor(
    public readonly code: DocumentStoreErrorCode,
    message: string,
    public readonly source: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "DocumentStoreError";
  }
}
