/**
 * @pocket-ledger/store — Whole-document ledger persistence.
 *
 * Provides:
 * - DocumentStore interface (load / save the full ledger)
 * - JsonFileDocumentStore for durable single-file persistence
 * - InMemoryDocumentStore for tests and short-lived processes
 * - The persisted JSON codec
 *
 * @packageDocumentation
 */

export type { DocumentStore, DocumentStoreErrorCode } from "./types.js";
export { DocumentStoreError } from "./types.js";

export {
  TYPE_LABELS,
  PersistedDocumentSchema,
  PersistedTransactionSchema,
  decodeDocument,
  parseDocument,
  encodeDocument,
  serializeDocument,
} from "./codec.js";
export type { PersistedDocument, PersistedTransaction } from "./codec.js";

export { InMemoryDocumentStore } from "./in-memory-store.js";
export { JsonFileDocumentStore } from "./json-file-store.js";
export type { JsonFileDocumentStoreOptions } from "./json-file-store.js";
