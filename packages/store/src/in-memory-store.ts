/**
 * @pocket-ledger/store — In-memory DocumentStore implementation.
 *
 * Holds the serialized document text rather than live objects, so each
 * load decodes a fresh LedgerDocument exactly as the file store would.
 * Suitable for tests and short-lived processes; nothing survives exit.
 */

import type { LedgerDocument } from "@pocket-ledger/types";
import { emptyLedgerDocument } from "@pocket-ledger/types";
import { parseDocument, serializeDocument } from "./codec.js";
import type { DocumentStore } from "./types.js";

const SOURCE = "in-memory store";

export class InMemoryDocumentStore implements DocumentStore {
  /** Serialized document, or undefined until the first save */
  private _text: string | undefined;

  private _saveCount = 0;

  /**
   * @param initialText - Optional document text to start from (decoded lazily on load)
   */
  constructor(initialText?: string) {
    this._text = initialText;
  }

  load(): LedgerDocument {
    if (this._text === undefined) {
      return emptyLedgerDocument();
    }
    return parseDocument(this._text, SOURCE);
  }

  save(document: LedgerDocument): void {
    this._text = serializeDocument(document);
    this._saveCount++;
  }

  /** The stored document text, or undefined if nothing was saved. */
  get text(): string | undefined {
    return this._text;
  }

  /** Number of completed saves. */
  get saveCount(): number {
    return this._saveCount;
  }
}
