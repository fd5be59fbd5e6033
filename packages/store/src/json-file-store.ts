/**
 * @pocket-ledger/store — File-based JSON DocumentStore implementation.
 *
 * Stores the whole ledger as a single JSON document.
 *
 * Crash safety:
 * - Saves write a temporary sibling file, fsync it, then rename it over the target
 * - A failed save leaves the previous document untouched
 * - The file is the source of truth; nothing is cached between calls
 *
 * No locking: two processes sharing a path can overwrite each other's
 * read-modify-write cycle.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import type { LedgerDocument } from "@pocket-ledger/types";
import { emptyLedgerDocument } from "@pocket-ledger/types";
import { parseDocument, serializeDocument } from "./codec.js";
import type { DocumentStore } from "./types.js";
import { DocumentStoreError } from "./types.js";

/**
 * Options for creating a JsonFileDocumentStore.
 */
export interface JsonFileDocumentStoreOptions {
  /** Path to the JSON document */
  readonly filePath: string;
}

/**
 * File-based ledger document store.
 *
 * The file is created on first save; its parent directory is created
 * if missing.
 */
export class JsonFileDocumentStore implements DocumentStore {
  private readonly _filePath: string;

  constructor(options: JsonFileDocumentStoreOptions) {
    this._filePath = options.filePath;
  }

  load(): LedgerDocument {
    if (!existsSync(this._filePath)) {
      return emptyLedgerDocument();
    }

    let text: string;
    try {
      text = readFileSync(this._filePath, "utf-8");
    } catch (err) {
      throw new DocumentStoreError(
        "READ_FAILED",
        `Cannot read ledger document ${this._filePath}`,
        this._filePath,
        { cause: err },
      );
    }

    return parseDocument(text, this._filePath);
  }

  save(document: LedgerDocument): void {
    const text = serializeDocument(document);
    const tempPath = `${this._filePath}.${process.pid}.tmp`;
    let tempCreated = false;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      const fd = openSync(tempPath, "w");
      tempCreated = true;
      try {
        writeSync(fd, text, null, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tempPath, this._filePath);
    } catch (err) {
      const cleanupError = tempCreated ? this._removeTemp(tempPath) : undefined;
      const cause =
        cleanupError === undefined
          ? err
          : new AggregateError([err, cleanupError], "Write and temp file cleanup both failed");
      throw new DocumentStoreError(
        "WRITE_FAILED",
        `Cannot write ledger document ${this._filePath}`,
        this._filePath,
        { cause },
      );
    }
  }

  /**
   * Get the file path this store reads and writes.
   */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Remove a temp file this store created. Returns the failure, if any.
   */
  private _removeTemp(path: string): unknown {
    try {
      rmSync(path, { force: true });
      return undefined;
    } catch (err) {
      return err;
    }
  }
}
