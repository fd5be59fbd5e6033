/**
 * Tests for InMemoryDocumentStore.
 */

import { describe, it, expect } from "vitest";
import type { LedgerDocument } from "@pocket-ledger/types";
import { InMemoryDocumentStore } from "../src/in-memory-store.js";
import { DocumentStoreError } from "../src/types.js";

const DOC: LedgerDocument = {
  transactions: [
    { amount: -42.5, category: "Transport", note: "taxi", timestamp: "2024-03-01T08:15:00.000000", type: "debit" },
  ],
  limits: new Map([["Transport", { category: "Transport", limit: 100 }]]),
};

describe("InMemoryDocumentStore", () => {
  it("loads an empty ledger before any save", () => {
    const store = new InMemoryDocumentStore();
    const doc = store.load();
    expect(doc.transactions).toEqual([]);
    expect(doc.limits.size).toBe(0);
    expect(store.text).toBeUndefined();
  });

  it("returns what was saved", () => {
    const store = new InMemoryDocumentStore();
    store.save(DOC);
    expect(store.load()).toEqual(DOC);
    expect(store.saveCount).toBe(1);
  });

  it("hands out a fresh copy on every load", () => {
    const store = new InMemoryDocumentStore();
    store.save(DOC);
    const first = store.load();
    const second = store.load();
    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(first.limits).not.toBe(second.limits);
  });

  it("is unaffected by later mutation of the saved object", () => {
    const store = new InMemoryDocumentStore();
    const limits = new Map([["A", { category: "A", limit: 1 }]]);
    store.save({ transactions: [], limits });
    limits.set("B", { category: "B", limit: 2 });
    expect(store.load().limits.size).toBe(1);
  });

  it("starts from initial text", () => {
    const store = new InMemoryDocumentStore('{"transactions": [], "limits": {"Fun": 50}}');
    expect(store.load().limits.get("Fun")).toEqual({ category: "Fun", limit: 50 });
  });

  it("surfaces corrupt initial text on load", () => {
    const store = new InMemoryDocumentStore("not json");
    expect(() => store.load()).toThrow(DocumentStoreError);
  });
});
