/**
 * Tests for PersonalLedgerService — the collaborator interface.
 */

import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { InMemoryDocumentStore } from "@pocket-ledger/store";
import { LedgerError } from "@pocket-ledger/ledger";
import { PersonalLedgerService } from "../src/services/personal-ledger-service.js";

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

let store: InMemoryDocumentStore;
let logs: LogLine[];
let service: PersonalLedgerService;

function clockAt(...readings: Date[]): () => Date {
  let i = 0;
  return () => readings[Math.min(i++, readings.length - 1)] ?? new Date(0);
}

beforeEach(() => {
  store = new InMemoryDocumentStore();
  logs = [];
  const logger = pino(
    { level: "debug" },
    { write: (msg: string) => void logs.push(JSON.parse(msg) as LogLine) },
  );
  service = new PersonalLedgerService({
    store,
    logger,
    now: clockAt(
      new Date(2024, 0, 1, 12, 0, 0),
      new Date(2024, 5, 15, 12, 0, 0),
      new Date(2024, 11, 31, 12, 0, 0),
    ),
  });
});

describe("PersonalLedgerService", () => {
  it("adds transactions and reports the balance", () => {
    service.addTransaction(1000, "Salary");
    service.addTransaction(-250.5, "Food", "market");
    expect(service.balance()).toBe(749.5);
  });

  it("returns limit warnings and logs them at warn level", () => {
    service.setLimit("Food", 100);
    const { warnings } = service.addTransaction(150, "Food");

    expect(warnings).toHaveLength(1);
    const warnLine = logs.find((l) => l.level === 40);
    expect(warnLine).toMatchObject({
      msg: "Limit for category 'Food' exceeded: total 150.00, limit 100.00",
      category: "Food",
      projectedTotal: 150,
      limit: 100,
    });
    expect(store.load().transactions).toHaveLength(1);
  });

  it("logs each add at debug level", () => {
    service.addTransaction(-5, "Coffee");
    expect(logs).toContainEqual(
      expect.objectContaining({ level: 20, msg: "Transaction added", category: "Coffee", type: "debit" }),
    );
  });

  it("filters and sorts reports", () => {
    service.addTransaction(100, "Food", "b");
    service.addTransaction(50, "Rent", "a");
    service.addTransaction(20, "Food", "c");

    const report = service.report({ category: "Food", sortBy: "amount" });
    expect(report.map((t) => t.amount)).toEqual([20, 100]);

    const inJune = service.report({ startDate: "01.06.2024", endDate: "30.06.2024" });
    expect(inJune.map((t) => t.category)).toEqual(["Rent"]);
  });

  it("surfaces report date errors", () => {
    expect(() => service.report({ startDate: "June" })).toThrow(LedgerError);
  });

  it("lists categories and limits", () => {
    service.addTransaction(1, "Food");
    service.addTransaction(1, "Rent");
    service.setLimit("Travel", 500);

    expect([...service.listCategories()]).toEqual(["Food", "Rent"]);
    expect(service.listLimits()).toEqual([{ category: "Travel", limit: 500 }]);
  });

  it("shares state with another service over the same store", () => {
    const other = new PersonalLedgerService({ store });
    other.addTransaction(42, "Gift");
    expect(service.balance()).toBe(42);
  });

  it("rejects a negative limit", () => {
    expect(() => service.setLimit("Food", -1)).toThrow(LedgerError);
    expect(service.listLimits()).toEqual([]);
  });

  it("honors the configured scale", () => {
    const coarse = new PersonalLedgerService({ store, decimals: 0 });
    coarse.addTransaction(0.4, "A");
    coarse.addTransaction(0.4, "A");
    expect(coarse.balance()).toBe(0);
    expect(service.balance()).toBe(0.8);
  });
});
