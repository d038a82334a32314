import { describe, expect, test } from "vitest";
import { NULL_IDENTITY } from "./constants";
import { JackpotError } from "./errors";
import { EntryLedger } from "./ledger";
import { key } from "../test/fixtures";

describe("EntryLedger", () => {
  test("starts with a zero sentinel at index 0", () => {
    const ledger = new EntryLedger();
    expect(ledger.length()).toBe(1);
    expect(ledger.at(0).cumulativeTicketNumber).toBe(0n);
    expect(ledger.at(0).buyer.equals(NULL_IDENTITY)).toBe(true);
    expect(ledger.totalTickets()).toBe(0n);
  });

  test("cumulative ticket numbers are the running sum of ticket counts", () => {
    const ledger = new EntryLedger();
    const counts = [3n, 1n, 7n, 2n];
    counts.forEach((c, i) => ledger.append(key(i + 1), null, c, c * 100n, 1_000 + i));

    expect(ledger.length()).toBe(5);
    expect([1, 2, 3, 4].map((i) => ledger.at(i).cumulativeTicketNumber)).toEqual([3n, 4n, 11n, 13n]);
    expect(ledger.totalTickets()).toBe(13n);
    expect(ledger.last().index).toBe(4);
  });

  test("rejects zero tickets, zero amount and the null buyer", () => {
    const ledger = new EntryLedger();
    expect(() => ledger.append(key(1), null, 0n, 100n, 0)).toThrow(JackpotError);
    expect(() => ledger.append(key(1), null, 1n, 0n, 0)).toThrow(/InvalidInput/);
    expect(() => ledger.append(NULL_IDENTITY, null, 1n, 100n, 0)).toThrow(/InvalidInput/);
    expect(ledger.length()).toBe(1);
  });

  test("entries are frozen once appended", () => {
    const ledger = new EntryLedger();
    const entry = ledger.append(key(1), key(2), 5n, 500n, 10);
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Reflect.set(entry, "ticketCount", 1n)).toBe(false);
    expect(ledger.at(1).ticketCount).toBe(5n);
  });

  test("normalizes a null-identity referrer to null", () => {
    const ledger = new EntryLedger();
    const entry = ledger.append(key(1), NULL_IDENTITY, 1n, 100n, 0);
    expect(entry.referrer).toBeNull();
  });

  test("slice and distinctBuyers read the window after a watermark", () => {
    const ledger = new EntryLedger();
    ledger.append(key(1), null, 1n, 100n, 0);
    ledger.append(key(2), null, 1n, 100n, 0);
    ledger.append(key(1), null, 1n, 100n, 0);
    ledger.append(key(3), null, 1n, 100n, 0);

    expect(ledger.slice(2).map((e) => e.index)).toEqual([3, 4]);
    expect(ledger.slice(0, 2).map((e) => e.index)).toEqual([1, 2]);
    expect(ledger.distinctBuyers(0)).toBe(3);
    expect(ledger.distinctBuyers(1)).toBe(3);
    expect(ledger.distinctBuyers(2, 3)).toBe(1);
    expect(ledger.distinctBuyers(4)).toBe(0);
  });

  test("at() rejects out-of-range indices", () => {
    const ledger = new EntryLedger();
    expect(() => ledger.at(1)).toThrow(/out of range/);
  });
});
