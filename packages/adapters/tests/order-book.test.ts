/**
 * LocalOrderBook Unit Tests
 *
 * - Snapshot + diff sync by update id
 * - Stale / gap detection
 * - Level removal, ordering and pruning
 */

import { describe, expect, test } from "vitest";

import type { OrderBook } from "../src/ports";
import { LocalOrderBook, type DepthDiff } from "../src/spot/order-book";

// ─────────────────────────────────────────────────────────────────────────────
// Test Fixtures
// ─────────────────────────────────────────────────────────────────────────────

const snapshot: OrderBook = {
  symbol: "BTCUSDT",
  lastUpdateId: 100,
  bids: [
    { price: "100", quantity: "1" },
    { price: "99", quantity: "2" },
  ],
  asks: [
    { price: "101", quantity: "1" },
    { price: "102", quantity: "3" },
  ],
};

function diff(firstUpdateId: number, finalUpdateId: number, partial: Partial<DepthDiff> = {}): DepthDiff {
  return { firstUpdateId, finalUpdateId, bids: [], asks: [], ...partial };
}

function loadedBook(maxLevels?: number): LocalOrderBook {
  const book = new LocalOrderBook("BTCUSDT", maxLevels);
  book.loadSnapshot(snapshot);
  return book;
}

describe("LocalOrderBook", () => {
  describe("sync", () => {
    test("should report a gap before the first snapshot", () => {
      const book = new LocalOrderBook("BTCUSDT");
      expect(book.apply(diff(1, 2))).toBe("gap");
      expect(book.updateId).toBeNull();
    });

    test("should drop diffs already covered by the snapshot", () => {
      const book = loadedBook();
      expect(book.apply(diff(90, 100))).toBe("stale");
      expect(book.updateId).toBe(100);
    });

    test("should apply a first diff that straddles the snapshot id", () => {
      const book = loadedBook();
      expect(book.apply(diff(99, 101, { bids: [{ price: "100", quantity: "0" }] }))).toBe("applied");
      expect(book.updateId).toBe(101);
      expect(book.toOrderBook().bids).toEqual([{ price: "99", quantity: "2" }]);
    });

    test("should report a gap when the first diff starts after the snapshot", () => {
      const book = loadedBook();
      expect(book.apply(diff(102, 103))).toBe("gap");
    });

    test("should require later diffs to be contiguous", () => {
      const book = loadedBook();
      book.apply(diff(99, 101));
      expect(book.apply(diff(103, 104))).toBe("gap");
      expect(book.apply(diff(102, 104))).toBe("applied");
      expect(book.updateId).toBe(104);
    });

    test("should accept a straddling diff again after a reload", () => {
      const book = loadedBook();
      book.apply(diff(99, 101));
      book.loadSnapshot({ ...snapshot, lastUpdateId: 200 });
      expect(book.apply(diff(195, 205))).toBe("applied");
    });
  });

  describe("levels", () => {
    test("should keep bids descending and asks ascending", () => {
      const book = loadedBook();
      book.apply(
        diff(101, 101, {
          bids: [{ price: "100.5", quantity: "4" }],
          asks: [{ price: "100.8", quantity: "5" }],
        }),
      );

      const result = book.toOrderBook();
      expect(result.bids.map(level => level.price)).toEqual(["100.5", "100", "99"]);
      expect(result.asks.map(level => level.price)).toEqual(["100.8", "101", "102"]);
    });

    test("should replace the quantity of an existing level", () => {
      const book = loadedBook();
      book.apply(diff(101, 101, { asks: [{ price: "101", quantity: "7.5" }] }));
      expect(book.toOrderBook().asks[0]).toEqual({ price: "101", quantity: "7.5" });
    });

    test("should retain only the best levels when pruning", () => {
      const book = loadedBook(2);
      book.apply(diff(101, 101, { bids: [{ price: "98", quantity: "1" }] }));
      expect(book.toOrderBook().bids.map(level => level.price)).toEqual(["100", "99"]);
    });

    test("should remove a level whose quantity is a padded zero", () => {
      const book = loadedBook();
      book.apply(diff(101, 101, { asks: [{ price: "101", quantity: "0.00000000" }] }));
      expect(book.toOrderBook().asks).toEqual([{ price: "102", quantity: "3" }]);
    });

    test("should order prices that differ beyond float precision", () => {
      const book = loadedBook();
      book.apply(
        diff(101, 101, {
          bids: [
            { price: "100.0000000000000001", quantity: "1" },
            { price: "100.0000000000000002", quantity: "1" },
          ],
        }),
      );
      expect(book.toOrderBook().bids.map(level => level.price)).toEqual([
        "100.0000000000000002",
        "100.0000000000000001",
        "100",
        "99",
      ]);
    });

    test("should ignore a level with an unparsable price", () => {
      const book = loadedBook();
      book.apply(diff(101, 101, { bids: [{ price: "n/a", quantity: "1" }] }));
      expect(book.toOrderBook().bids.map(level => level.price)).toEqual(["100", "99"]);
    });

    test("should hand out frozen copies", () => {
      const result = loadedBook().toOrderBook();
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.bids)).toBe(true);
      expect(result.lastUpdateId).toBe(100);
    });
  });
});
