/**
 * LocalOrderBook - order book kept in sync from a depth snapshot plus diffs
 *
 * Sync rules (update ids):
 * - diffs whose final id is at or below the book's id are stale and dropped
 * - the first diff after a snapshot must straddle `lastUpdateId + 1`
 * - every later diff must start at the previous final id + 1
 * - anything else is a gap: the caller reloads a snapshot
 * - a level with zero quantity is removed
 */

import { tryParseDecimal } from "@spot-console/core";
import Decimal from "decimal.js";

import type { OrderBook, PriceLevel } from "../ports";

export interface DepthDiff {
  firstUpdateId: number;
  finalUpdateId: number;
  bids: readonly PriceLevel[];
  asks: readonly PriceLevel[];
}

export type ApplyOutcome = "applied" | "stale" | "gap";

const DEFAULT_MAX_LEVELS = 1000;

function isPositive(quantity: string): boolean {
  return tryParseDecimal(quantity)?.gt(0) ?? false;
}

export class LocalOrderBook {
  readonly symbol: string;
  private maxLevels: number;
  private bids = new Map<string, string>();
  private asks = new Map<string, string>();
  private lastUpdateId: number | null = null;
  private synced = false;

  constructor(symbol: string, maxLevels: number = DEFAULT_MAX_LEVELS) {
    this.symbol = symbol;
    this.maxLevels = maxLevels;
  }

  /**
   * Update id of the last snapshot or applied diff; null before the first snapshot
   */
  get updateId(): number | null {
    return this.lastUpdateId;
  }

  loadSnapshot(book: OrderBook): void {
    this.bids.clear();
    this.asks.clear();
    this.upsert(this.bids, book.bids);
    this.upsert(this.asks, book.asks);
    this.lastUpdateId = book.lastUpdateId;
    this.synced = false;
  }

  apply(diff: DepthDiff): ApplyOutcome {
    if (this.lastUpdateId === null) return "gap";
    if (diff.finalUpdateId <= this.lastUpdateId) return "stale";

    const expected = this.lastUpdateId + 1;
    if (this.synced ? diff.firstUpdateId !== expected : diff.firstUpdateId > expected) {
      return "gap";
    }

    this.upsert(this.bids, diff.bids);
    this.upsert(this.asks, diff.asks);
    this.prune(this.bids, "bids");
    this.prune(this.asks, "asks");
    this.lastUpdateId = diff.finalUpdateId;
    this.synced = true;
    return "applied";
  }

  /**
   * Frozen copy, bids best first and asks best first
   */
  toOrderBook(): OrderBook {
    return Object.freeze({
      symbol: this.symbol,
      lastUpdateId: this.lastUpdateId ?? 0,
      bids: Object.freeze(this.sorted(this.bids, "bids")),
      asks: Object.freeze(this.sorted(this.asks, "asks")),
    });
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private upsert(side: Map<string, string>, levels: readonly PriceLevel[]): void {
    for (const level of levels) {
      if (tryParseDecimal(level.price) === undefined) continue;
      if (isPositive(level.quantity)) {
        side.set(level.price, level.quantity);
      } else {
        side.delete(level.price);
      }
    }
  }

  private sorted(side: Map<string, string>, which: "bids" | "asks"): PriceLevel[] {
    return Array.from(side, ([price, quantity]) => ({ price, quantity, d: new Decimal(price) }))
      .sort((a, b) => (which === "bids" ? b.d.comparedTo(a.d) : a.d.comparedTo(b.d)))
      .map(({ price, quantity }) => ({ price, quantity }));
  }

  // Keep memory bounded: retain the best N levels by price.
  private prune(side: Map<string, string>, which: "bids" | "asks"): void {
    if (side.size <= this.maxLevels) return;
    const keep = new Set(this.sorted(side, which).slice(0, this.maxLevels).map(level => level.price));
    for (const price of side.keys()) {
      if (!keep.has(price)) side.delete(price);
    }
  }
}
