/**
 * Query Resolver
 *
 * - Serves book/top/trades/candlestick reads from the live session when it
 *   exactly matches the request
 * - Otherwise performs one remote fetch; no retries, errors propagate
 */

import { okAsync, type ResultAsync } from "neverthrow";
import type { CandlestickInterval, QueryRequest } from "@spot-console/core";
import { streamKindFor } from "@spot-console/core";
import type {
  AggregateTrade,
  Candlestick,
  LiveSnapshot,
  MarketDataPort,
  OrderBook,
  OrderBookTop,
  VenueError,
} from "@spot-console/adapters";
import { logger } from "@spot-console/utils";

import type { LiveSessionManager } from "./live-session-manager";

const log = logger;

export type QuerySource = "cache" | "remote";

export type QueryResult =
  | { family: "orderBook"; source: QuerySource; book: OrderBook }
  | { family: "top"; source: QuerySource; top: OrderBookTop }
  | { family: "trades"; source: QuerySource; symbol: string; trades: AggregateTrade[] }
  | {
      family: "candlesticks";
      source: QuerySource;
      symbol: string;
      interval: CandlestickInterval;
      candles: Candlestick[];
    };

/**
 * The part of the session manager the resolver reads from
 */
export type SnapshotSource = Pick<LiveSessionManager, "snapshotFor">;

// ─────────────────────────────────────────────────────────────────────────────
// Shaping (shared by cache and remote paths)
// ─────────────────────────────────────────────────────────────────────────────

export function truncateBook(book: OrderBook, limit: number): OrderBook {
  return {
    symbol: book.symbol,
    lastUpdateId: book.lastUpdateId,
    bids: book.bids.slice(0, limit),
    asks: book.asks.slice(0, limit),
  };
}

/**
 * Best bid/ask of a book; undefined when either side is empty
 */
export function topOfBook(book: OrderBook): OrderBookTop | undefined {
  const bid = book.bids[0];
  const ask = book.asks[0];
  if (!bid || !ask) return undefined;
  return {
    symbol: book.symbol,
    bidPrice: bid.price,
    bidQty: bid.quantity,
    askPrice: ask.price,
    askQty: ask.quantity,
  };
}

/**
 * Newest `limit` trades, newest first, from an oldest-first list
 */
export function newestTrades(trades: readonly AggregateTrade[], limit: number): AggregateTrade[] {
  return trades.slice(-limit).reverse();
}

/**
 * Last `limit` candles, oldest first
 */
export function lastCandles(candles: readonly Candlestick[], limit: number): Candlestick[] {
  return candles.slice(-limit);
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolver
// ─────────────────────────────────────────────────────────────────────────────

export class QueryResolver {
  private readonly sessions: SnapshotSource;
  private readonly marketData: MarketDataPort;

  constructor(sessions: SnapshotSource, marketData: MarketDataPort) {
    this.sessions = sessions;
    this.marketData = marketData;
  }

  resolve(request: QueryRequest): ResultAsync<QueryResult, VenueError> {
    const cached = this.fromCache(request);
    if (cached) {
      log.debug("Query served from live cache", { family: request.family, symbol: request.symbol });
      return okAsync(cached);
    }
    return this.fromRemote(request);
  }

  private fromCache(request: QueryRequest): QueryResult | undefined {
    const interval = request.family === "candlesticks" ? request.interval : undefined;
    const snapshot: LiveSnapshot | undefined = this.sessions.snapshotFor(
      streamKindFor(request.family),
      request.symbol,
      interval,
    );
    if (!snapshot) return undefined;

    switch (request.family) {
      case "orderBook":
        return snapshot.kind === "orderBook" ?
            { family: "orderBook", source: "cache", book: truncateBook(snapshot.book, request.limit) }
          : undefined;
      case "top": {
        if (snapshot.kind !== "orderBook") return undefined;
        const top = topOfBook(snapshot.book);
        return top ? { family: "top", source: "cache", top } : undefined;
      }
      case "trades":
        return snapshot.kind === "trades" ?
            {
              family: "trades",
              source: "cache",
              symbol: request.symbol,
              trades: newestTrades(snapshot.trades, request.limit),
            }
          : undefined;
      case "candlesticks":
        return snapshot.kind === "candlesticks" ?
            {
              family: "candlesticks",
              source: "cache",
              symbol: request.symbol,
              interval: request.interval,
              candles: lastCandles(snapshot.candles, request.limit),
            }
          : undefined;
    }
  }

  private fromRemote(request: QueryRequest): ResultAsync<QueryResult, VenueError> {
    switch (request.family) {
      case "orderBook":
        return this.marketData
          .getOrderBook(request.symbol, request.limit)
          .map((book): QueryResult => ({ family: "orderBook", source: "remote", book: truncateBook(book, request.limit) }));
      case "top":
        return this.marketData
          .getOrderBookTop(request.symbol)
          .map((top): QueryResult => ({ family: "top", source: "remote", top }));
      case "trades":
        return this.marketData.getAggregateTrades({ symbol: request.symbol, limit: request.limit }).map(
          (trades): QueryResult => ({
            family: "trades",
            source: "remote",
            symbol: request.symbol,
            trades: newestTrades(trades, request.limit),
          }),
        );
      case "candlesticks":
        return this.marketData
          .getCandlesticks({ symbol: request.symbol, interval: request.interval, limit: request.limit })
          .map(
            (candles): QueryResult => ({
              family: "candlesticks",
              source: "remote",
              symbol: request.symbol,
              interval: request.interval,
              candles: lastCandles(candles, request.limit),
            }),
          );
    }
  }
}
