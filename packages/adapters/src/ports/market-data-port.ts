/**
 * Market Data Port - Interface for public market data reads
 *
 * - Adapters implement this port for venue-specific REST endpoints
 * - All reads are one-shot; live data goes through LiveStreamPort
 */

import type { ResultAsync } from "neverthrow";
import type { CandlestickInterval, Ms, PriceStr, QtyStr } from "@spot-console/core";

// ─────────────────────────────────────────────────────────────────────────────
// Domain models
// ─────────────────────────────────────────────────────────────────────────────

export interface PriceLevel {
  price: PriceStr;
  quantity: QtyStr;
}

/**
 * Order book depth. Bids are sorted best (highest) first, asks best (lowest) first.
 */
export interface OrderBook {
  symbol: string;
  lastUpdateId: number;
  bids: readonly PriceLevel[];
  asks: readonly PriceLevel[];
}

/**
 * Best bid/ask of a symbol
 */
export interface OrderBookTop {
  symbol: string;
  bidPrice: PriceStr;
  bidQty: QtyStr;
  askPrice: PriceStr;
  askQty: QtyStr;
}

/**
 * Trades that filled at the same time, from the same order, at the same price
 */
export interface AggregateTrade {
  id: number;
  price: PriceStr;
  quantity: QtyStr;
  firstTradeId: number;
  lastTradeId: number;
  time: Ms;
  isBuyerMaker: boolean;
}

export interface Candlestick {
  openTime: Ms;
  open: PriceStr;
  high: PriceStr;
  low: PriceStr;
  close: PriceStr;
  volume: QtyStr;
  closeTime: Ms;
  quoteVolume: QtyStr;
  tradeCount: number;
}

/**
 * Rolling 24h statistics
 */
export interface SymbolStats {
  symbol: string;
  priceChange: PriceStr;
  priceChangePercent: string;
  weightedAvgPrice: PriceStr;
  openPrice: PriceStr;
  highPrice: PriceStr;
  lowPrice: PriceStr;
  lastPrice: PriceStr;
  volume: QtyStr;
  quoteVolume: QtyStr;
  openTime: Ms;
  closeTime: Ms;
  tradeCount: number;
}

export interface SymbolPrice {
  symbol: string;
  price: PriceStr;
}

export interface SymbolInfo {
  symbol: string;
  status: string;
  baseAsset: string;
  quoteAsset: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export interface AggregateTradeQuery {
  symbol: string;
  fromId?: number;
  startTime?: Ms;
  endTime?: Ms;
  limit?: number;
}

export interface CandlestickQuery {
  symbol: string;
  interval: CandlestickInterval;
  startTime?: Ms;
  endTime?: Ms;
  limit?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Venue adapter errors (REST and stream bootstrap)
 */
export type VenueError =
  | { type: "network"; message: string }
  | { type: "timeout"; message: string }
  | { type: "rate_limit"; message: string; status: number; code?: number }
  | { type: "auth"; message: string; status?: number; code?: number }
  | { type: "invalid_request"; message: string; status: number; code?: number }
  | { type: "exchange_error"; message: string; status: number; code?: number }
  | { type: "invalid_response"; message: string }
  | { type: "unknown"; message: string };

// ─────────────────────────────────────────────────────────────────────────────
// Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Market Data Port interface
 *
 * Trades and candlesticks are returned in venue order (oldest first).
 */
export interface MarketDataPort {
  ping(): ResultAsync<void, VenueError>;

  /**
   * Venue server time
   */
  getServerTime(): ResultAsync<Ms, VenueError>;

  get24hStats(symbol: string): ResultAsync<SymbolStats, VenueError>;

  /**
   * Order book with at least `limit` levels per side when the venue has them
   */
  getOrderBook(symbol: string, limit: number): ResultAsync<OrderBook, VenueError>;

  getOrderBookTop(symbol: string): ResultAsync<OrderBookTop, VenueError>;

  /**
   * Best bid/ask for every symbol
   */
  getOrderBookTops(): ResultAsync<OrderBookTop[], VenueError>;

  getAggregateTrades(query: AggregateTradeQuery): ResultAsync<AggregateTrade[], VenueError>;

  getCandlesticks(query: CandlestickQuery): ResultAsync<Candlestick[], VenueError>;

  getSymbols(): ResultAsync<SymbolInfo[], VenueError>;

  getPrices(): ResultAsync<SymbolPrice[], VenueError>;
}
