/**
 * Spot Market Data Adapter
 *
 * - One-shot public REST reads (ping, time, stats, depth, trades, klines, tickers)
 * - Normalization from wire payloads to port models
 */

import type { ResultAsync } from "neverthrow";
import type { Ms } from "@spot-console/core";
import { z } from "zod";

import type {
  AggregateTrade,
  AggregateTradeQuery,
  Candlestick,
  CandlestickQuery,
  MarketDataPort,
  OrderBook,
  OrderBookTop,
  SymbolInfo,
  SymbolPrice,
  SymbolStats,
  VenueError,
} from "../ports";
import { toAggregateTrade, toCandlestick, toOrderBook, toSymbolStats } from "./mappers";
import type { SpotRestClient } from "./rest-client";
import {
  AggTradeSchema,
  BookTickerSchema,
  DepthSchema,
  EmptySchema,
  ExchangeInfoSchema,
  KlineSchema,
  ServerTimeSchema,
  Ticker24hSchema,
  TickerPriceSchema,
} from "./types";

/**
 * Depth limits the venue accepts
 */
export const DEPTH_LIMITS = [5, 10, 20, 50, 100, 500, 1000, 5000] as const;

/**
 * Smallest accepted depth limit that covers `limit`
 */
export function roundDepthLimit(limit: number): number {
  return DEPTH_LIMITS.find(accepted => accepted >= limit) ?? 5000;
}

export class SpotMarketDataAdapter implements MarketDataPort {
  private client: SpotRestClient;

  constructor(client: SpotRestClient) {
    this.client = client;
  }

  ping(): ResultAsync<void, VenueError> {
    return this.client.public("/api/v3/ping", {}, EmptySchema).map(() => undefined);
  }

  getServerTime(): ResultAsync<Ms, VenueError> {
    return this.client.public("/api/v3/time", {}, ServerTimeSchema).map(response => response.serverTime);
  }

  get24hStats(symbol: string): ResultAsync<SymbolStats, VenueError> {
    return this.client.public("/api/v3/ticker/24hr", { symbol }, Ticker24hSchema).map(toSymbolStats);
  }

  getOrderBook(symbol: string, limit: number): ResultAsync<OrderBook, VenueError> {
    return this.client
      .public("/api/v3/depth", { symbol, limit: roundDepthLimit(limit) }, DepthSchema)
      .map(depth => toOrderBook(symbol, depth));
  }

  getOrderBookTop(symbol: string): ResultAsync<OrderBookTop, VenueError> {
    return this.client.public("/api/v3/ticker/bookTicker", { symbol }, BookTickerSchema);
  }

  getOrderBookTops(): ResultAsync<OrderBookTop[], VenueError> {
    return this.client.public("/api/v3/ticker/bookTicker", {}, z.array(BookTickerSchema));
  }

  getAggregateTrades(query: AggregateTradeQuery): ResultAsync<AggregateTrade[], VenueError> {
    return this.client
      .public(
        "/api/v3/aggTrades",
        {
          symbol: query.symbol,
          fromId: query.fromId,
          startTime: query.startTime,
          endTime: query.endTime,
          limit: query.limit,
        },
        z.array(AggTradeSchema),
      )
      .map(trades => trades.map(toAggregateTrade));
  }

  getCandlesticks(query: CandlestickQuery): ResultAsync<Candlestick[], VenueError> {
    return this.client
      .public(
        "/api/v3/klines",
        {
          symbol: query.symbol,
          interval: query.interval,
          startTime: query.startTime,
          endTime: query.endTime,
          limit: query.limit,
        },
        z.array(KlineSchema),
      )
      .map(klines => klines.map(toCandlestick));
  }

  getSymbols(): ResultAsync<SymbolInfo[], VenueError> {
    return this.client.public("/api/v3/exchangeInfo", {}, ExchangeInfoSchema).map(info => info.symbols);
  }

  getPrices(): ResultAsync<SymbolPrice[], VenueError> {
    return this.client.public("/api/v3/ticker/price", {}, z.array(TickerPriceSchema));
  }
}
