/**
 * Normalization from spot wire payloads to port models
 */

import type { Side } from "@spot-console/core";
import type { z } from "zod";

import type { AggregateTrade, Candlestick, Order, OrderBook, PriceLevel, SymbolStats } from "../ports";
import type {
  AggTradeSchema,
  DepthSchema,
  KlineEventSchema,
  KlineSchema,
  Ticker24hSchema,
  WireOrder,
} from "./types";

export function toSide(side: "BUY" | "SELL"): Side {
  return side === "BUY" ? "buy" : "sell";
}

export function toPriceLevels(levels: ReadonlyArray<readonly [string, string]>): PriceLevel[] {
  return levels.map(([price, quantity]) => ({ price, quantity }));
}

export function toOrderBook(symbol: string, depth: z.infer<typeof DepthSchema>): OrderBook {
  return {
    symbol,
    lastUpdateId: depth.lastUpdateId,
    bids: toPriceLevels(depth.bids),
    asks: toPriceLevels(depth.asks),
  };
}

export function toAggregateTrade(trade: z.infer<typeof AggTradeSchema>): AggregateTrade {
  return {
    id: trade.a,
    price: trade.p,
    quantity: trade.q,
    firstTradeId: trade.f,
    lastTradeId: trade.l,
    time: trade.T,
    isBuyerMaker: trade.m,
  };
}

export function toCandlestick(kline: z.infer<typeof KlineSchema>): Candlestick {
  const [openTime, open, high, low, close, volume, closeTime, quoteVolume, tradeCount] = kline;
  return { openTime, open, high, low, close, volume, closeTime, quoteVolume, tradeCount };
}

export function toStreamCandlestick(event: z.infer<typeof KlineEventSchema>): Candlestick {
  const k = event.k;
  return {
    openTime: k.t,
    open: k.o,
    high: k.h,
    low: k.l,
    close: k.c,
    volume: k.v,
    closeTime: k.T,
    quoteVolume: k.q,
    tradeCount: k.n,
  };
}

export function toSymbolStats(ticker: z.infer<typeof Ticker24hSchema>): SymbolStats {
  return {
    symbol: ticker.symbol,
    priceChange: ticker.priceChange,
    priceChangePercent: ticker.priceChangePercent,
    weightedAvgPrice: ticker.weightedAvgPrice,
    openPrice: ticker.openPrice,
    highPrice: ticker.highPrice,
    lowPrice: ticker.lowPrice,
    lastPrice: ticker.lastPrice,
    volume: ticker.volume,
    quoteVolume: ticker.quoteVolume,
    openTime: ticker.openTime,
    closeTime: ticker.closeTime,
    tradeCount: ticker.count,
  };
}

export function toOrder(order: WireOrder): Order {
  return {
    symbol: order.symbol,
    orderId: order.orderId,
    clientOrderId: order.clientOrderId,
    side: toSide(order.side),
    type: order.type,
    status: order.status,
    price: order.price,
    stopPrice: order.stopPrice,
    origQty: order.origQty,
    executedQty: order.executedQty,
    time: order.time ?? order.transactTime ?? 0,
  };
}
