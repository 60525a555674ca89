/**
 * Live Stream Port - Interface for push-data stream workers
 *
 * - One `run` call is one live session: it streams until the signal aborts
 * - Each update is a whole, frozen snapshot handed to `emit`
 * - Resolving before the signal aborts, or rejecting, is a stream fault
 */

import type { CandlestickInterval, LiveStreamSpec, Ms, PriceStr, QtyStr, Side } from "@spot-console/core";

import type { Balance } from "./account-port";
import type { AggregateTrade, Candlestick, OrderBook } from "./market-data-port";

/**
 * Order change pushed on the account stream
 */
export interface OrderUpdate {
  symbol: string;
  orderId: number;
  clientOrderId: string;
  side: Side;
  orderType: string;
  status: string;
  executionType: string;
  price: PriceStr;
  quantity: QtyStr;
  lastExecutedPrice: PriceStr;
  lastExecutedQty: QtyStr;
  cumulativeQty: QtyStr;
}

export type AccountEvent =
  | { type: "account"; time: Ms; balances: Balance[] }
  | { type: "balance"; time: Ms; asset: string; delta: QtyStr }
  | { type: "order"; time: Ms; order: OrderUpdate }
  | { type: "trade"; time: Ms; order: OrderUpdate };

/**
 * Kind-specific live state. Trades and candlesticks are kept oldest first.
 */
export type LiveSnapshot =
  | { kind: "orderBook"; symbol: string; book: OrderBook }
  | { kind: "candlesticks"; symbol: string; interval: CandlestickInterval; candles: readonly Candlestick[] }
  | { kind: "trades"; symbol: string; trades: readonly AggregateTrade[] }
  | { kind: "userData"; event: AccountEvent };

export interface LiveStreamContext {
  signal: AbortSignal;
  emit: (snapshot: LiveSnapshot) => void;
}

export interface LiveStreamPort {
  run(spec: LiveStreamSpec, context: LiveStreamContext): Promise<void>;
}
