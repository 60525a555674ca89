/**
 * Port interfaces for adapters
 *
 * - Defines venue-agnostic interfaces
 * - Adapters implement these ports
 */

export type {
  AggregateTrade,
  AggregateTradeQuery,
  Candlestick,
  CandlestickQuery,
  MarketDataPort,
  OrderBook,
  OrderBookTop,
  PriceLevel,
  SymbolInfo,
  SymbolPrice,
  SymbolStats,
  VenueError,
} from "./market-data-port";

export type {
  AccountInfo,
  AccountPort,
  AccountTrade,
  Balance,
  Deposit,
  Order,
  PlacedOrder,
  Withdrawal,
  WithdrawRequest,
} from "./account-port";

export type { AccountEvent, LiveSnapshot, LiveStreamContext, LiveStreamPort, OrderUpdate } from "./live-stream-port";
