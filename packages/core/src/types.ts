/**
 * Core Domain Types
 *
 * Pure type definitions shared by the console, the session layer and the adapters.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Price as string to avoid floating point issues */
export type PriceStr = string;

/** Quantity as string to avoid floating point issues */
export type QtyStr = string;

/** Epoch milliseconds */
export type Ms = number;

/** Side of an order */
export type Side = "buy" | "sell";

// ─────────────────────────────────────────────────────────────────────────────
// Streams
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The four live push-data streams. Exactly one may be active at a time.
 */
export type StreamKind = "orderBook" | "candlesticks" | "trades" | "userData";

export const STREAM_KINDS: readonly StreamKind[] = ["orderBook", "candlesticks", "trades", "userData"] as const;

export const CANDLESTICK_INTERVALS = [
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "6h",
  "8h",
  "12h",
  "1d",
  "3d",
  "1w",
  "1M",
] as const;

export type CandlestickInterval = (typeof CANDLESTICK_INTERVALS)[number];

/**
 * What to stream: kind plus the parameters that identify its cache.
 * `userData` is account-wide and carries no symbol.
 */
export type LiveStreamSpec =
  | { kind: "orderBook"; symbol: string }
  | { kind: "candlesticks"; symbol: string; interval: CandlestickInterval }
  | { kind: "trades"; symbol: string }
  | { kind: "userData" };

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A read that may be answered from a live cache.
 */
export type QueryRequest =
  | { family: "orderBook"; symbol: string; limit: number }
  | { family: "top"; symbol: string }
  | { family: "trades"; symbol: string; limit: number }
  | { family: "candlesticks"; symbol: string; interval: CandlestickInterval; limit: number };

export type QueryFamily = QueryRequest["family"];

// ─────────────────────────────────────────────────────────────────────────────
// Orders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Order as entered by the operator, handed unmodified to the account port.
 */
export interface OrderIntent {
  type: "market" | "limit";
  side: Side;
  symbol: string;
  quantity: QtyStr;
  price?: PriceStr;
  stopPrice?: PriceStr;
  isTestOnly: boolean;
}

/** Exchange order id or client order id. */
export type OrderRef = { orderId: number } | { clientOrderId: string };
