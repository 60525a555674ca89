/**
 * Spot Venue Types
 *
 * Configuration schema and wire schemas for a Binance-compatible spot API.
 * Wire payloads are validated here and normalized to port models by the adapters.
 */

import { z } from "zod";

/**
 * Spot venue configuration schema
 */
export const SpotConfigSchema = z.object({
  /**
   * REST base URL (e.g., https://api.binance.com)
   */
  restUrl: z.url().default("https://api.binance.com"),

  /**
   * WebSocket base URL (e.g., wss://stream.binance.com:9443)
   */
  streamUrl: z.url().default("wss://stream.binance.com:9443"),

  /**
   * API key (X-MBX-APIKEY header). Account features need both key and secret.
   */
  apiKey: z.string().min(1).optional(),

  /**
   * API secret used to sign requests
   */
  apiSecret: z.string().min(1).optional(),

  recvWindowMs: z.coerce.number().int().positive().max(60_000).default(5_000),

  requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
});

export type SpotConfig = z.infer<typeof SpotConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// REST payloads
// ─────────────────────────────────────────────────────────────────────────────

export const VenueErrorBodySchema = z.object({
  code: z.number(),
  msg: z.string(),
});

export const EmptySchema = z.object({});

export const ServerTimeSchema = z.object({ serverTime: z.number() });

export const Ticker24hSchema = z.object({
  symbol: z.string(),
  priceChange: z.string(),
  priceChangePercent: z.string(),
  weightedAvgPrice: z.string(),
  openPrice: z.string(),
  highPrice: z.string(),
  lowPrice: z.string(),
  lastPrice: z.string(),
  volume: z.string(),
  quoteVolume: z.string(),
  openTime: z.number(),
  closeTime: z.number(),
  count: z.number(),
});

const LevelSchema = z.tuple([z.string(), z.string()]);

export const DepthSchema = z.object({
  lastUpdateId: z.number(),
  bids: z.array(LevelSchema),
  asks: z.array(LevelSchema),
});

export const BookTickerSchema = z.object({
  symbol: z.string(),
  bidPrice: z.string(),
  bidQty: z.string(),
  askPrice: z.string(),
  askQty: z.string(),
});

export const AggTradeSchema = z.object({
  a: z.number(),
  p: z.string(),
  q: z.string(),
  f: z.number(),
  l: z.number(),
  T: z.number(),
  m: z.boolean(),
});

/**
 * [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, ...]
 */
export const KlineSchema = z.tuple(
  [z.number(), z.string(), z.string(), z.string(), z.string(), z.string(), z.number(), z.string(), z.number()],
  z.unknown(),
);

export const ExchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      status: z.string(),
      baseAsset: z.string(),
      quoteAsset: z.string(),
    }),
  ),
});

export const TickerPriceSchema = z.object({
  symbol: z.string(),
  price: z.string(),
});

export const VenueSideSchema = z.enum(["BUY", "SELL"]);

export const OrderSchema = z.object({
  symbol: z.string(),
  orderId: z.number(),
  clientOrderId: z.string(),
  price: z.string(),
  origQty: z.string(),
  executedQty: z.string(),
  status: z.string(),
  type: z.string(),
  side: VenueSideSchema,
  stopPrice: z.string().optional(),
  time: z.number().optional(),
  transactTime: z.number().optional(),
});

export type WireOrder = z.infer<typeof OrderSchema>;

export const AccountSchema = z.object({
  canTrade: z.boolean(),
  canWithdraw: z.boolean(),
  canDeposit: z.boolean(),
  updateTime: z.number(),
  balances: z.array(
    z.object({
      asset: z.string(),
      free: z.string(),
      locked: z.string(),
    }),
  ),
});

export const MyTradeSchema = z.object({
  id: z.number(),
  symbol: z.string(),
  orderId: z.number(),
  price: z.string(),
  qty: z.string(),
  commission: z.string(),
  commissionAsset: z.string(),
  time: z.number(),
  isBuyer: z.boolean(),
  isMaker: z.boolean(),
});

export const DepositSchema = z.object({
  coin: z.string(),
  amount: z.string(),
  address: z.string(),
  txId: z.string(),
  status: z.number(),
  insertTime: z.number(),
});

export const WithdrawalSchema = z.object({
  id: z.string(),
  coin: z.string(),
  amount: z.string(),
  address: z.string(),
  txId: z.string().optional(),
  status: z.number(),
  applyTime: z.string(),
});

export const WithdrawReceiptSchema = z.object({ id: z.string() });

export const ListenKeySchema = z.object({ listenKey: z.string() });

// ─────────────────────────────────────────────────────────────────────────────
// Stream payloads
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Diff depth event: `U` first and `u` final update id in the event
 */
export const DepthUpdateEventSchema = z.object({
  e: z.literal("depthUpdate"),
  E: z.number(),
  s: z.string(),
  U: z.number(),
  u: z.number(),
  b: z.array(LevelSchema),
  a: z.array(LevelSchema),
});

export const KlineEventSchema = z.object({
  e: z.literal("kline"),
  E: z.number(),
  s: z.string(),
  k: z.object({
    t: z.number(),
    T: z.number(),
    i: z.string(),
    o: z.string(),
    c: z.string(),
    h: z.string(),
    l: z.string(),
    v: z.string(),
    n: z.number(),
    x: z.boolean(),
    q: z.string(),
  }),
});

export const AggTradeEventSchema = AggTradeSchema.extend({
  e: z.literal("aggTrade"),
  E: z.number(),
  s: z.string(),
});

export const UserDataEventSchema = z.discriminatedUnion("e", [
  z.object({
    e: z.literal("outboundAccountPosition"),
    E: z.number(),
    B: z.array(z.object({ a: z.string(), f: z.string(), l: z.string() })),
  }),
  z.object({
    e: z.literal("balanceUpdate"),
    E: z.number(),
    a: z.string(),
    d: z.string(),
  }),
  z.object({
    e: z.literal("executionReport"),
    E: z.number(),
    s: z.string(),
    c: z.string(),
    S: VenueSideSchema,
    o: z.string(),
    X: z.string(),
    x: z.string(),
    i: z.number(),
    p: z.string(),
    q: z.string(),
    l: z.string(),
    L: z.string(),
    z: z.string(),
  }),
]);

export type UserDataEvent = z.infer<typeof UserDataEventSchema>;
