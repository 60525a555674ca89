/**
 * Spot Live Streams
 *
 * Implements LiveStreamPort with one worker per stream kind:
 * - order book: REST snapshot + diff events, resync on update-id gap
 * - candlesticks: REST seed, then replace/append per kline event
 * - trades: REST seed, then append per aggregate trade
 * - account: listen key lifecycle + user data events
 *
 * A worker returns once its signal aborts. Any other ending is a fault:
 * it throws, including when the server closes the stream.
 */

import type { CandlestickInterval, LiveStreamSpec } from "@spot-console/core";
import { logger } from "@spot-console/utils";

import type {
  AccountEvent,
  AccountPort,
  AggregateTrade,
  Candlestick,
  LiveStreamContext,
  LiveStreamPort,
  MarketDataPort,
  VenueError,
} from "../ports";
import { toAggregateTrade, toPriceLevels, toSide, toStreamCandlestick } from "./mappers";
import { LocalOrderBook } from "./order-book";
import { AggTradeEventSchema, DepthUpdateEventSchema, KlineEventSchema, UserDataEventSchema, type UserDataEvent } from "./types";
import { defaultConnectionFactory, SpotStreamPaths, type WsConnectionFactory } from "./ws-connection";

const log = logger;

const USER_AGENT = "spot-console/0.1";

/** Depth of the REST snapshot the local book is built from */
export const SNAPSHOT_DEPTH = 1000;

/** Candlesticks and trades kept per session */
export const MAX_HISTORY = 500;

const LISTEN_KEY_KEEPALIVE_MS = 30 * 60 * 1000;

export interface SpotLiveStreamsOptions {
  streamUrl: string;
  marketData: MarketDataPort;

  /**
   * Required for the account stream only
   */
  account?: AccountPort;

  /**
   * Optional factory for creating WebSocket connections (for testing)
   */
  connectionFactory?: WsConnectionFactory;

  keepAliveIntervalMs?: number;
}

/**
 * Thrown inside a worker when a REST bootstrap call fails
 */
export class StreamBootstrapError extends Error {
  readonly venueError: VenueError;

  constructor(step: string, venueError: VenueError) {
    super(`${step} failed: ${venueError.message}`);
    this.name = "StreamBootstrapError";
    this.venueError = venueError;
  }
}

function bounded<T>(items: readonly T[], max: number): readonly T[] {
  return Object.freeze(items.length > max ? items.slice(items.length - max) : items.slice());
}

/**
 * Merge a streamed candle into the list: same open time replaces, newer appends
 */
export function mergeCandle(candles: readonly Candlestick[], candle: Candlestick, max: number = MAX_HISTORY): readonly Candlestick[] {
  const last = candles[candles.length - 1];
  if (last !== undefined && last.openTime === candle.openTime) {
    return bounded([...candles.slice(0, -1), candle], max);
  }
  if (last !== undefined && candle.openTime < last.openTime) {
    return candles;
  }
  return bounded([...candles, candle], max);
}

/**
 * Settles with `work`, or with `undefined` once the signal aborts. Abandoned
 * work keeps running and its outcome is dropped.
 */
export function untilAborted<T>(work: PromiseLike<T>, signal: AbortSignal): Promise<T | undefined> {
  return new Promise<T | undefined>((resolve, reject) => {
    const onAbort = (): void => {
      resolve(undefined);
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    void work.then(
      value => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export function toAccountEvent(event: UserDataEvent): AccountEvent {
  switch (event.e) {
    case "outboundAccountPosition":
      return {
        type: "account",
        time: event.E,
        balances: event.B.map(balance => ({ asset: balance.a, free: balance.f, locked: balance.l })),
      };
    case "balanceUpdate":
      return { type: "balance", time: event.E, asset: event.a, delta: event.d };
    case "executionReport":
      return {
        type: event.x === "TRADE" ? "trade" : "order",
        time: event.E,
        order: {
          symbol: event.s,
          orderId: event.i,
          clientOrderId: event.c,
          side: toSide(event.S),
          orderType: event.o,
          status: event.X,
          executionType: event.x,
          price: event.p,
          quantity: event.q,
          lastExecutedPrice: event.L,
          lastExecutedQty: event.l,
          cumulativeQty: event.z,
        },
      };
  }
}

export class SpotLiveStreams implements LiveStreamPort {
  private streamUrl: string;
  private marketData: MarketDataPort;
  private account: AccountPort | undefined;
  private connectionFactory: WsConnectionFactory;
  private keepAliveIntervalMs: number;

  constructor(options: SpotLiveStreamsOptions) {
    this.streamUrl = options.streamUrl.replace(/\/+$/, "");
    this.marketData = options.marketData;
    this.account = options.account;
    this.connectionFactory = options.connectionFactory ?? defaultConnectionFactory;
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? LISTEN_KEY_KEEPALIVE_MS;
  }

  run(spec: LiveStreamSpec, context: LiveStreamContext): Promise<void> {
    switch (spec.kind) {
      case "orderBook":
        return this.runOrderBook(spec.symbol, context);
      case "candlesticks":
        return this.runCandlesticks(spec.symbol, spec.interval, context);
      case "trades":
        return this.runTrades(spec.symbol, context);
      case "userData":
        return this.runUserData(context);
    }
  }

  // ============================================================================
  // Workers
  // ============================================================================

  private async runOrderBook(symbol: string, context: LiveStreamContext): Promise<void> {
    const book = new LocalOrderBook(symbol);

    const loadSnapshot = async (): Promise<void> => {
      const result = await this.marketData.getOrderBook(symbol, SNAPSHOT_DEPTH);
      if (result.isErr()) throw new StreamBootstrapError("Order book snapshot", result.error);
      book.loadSnapshot(result.value);
    };

    // Diffs queue in the connection while the snapshot loads.
    await this.consume(SpotStreamPaths.depth(symbol), `depth:${symbol}`, context, loadSnapshot, async message => {
      const parsed = DepthUpdateEventSchema.safeParse(message);
      if (!parsed.success) return;

      const diff = {
        firstUpdateId: parsed.data.U,
        finalUpdateId: parsed.data.u,
        bids: toPriceLevels(parsed.data.b),
        asks: toPriceLevels(parsed.data.a),
      };

      let outcome = book.apply(diff);
      if (outcome === "gap") {
        log.warn("Order book update gap, resyncing", {
          symbol,
          expected: (book.updateId ?? 0) + 1,
          actual: diff.firstUpdateId,
        });
        await loadSnapshot();
        outcome = book.apply(diff);
      }

      if (outcome === "applied") {
        context.emit({ kind: "orderBook", symbol, book: book.toOrderBook() });
      }
    });
  }

  private async runCandlesticks(
    symbol: string,
    interval: CandlestickInterval,
    context: LiveStreamContext,
  ): Promise<void> {
    let candles: readonly Candlestick[] = [];

    const seed = async (): Promise<void> => {
      const result = await this.marketData.getCandlesticks({ symbol, interval, limit: MAX_HISTORY });
      if (result.isErr()) throw new StreamBootstrapError("Candlestick seed", result.error);
      candles = bounded(result.value, MAX_HISTORY);
    };

    await this.consume(SpotStreamPaths.kline(symbol, interval), `kline:${symbol}:${interval}`, context, seed, message => {
      const parsed = KlineEventSchema.safeParse(message);
      if (!parsed.success) return;

      candles = mergeCandle(candles, toStreamCandlestick(parsed.data));
      context.emit({ kind: "candlesticks", symbol, interval, candles });
    });
  }

  private async runTrades(symbol: string, context: LiveStreamContext): Promise<void> {
    let trades: readonly AggregateTrade[] = [];

    const seed = async (): Promise<void> => {
      const result = await this.marketData.getAggregateTrades({ symbol, limit: MAX_HISTORY });
      if (result.isErr()) throw new StreamBootstrapError("Trade seed", result.error);
      trades = bounded(result.value, MAX_HISTORY);
    };

    await this.consume(SpotStreamPaths.aggTrade(symbol), `trades:${symbol}`, context, seed, message => {
      const parsed = AggTradeEventSchema.safeParse(message);
      if (!parsed.success) return;

      const trade = toAggregateTrade(parsed.data);
      const last = trades[trades.length - 1];
      if (last !== undefined && trade.id <= last.id) return;

      trades = bounded([...trades, trade], MAX_HISTORY);
      context.emit({ kind: "trades", symbol, trades });
    });
  }

  private async runUserData(context: LiveStreamContext): Promise<void> {
    const account = this.account;
    if (!account) {
      throw new Error("API credentials are required for the account stream");
    }

    const opening = account.openUserStream();
    const opened = await untilAborted(opening, context.signal);
    if (opened === undefined) {
      // Stopped while the key was requested; release it once it arrives.
      void opening.then(async late => {
        if (late.isErr()) return;
        const closed = await account.closeUserStream(late.value);
        if (closed.isErr()) log.warn("Listen key close failed", { type: closed.error.type, message: closed.error.message });
      });
      return;
    }
    if (opened.isErr()) throw new StreamBootstrapError("Listen key request", opened.error);
    const listenKey = opened.value;

    const keepAlive = setInterval(() => {
      void account.keepAliveUserStream(listenKey).then(result => {
        if (result.isErr()) log.warn("Listen key keepalive failed", { type: result.error.type, message: result.error.message });
      });
    }, this.keepAliveIntervalMs);

    try {
      await this.consume(SpotStreamPaths.userData(listenKey), "account", context, undefined, message => {
        const parsed = UserDataEventSchema.safeParse(message);
        if (!parsed.success) return;
        context.emit({ kind: "userData", event: toAccountEvent(parsed.data) });
      });
    } finally {
      clearInterval(keepAlive);
      const closed = await account.closeUserStream(listenKey);
      if (closed.isErr()) {
        log.warn("Listen key close failed", { type: closed.error.type, message: closed.error.message });
      }
    }
  }

  // ============================================================================
  // Stream plumbing
  // ============================================================================

  /**
   * Connect, run `prepare`, then hand each message to `handle` until the signal aborts.
   */
  private async consume(
    path: string,
    label: string,
    context: LiveStreamContext,
    prepare: (() => Promise<void>) | undefined,
    handle: (message: unknown) => Promise<void> | void,
  ): Promise<void> {
    const { signal } = context;
    if (signal.aborted) return;

    const connection = this.connectionFactory(`${this.streamUrl}${path}`, { "User-Agent": USER_AGENT }, label);
    const onAbort = (): void => {
      void connection.close();
    };
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      await connection.connect();
      if (prepare) await untilAborted(prepare(), signal);
      if (signal.aborted) return;
      log.info("Live stream started", { stream: label });

      for await (const message of connection) {
        if (signal.aborted) break;
        await untilAborted(Promise.resolve(handle(message)), signal);
      }
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    } finally {
      signal.removeEventListener("abort", onAbort);
      await connection.close();
    }

    if (!signal.aborted) {
      throw new Error(`Stream ${label} closed by the server`);
    }
  }
}
