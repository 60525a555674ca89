/**
 * In-process stand-ins for the WebSocket connection and the REST ports
 */

import { errAsync, type ResultAsync } from "neverthrow";

import type { AccountPort, MarketDataPort, VenueError } from "../../src/ports";
import type { IWsConnection } from "../../src/spot/ws-connection";

export class FakeWsConnection implements IWsConnection {
  connectCalls = 0;
  private queue: unknown[] = [];
  private waiting: ((result: IteratorResult<unknown>) => void) | null = null;
  private closed = true;

  async connect(): Promise<void> {
    this.connectCalls++;
    this.closed = false;
  }

  async close(): Promise<void> {
    this.finish();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Deliver a message as if the server sent it
   */
  push(message: unknown): void {
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  /**
   * Simulate the server closing the stream
   */
  end(): void {
    this.finish();
  }

  [Symbol.asyncIterator](): AsyncIterator<unknown> {
    return {
      next: (): Promise<IteratorResult<unknown>> => {
        if (this.queue.length > 0) {
          return Promise.resolve({ value: this.queue.shift(), done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => {
          this.waiting = resolve;
        });
      },
      return: async (): Promise<IteratorResult<unknown>> => {
        this.finish();
        return { value: undefined, done: true };
      },
    };
  }

  private finish(): void {
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }
}

const notStubbed = <T>(name: string): ResultAsync<T, VenueError> =>
  errAsync({ type: "unknown", message: `${name} not stubbed` });

export function createFakeMarketData(overrides: Partial<MarketDataPort> = {}): MarketDataPort {
  return {
    ping: () => notStubbed("ping"),
    getServerTime: () => notStubbed("getServerTime"),
    get24hStats: () => notStubbed("get24hStats"),
    getOrderBook: () => notStubbed("getOrderBook"),
    getOrderBookTop: () => notStubbed("getOrderBookTop"),
    getOrderBookTops: () => notStubbed("getOrderBookTops"),
    getAggregateTrades: () => notStubbed("getAggregateTrades"),
    getCandlesticks: () => notStubbed("getCandlesticks"),
    getSymbols: () => notStubbed("getSymbols"),
    getPrices: () => notStubbed("getPrices"),
    ...overrides,
  };
}

export function createFakeAccount(overrides: Partial<AccountPort> = {}): AccountPort {
  return {
    placeOrder: () => notStubbed("placeOrder"),
    getOrders: () => notStubbed("getOrders"),
    getOpenOrders: () => notStubbed("getOpenOrders"),
    getOrder: () => notStubbed("getOrder"),
    cancelOrder: () => notStubbed("cancelOrder"),
    getAccountInfo: () => notStubbed("getAccountInfo"),
    getAccountTrades: () => notStubbed("getAccountTrades"),
    getDeposits: () => notStubbed("getDeposits"),
    getWithdrawals: () => notStubbed("getWithdrawals"),
    withdraw: () => notStubbed("withdraw"),
    openUserStream: () => notStubbed("openUserStream"),
    keepAliveUserStream: () => notStubbed("keepAliveUserStream"),
    closeUserStream: () => notStubbed("closeUserStream"),
    ...overrides,
  };
}
