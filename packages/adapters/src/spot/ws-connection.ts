/**
 * WsConnection - WebSocket connection wrapper with AsyncIterable support
 *
 * Features:
 * - Direct URL + headers control
 * - AsyncIterable interface for `for await` consumption
 * - Messages are parsed JSON, left unvalidated for the consumer's schema
 * - connect()/close()/isClosed(); close() ends a pending iteration
 */

import WebSocket from "ws";
import { logger } from "@spot-console/utils";

const log = logger;

/**
 * Options for creating a WebSocket connection
 */
export interface WsConnectionOptions {
  /**
   * Full WebSocket URL (e.g., wss://stream.binance.com:9443/ws/btcusdt@aggTrade)
   */
  url: string;

  /**
   * Optional headers to send during handshake (e.g., User-Agent)
   */
  headers?: Record<string, string>;

  /**
   * Label for logging (e.g., "trades:BTCUSDT")
   */
  label?: string;
}

function decode(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * A WebSocket connection that implements AsyncIterable for message consumption.
 *
 * Usage:
 * ```ts
 * const conn = new WsConnection({ url: 'wss://...' });
 * await conn.connect();
 * for await (const message of conn) {
 *   // message is parsed JSON
 * }
 * ```
 */
export class WsConnection implements AsyncIterable<unknown> {
  private ws: WebSocket | null = null;
  private closed = true;
  private url: string;
  private headers: Record<string, string>;
  private label: string;

  // Queue for buffering incoming messages
  private queue: unknown[] = [];
  private pendingResolve: ((result: IteratorResult<unknown>) => void) | null = null;
  private pendingReject: ((error: unknown) => void) | null = null;
  private lastError: Error | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.label = options.label ?? options.url;
  }

  /**
   * Connect to the WebSocket server
   */
  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.closed = false;
      this.lastError = null;
      this.queue = [];

      const ws = new WebSocket(this.url, { headers: this.headers });
      this.ws = ws;
      let opened = false;

      ws.on("open", () => {
        opened = true;
        log.debug(`WsConnection opened: ${this.label}`);
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        const raw = decode(data);
        try {
          this.enqueue(JSON.parse(raw));
        } catch (error) {
          // Skip the frame; the consumer resyncs from sequence ids where it has them
          log.warn(`WsConnection parse error: ${this.label}`, { error });
        }
      });

      ws.on("close", (code, reason) => {
        log.debug(`WsConnection closed: ${this.label}`, {
          code,
          reason: reason.toString("utf8"),
        });
        this.handleClose();
      });

      ws.on("error", error => {
        log.warn(`WsConnection error: ${this.label}`, { error });
        this.lastError = error;

        if (!opened) {
          this.closed = true;
          reject(error);
        } else {
          this.handleClose();
        }
      });
    });
  }

  /**
   * Close the WebSocket connection
   */
  async close(): Promise<void> {
    if (this.closed) return;

    this.closed = true;

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }

    // Wake up any pending iterator
    if (this.pendingResolve) {
      this.pendingResolve({ value: undefined, done: true });
      this.pendingResolve = null;
      this.pendingReject = null;
    }
  }

  /**
   * Check if the connection is closed
   */
  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // AsyncIterable Implementation
  // =========================================================================

  [Symbol.asyncIterator](): AsyncIterator<unknown> {
    return {
      next: async (): Promise<IteratorResult<unknown>> => {
        // Return queued messages first
        if (this.queue.length > 0) {
          return { value: this.queue.shift(), done: false };
        }

        // If closed, end iteration
        if (this.closed) {
          if (this.lastError) {
            throw this.lastError;
          }
          return { value: undefined, done: true };
        }

        // Wait for next message
        return new Promise<IteratorResult<unknown>>((resolve, reject) => {
          this.pendingResolve = resolve;
          this.pendingReject = reject;
        });
      },

      return: async (): Promise<IteratorResult<unknown>> => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private enqueue(message: unknown): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  private handleClose(): void {
    this.closed = true;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;

      if (this.lastError && reject) {
        reject(this.lastError);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
  }
}

// ============================================================================
// Stream paths
// ============================================================================

/**
 * Raw stream paths, appended to the stream base URL
 */
export const SpotStreamPaths = {
  depth: (symbol: string) => `/ws/${symbol.toLowerCase()}@depth@100ms`,
  kline: (symbol: string, interval: string) => `/ws/${symbol.toLowerCase()}@kline_${interval}`,
  aggTrade: (symbol: string) => `/ws/${symbol.toLowerCase()}@aggTrade`,
  userData: (listenKey: string) => `/ws/${listenKey}`,
} as const;

/**
 * Interface for WebSocket connections used by stream workers.
 * Both WsConnection and test mocks should implement this interface.
 */
export interface IWsConnection extends AsyncIterable<unknown> {
  connect: () => Promise<void>;
  close: () => Promise<void>;
  isClosed: () => boolean;
}

/**
 * Connection factory type for dependency injection in tests
 */
export type WsConnectionFactory = (url: string, headers?: Record<string, string>, label?: string) => IWsConnection;

/**
 * Default connection factory using WsConnection
 */
export const defaultConnectionFactory: WsConnectionFactory = (url, headers, label) =>
  new WsConnection({ url, headers, label });
