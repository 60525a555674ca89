/**
 * Stream kind helpers: which stream serves a query, how a spec is labelled,
 * and how candlestick intervals are parsed.
 */

import {
  CANDLESTICK_INTERVALS,
  type CandlestickInterval,
  type LiveStreamSpec,
  type QueryFamily,
  type StreamKind,
} from "./types";

export const DEFAULT_INTERVAL: CandlestickInterval = "1h";

const INTERVAL_ALIASES: Record<string, CandlestickInterval> = {
  "1H": "1h",
  "2H": "2h",
  "4H": "4h",
  "6H": "6h",
  "8H": "8h",
  "12H": "12h",
  "1D": "1d",
  "3D": "3d",
  "1W": "1w",
};

export function isCandlestickInterval(token: string): token is CandlestickInterval {
  return CANDLESTICK_INTERVALS.some(interval => interval === token);
}

/**
 * Parse an interval token. `1m` is one minute and `1M` one month, so matching
 * is case-sensitive apart from a few unambiguous upper-case spellings.
 */
export function parseInterval(token: string | undefined): CandlestickInterval | undefined {
  if (token === undefined) return undefined;
  if (isCandlestickInterval(token)) return token;
  return INTERVAL_ALIASES[token];
}

const FAMILY_STREAM: Record<QueryFamily, StreamKind> = {
  orderBook: "orderBook",
  top: "orderBook",
  trades: "trades",
  candlesticks: "candlesticks",
};

/**
 * The stream kind whose cache can answer a query family.
 */
export function streamKindFor(family: QueryFamily): StreamKind {
  return FAMILY_STREAM[family];
}

/**
 * Human-readable label, e.g. "order book BTCUSDT" or "candlesticks ETHBTC 1h".
 */
export function describeStream(spec: LiveStreamSpec): string {
  switch (spec.kind) {
    case "orderBook":
      return `order book ${spec.symbol}`;
    case "candlesticks":
      return `candlesticks ${spec.symbol} ${spec.interval}`;
    case "trades":
      return `trades ${spec.symbol}`;
    case "userData":
      return "account";
  }
}
