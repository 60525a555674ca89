/**
 * packages/core - Pure Console Domain
 *
 * Stream kinds, queries, order intents and command parsing.
 * NO I/O dependencies (HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  PriceStr,
  QtyStr,
  Ms,
  Side,
  StreamKind,
  CandlestickInterval,
  LiveStreamSpec,
  QueryRequest,
  QueryFamily,
  OrderIntent,
  OrderRef,
} from "./types";
export { CANDLESTICK_INTERVALS, STREAM_KINDS } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Stream kinds & intervals
// ─────────────────────────────────────────────────────────────────────────────
export {
  DEFAULT_INTERVAL,
  describeStream,
  isCandlestickInterval,
  parseInterval,
  streamKindFor,
} from "./stream-kind";

// ─────────────────────────────────────────────────────────────────────────────
// Arguments & commands
// ─────────────────────────────────────────────────────────────────────────────
export {
  DEFAULT_LIMIT,
  DEFAULT_SYMBOL,
  normalizeSymbol,
  parseLimit,
  parsePositiveDecimal,
  parseSymbolOrLimit,
  parseTimeMs,
  tryParseDecimal,
  tryParseInt,
} from "./args";
export {
  ArgumentMessages,
  AUTHENTICATED_COMMANDS,
  parseCommand,
  tokenize,
  type Command,
  type CommandParseError,
  type CommandType,
  type ParsedCommand,
} from "./command-parser";
