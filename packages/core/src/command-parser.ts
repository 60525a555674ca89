/**
 * Command Parser
 *
 * Turns one input line into a validated, defaulted command.
 * This module is pure logic (no I/O dependencies) and never throws:
 * malformed input is returned as a CommandParseError.
 */

import { err, ok, type Result } from "neverthrow";

import {
  DEFAULT_LIMIT,
  normalizeSymbol,
  parseLimit,
  parsePositiveDecimal,
  parseSymbolOrLimit,
  parseTimeMs,
  tryParseInt,
} from "./args";
import { DEFAULT_INTERVAL, parseInterval } from "./stream-kind";
import type { CandlestickInterval, LiveStreamSpec, Ms, OrderIntent, OrderRef, QueryRequest, Side } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Tokenized input line. `args` excludes the verb.
 */
export interface Command {
  verb: string;
  args: string[];
}

export type ParsedCommand =
  | { type: "help" }
  | { type: "quit" }
  | { type: "ping" }
  | { type: "time" }
  | { type: "stats"; symbol: string }
  | { type: "query"; request: QueryRequest }
  | { type: "tradesIn"; symbol: string; startTime?: Ms; endTime?: Ms }
  | { type: "tradesFrom"; symbol: string; fromId: number; limit: number }
  | { type: "candlesIn"; symbol: string; interval: CandlestickInterval; startTime?: Ms; endTime?: Ms }
  | { type: "symbols" }
  | { type: "prices" }
  | { type: "tops" }
  | { type: "liveStart"; spec: LiveStreamSpec }
  | { type: "liveOff" }
  | { type: "liveStatus" }
  | { type: "placeOrder"; order: Omit<OrderIntent, "isTestOnly"> }
  | { type: "orders"; symbol: string; limit: number; openOnly: boolean }
  | { type: "order"; symbol: string; ref: OrderRef; cancel: boolean }
  | { type: "account" }
  | { type: "myTrades"; symbol: string; limit: number }
  | { type: "deposits"; asset?: string }
  | { type: "withdrawals"; asset?: string }
  | { type: "withdraw"; asset: string; address: string; amount: string }
  | { type: "testMode"; enabled: boolean };

export type CommandType = ParsedCommand["type"];

export type CommandParseError =
  | { type: "unrecognized"; input: string }
  | { type: "argument"; message: string };

/** Commands that need API credentials. */
export const AUTHENTICATED_COMMANDS: ReadonlySet<CommandType> = new Set<CommandType>([
  "placeOrder",
  "orders",
  "order",
  "account",
  "myTrades",
  "deposits",
  "withdrawals",
  "withdraw",
]);

export const ArgumentMessages = {
  marketArgs: "A side, symbol, and quantity are required.",
  limitArgs: "A side, symbol, quantity and price are required.",
  side: "A valid order side is required ('buy' or 'sell').",
  quantity: "A quantity greater than 0 is required.",
  price: "A price greater than 0 is required.",
  stopPrice: "A stop price greater than 0 is required.",
  orderArgs: "A symbol and order ID are required.",
  orderId: "An order ID not less than 0 is required.",
  withdrawArgs: "An asset, address, and amount are required.",
  amount: "An amount greater than 0 is required.",
} as const;

type ParseResult = Result<ParsedCommand, CommandParseError>;

// ─────────────────────────────────────────────────────────────────────────────
// Tokenizing
// ─────────────────────────────────────────────────────────────────────────────

export function tokenize(line: string): Command {
  const tokens = line.trim().split(/\s+/).filter(t => t.length > 0);
  const [verb = "", ...args] = tokens;
  return { verb: verb.toLowerCase(), args };
}

const argumentError = (message: string): ParseResult => err({ type: "argument", message });

function parseSide(token: string | undefined): Side | undefined {
  const lower = token?.toLowerCase();
  return lower === "buy" || lower === "sell" ? lower : undefined;
}

function parseTradeId(token: string | undefined): number {
  const n = tryParseInt(token);
  return n !== undefined && n >= 0 ? n : 0;
}

function optionalAsset(token: string | undefined): string | undefined {
  return token === undefined ? undefined : token.toUpperCase();
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-verb parsers
// ─────────────────────────────────────────────────────────────────────────────

function parseBook(args: string[]): ParseResult {
  const first = parseSymbolOrLimit(args[0]);
  const limit = args.length > 1 ? parseLimit(args[1]) : first.limit;
  return ok({ type: "query", request: { family: "orderBook", symbol: first.symbol, limit } });
}

function parseCandles(args: string[]): ParseResult {
  return ok({
    type: "query",
    request: {
      family: "candlesticks",
      symbol: normalizeSymbol(args[0]),
      interval: parseInterval(args[1]) ?? DEFAULT_INTERVAL,
      limit: parseLimit(args[2]),
    },
  });
}

function parseLive(args: string[], input: string): ParseResult {
  const endpoint = (args[0] ?? "depth").toLowerCase();
  const symbol = normalizeSymbol(args[1]);

  switch (endpoint) {
    case "depth":
    case "book":
      return ok({ type: "liveStart", spec: { kind: "orderBook", symbol } });
    case "kline":
    case "candle":
      return ok({
        type: "liveStart",
        spec: { kind: "candlesticks", symbol, interval: parseInterval(args[2]) ?? DEFAULT_INTERVAL },
      });
    case "trades":
      return ok({ type: "liveStart", spec: { kind: "trades", symbol } });
    case "account":
    case "user":
      return ok({ type: "liveStart", spec: { kind: "userData" } });
    case "off":
      return ok({ type: "liveOff" });
    case "status":
      return ok({ type: "liveStatus" });
    default:
      return err({ type: "unrecognized", input });
  }
}

function parsePlaceOrder(args: string[], type: "market" | "limit"): ParseResult {
  const required = type === "market" ? 3 : 4;
  if (args.length < required) {
    return argumentError(type === "market" ? ArgumentMessages.marketArgs : ArgumentMessages.limitArgs);
  }

  const side = parseSide(args[0]);
  if (!side) return argumentError(ArgumentMessages.side);

  const symbol = normalizeSymbol(args[1]);

  const quantity = parsePositiveDecimal(args[2]);
  if (quantity === undefined) return argumentError(ArgumentMessages.quantity);

  let price: string | undefined;
  if (type === "limit") {
    price = parsePositiveDecimal(args[3]);
    if (price === undefined) return argumentError(ArgumentMessages.price);
  }

  // A stop price changes which order is placed, so a bad one is not defaulted away.
  let stopPrice: string | undefined;
  if (args.length > required) {
    stopPrice = parsePositiveDecimal(args[required]);
    if (stopPrice === undefined) return argumentError(ArgumentMessages.stopPrice);
  }

  return ok({ type: "placeOrder", order: { type, side, symbol, quantity, price, stopPrice } });
}

function parseOrders(args: string[]): ParseResult {
  const { symbol, limit } = parseSymbolOrLimit(args[0]);

  if (args.length > 1) {
    const n = tryParseInt(args[1]);
    if (n !== undefined) {
      return ok({ type: "orders", symbol, limit: n >= 1 ? n : DEFAULT_LIMIT, openOnly: false });
    }
    const openOnly = args[1]?.toLowerCase() === "open";
    return ok({ type: "orders", symbol, limit: DEFAULT_LIMIT, openOnly });
  }

  return ok({ type: "orders", symbol, limit, openOnly: false });
}

function parseOrder(args: string[]): ParseResult {
  const [symbolToken, idToken, action] = args;
  if (symbolToken === undefined || idToken === undefined) {
    return argumentError(ArgumentMessages.orderArgs);
  }

  const id = tryParseInt(idToken);
  let ref: OrderRef;
  if (id === undefined) {
    ref = { clientOrderId: idToken };
  } else if (id < 0) {
    return argumentError(ArgumentMessages.orderId);
  } else {
    ref = { orderId: id };
  }

  return ok({
    type: "order",
    symbol: normalizeSymbol(symbolToken),
    ref,
    cancel: action?.toLowerCase() === "cancel",
  });
}

function parseMyTrades(args: string[]): ParseResult {
  const first = parseSymbolOrLimit(args[0]);
  const limit = args.length > 1 ? parseLimit(args[1]) : first.limit;
  return ok({ type: "myTrades", symbol: first.symbol, limit });
}

function parseWithdraw(args: string[]): ParseResult {
  const [asset, address, amountToken] = args;
  if (asset === undefined || address === undefined || amountToken === undefined) {
    return argumentError(ArgumentMessages.withdrawArgs);
  }

  const amount = parsePositiveDecimal(amountToken);
  if (amount === undefined) return argumentError(ArgumentMessages.amount);

  return ok({ type: "withdraw", asset: asset.toUpperCase(), address, amount });
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse one line of operator input.
 *
 * Verbs are matched case-insensitively and exactly. An empty line is `help`.
 */
export function parseCommand(line: string): ParseResult {
  const input = line.trim();
  const { verb, args } = tokenize(input);

  switch (verb) {
    case "":
    case "help":
      return ok({ type: "help" });
    case "quit":
    case "exit":
      return ok({ type: "quit" });
    case "ping":
      return ok({ type: "ping" });
    case "time":
      return ok({ type: "time" });
    case "stats":
      return ok({ type: "stats", symbol: normalizeSymbol(args[0]) });
    case "depth":
    case "book":
      return parseBook(args);
    case "top":
      return ok({ type: "query", request: { family: "top", symbol: normalizeSymbol(args[0]) } });
    case "trades":
      return ok({
        type: "query",
        request: { family: "trades", symbol: normalizeSymbol(args[0]), limit: parseLimit(args[1]) },
      });
    case "tradesin":
      return ok({
        type: "tradesIn",
        symbol: normalizeSymbol(args[0]),
        startTime: parseTimeMs(args[1]),
        endTime: parseTimeMs(args[2]),
      });
    case "tradesfrom":
      return ok({
        type: "tradesFrom",
        symbol: normalizeSymbol(args[0]),
        fromId: parseTradeId(args[1]),
        limit: parseLimit(args[2]),
      });
    case "candles":
    case "klines":
      return parseCandles(args);
    case "candlesin":
    case "klinesin":
      return ok({
        type: "candlesIn",
        symbol: normalizeSymbol(args[0]),
        interval: parseInterval(args[1]) ?? DEFAULT_INTERVAL,
        startTime: parseTimeMs(args[2]),
        endTime: parseTimeMs(args[3]),
      });
    case "symbols":
      return ok({ type: "symbols" });
    case "prices":
      return ok({ type: "prices" });
    case "tops":
      return ok({ type: "tops" });
    case "live":
      return parseLive(args, input);
    case "market":
      return parsePlaceOrder(args, "market");
    case "limit":
      return parsePlaceOrder(args, "limit");
    case "orders":
      return parseOrders(args);
    case "order":
      return parseOrder(args);
    case "account":
    case "balances":
    case "positions":
      return ok({ type: "account" });
    case "mytrades":
      return parseMyTrades(args);
    case "deposits":
      return ok({ type: "deposits", asset: optionalAsset(args[0]) });
    case "withdrawals":
      return ok({ type: "withdrawals", asset: optionalAsset(args[0]) });
    case "withdraw":
      return parseWithdraw(args);
    case "test":
      return ok({ type: "testMode", enabled: (args[0] ?? "on").toLowerCase() !== "off" });
    default:
      return err({ type: "unrecognized", input });
  }
}
