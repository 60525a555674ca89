/**
 * Console Formatters
 *
 * - Turn query results, account data and live updates into output lines
 * - Prices and quantities are shown with 8 decimals
 * - Pure: nothing here writes to the terminal
 */

import Decimal from "decimal.js";
import type { LiveStreamSpec, Ms, OrderIntent } from "@spot-console/core";
import { describeStream, tryParseDecimal } from "@spot-console/core";
import type {
  AccountEvent,
  AccountInfo,
  AccountTrade,
  AggregateTrade,
  Candlestick,
  Deposit,
  LiveSnapshot,
  Order,
  OrderBook,
  OrderBookTop,
  PlacedOrder,
  PriceLevel,
  SymbolInfo,
  SymbolPrice,
  SymbolStats,
  VenueError,
  Withdrawal,
} from "@spot-console/adapters";
import type { Style } from "@spot-console/utils";

import type { SessionView, StreamFault } from "./live-session-manager";
import type { QueryResult } from "./query-resolver";

const LEVEL_WIDTH = 18;
const SYMBOLS_PER_LINE = 8;
const NONE = "  [None]";

// ─────────────────────────────────────────────────────────────────────────────
// Number / time helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fixed 8-decimal rendering; values that are not plain decimals pass through
 */
export function fmt8(value: string): string {
  return tryParseDecimal(value)?.toFixed(8) ?? value;
}

export function fmtPercent(value: string): string {
  return tryParseDecimal(value)?.toFixed(2) ?? value;
}

/**
 * UTC timestamp, e.g. "2024-01-01 12:00:00"
 */
export function fmtTime(ms: Ms): string {
  if (!Number.isFinite(ms)) return String(ms);
  return new Date(ms).toISOString().replace("T", " ").slice(0, 19);
}

function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

function sideLabel(side: "buy" | "sell"): string {
  return side === "buy" ? "Buy" : "Sell";
}

/**
 * `a - b` with 8 decimals, or "-" when either side is not a decimal
 */
function spread8(ask: string, bid: string): string {
  const a = tryParseDecimal(ask);
  const b = tryParseDecimal(bid);
  return a && b ? a.minus(b).toFixed(8) : "-";
}

function hasAmount(free: string, locked: string): boolean {
  const f = tryParseDecimal(free) ?? new Decimal(0);
  const l = tryParseDecimal(locked) ?? new Decimal(0);
  return f.plus(l).gt(0);
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatter
// ─────────────────────────────────────────────────────────────────────────────

export class ConsoleFormatter {
  private readonly style: Style;

  constructor(style: Style) {
    this.style = style;
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  error(message: string): string {
    return this.style.alert(`! ${message}`);
  }

  unrecognized(input: string): string {
    return this.error(`Unrecognized Command: "${input}"`);
  }

  venueError(error: VenueError): string {
    const code = "code" in error && error.code !== undefined ? ` [code ${error.code}]` : "";
    return this.error(`Request failed (${error.type})${code}: ${error.message}`);
  }

  // ===========================================================================
  // Connectivity
  // ===========================================================================

  ping(successful: boolean): string {
    return `  Ping: ${successful ? "SUCCESSFUL" : "FAILED"}`;
  }

  serverTime(serverMs: Ms, localMs: Ms): string {
    const offset = serverMs - localMs;
    return `  Server Time: ${fmtTime(serverMs)} UTC  [Offset: ${offset >= 0 ? "+" : ""}${offset} ms]`;
  }

  // ===========================================================================
  // Market data
  // ===========================================================================

  stats(stats: SymbolStats): string[] {
    const pct = this.style.signed(fmtPercent(stats.priceChangePercent), stats.priceChangePercent);
    return [
      `  24-hour statistics for ${stats.symbol}:`,
      `    %: ${pct} | O: ${fmt8(stats.openPrice)} | H: ${fmt8(stats.highPrice)} | L: ${fmt8(stats.lowPrice)} | V: ${fmt8(stats.volume)}`,
      `    Last: ${fmt8(stats.lastPrice)} | Avg: ${fmt8(stats.weightedAvgPrice)} | Trades: ${stats.tradeCount}`,
    ];
  }

  /**
   * Asks from the highest shown down to the best, then bids from the best down
   */
  orderBook(book: OrderBook, source: string): string[] {
    const lines = [`  ${book.symbol} order book (update ${book.lastUpdateId}, ${source}):`];
    if (book.bids.length === 0 && book.asks.length === 0) {
      lines.push(NONE);
      return lines;
    }
    for (const level of [...book.asks].reverse()) {
      lines.push(this.level("ASK", level, "sell"));
    }
    lines.push(`  ${"-".repeat(3 + 2 + LEVEL_WIDTH * 2)}`);
    for (const level of book.bids) {
      lines.push(this.level("BID", level, "buy"));
    }
    return lines;
  }

  top(top: OrderBookTop): string {
    return `  ${top.symbol}  -  Bid: ${fmt8(top.bidPrice)} (qty: ${fmt8(top.bidQty)})  |  Ask: ${fmt8(top.askPrice)} (qty: ${fmt8(top.askQty)})  -  Spread: ${spread8(top.askPrice, top.bidPrice)}`;
  }

  tops(tops: OrderBookTop[]): string[] {
    if (tops.length === 0) return [NONE];
    return tops.map(
      t => `  ${t.symbol.padStart(8)}  -  Bid: ${t.bidPrice.padStart(12)} (qty: ${t.bidQty})  |  Ask: ${t.askPrice} (qty: ${t.askQty})`,
    );
  }

  trade(trade: AggregateTrade, symbol: string): string {
    const side = trade.isBuyerMaker ? "sell" : "buy";
    const label = this.style.side(sideLabel(side).padStart(4), side);
    return `  ${fmtTime(trade.time)} - ${symbol.padStart(8)} - ${label} - ${fmt8(trade.quantity)} @ ${fmt8(trade.price)} - [ID: ${trade.id}]`;
  }

  trades(trades: readonly AggregateTrade[], symbol: string): string[] {
    if (trades.length === 0) return [NONE];
    return trades.map(t => this.trade(t, symbol));
  }

  candle(candle: Candlestick, symbol: string): string {
    return `  ${symbol} - O: ${fmt8(candle.open)} | H: ${fmt8(candle.high)} | L: ${fmt8(candle.low)} | C: ${fmt8(candle.close)} | V: ${fmt8(candle.volume)} - [${fmtTime(candle.openTime)}]`;
  }

  candles(candles: readonly Candlestick[], symbol: string): string[] {
    if (candles.length === 0) return [NONE];
    return candles.map(c => this.candle(c, symbol));
  }

  symbols(symbols: SymbolInfo[]): string[] {
    const lines = [`  ${symbols.length} symbols:`];
    for (let i = 0; i < symbols.length; i += SYMBOLS_PER_LINE) {
      const row = symbols.slice(i, i + SYMBOLS_PER_LINE).map(s => s.symbol);
      lines.push(`    ${row.join(", ")}`);
    }
    return lines;
  }

  prices(prices: SymbolPrice[]): string[] {
    if (prices.length === 0) return [NONE];
    return prices.map(p => `  ${p.symbol.padStart(8)}: ${p.price}`);
  }

  queryResult(result: QueryResult): string[] {
    switch (result.family) {
      case "orderBook":
        return this.orderBook(result.book, result.source);
      case "top":
        return [this.top(result.top)];
      case "trades":
        return [`  Trades ${result.symbol} (newest first, ${result.source}):`, ...this.trades(result.trades, result.symbol)];
      case "candlesticks":
        return [
          `  Candlesticks ${result.symbol} ${result.interval} (${result.source}):`,
          ...this.candles(result.candles, result.symbol),
        ];
    }
  }

  // ===========================================================================
  // Orders and account
  // ===========================================================================

  placedOrder(intent: OrderIntent, placed: PlacedOrder): string {
    const kind = `${intent.type.toUpperCase()} ${intent.side.toUpperCase()}`;
    if (placed.isTestOnly) {
      const at = intent.price === undefined ? "" : ` @ ${fmt8(intent.price)}`;
      return `  ~ TEST ~ >> ${kind} order accepted for ${fmt8(intent.quantity)} ${intent.symbol}${at} (not placed).`;
    }
    const order = placed.order;
    return `  >> ${kind} order (ID: ${order.orderId}) placed for ${fmt8(order.origQty)} ${order.symbol} @ ${fmt8(order.price)}.`;
  }

  order(order: Order): string {
    const side = this.style.side(sideLabel(order.side).padStart(4), order.side);
    return `  ${order.symbol.padStart(8)} - ${order.type.padStart(6)} - ${side} - ${fmt8(order.origQty)} @ ${fmt8(order.price)} - ${order.status}  [ID: ${order.orderId}]`;
  }

  orders(orders: Order[]): string[] {
    if (orders.length === 0) return [NONE];
    return orders.map(o => this.order(o));
  }

  account(info: AccountInfo): string[] {
    const lines = [
      "  Account:",
      `    Can Trade:    ${yesNo(info.canTrade).padStart(3)}`,
      `    Can Withdraw: ${yesNo(info.canWithdraw).padStart(3)}`,
      `    Can Deposit:  ${yesNo(info.canDeposit).padStart(3)}`,
      "    Balances (only amounts > 0):",
    ];
    const held = info.balances.filter(b => hasAmount(b.free, b.locked));
    if (held.length === 0) {
      lines.push("      [None]");
    }
    for (const b of held) {
      lines.push(`      Asset: ${b.asset} - Free: ${b.free} - Locked: ${b.locked}`);
    }
    return lines;
  }

  accountTrade(trade: AccountTrade): string {
    const side: "buy" | "sell" = trade.isBuyer ? "buy" : "sell";
    return `  ${fmtTime(trade.time)} - ${trade.symbol.padStart(8)} - ${this.style.side(sideLabel(side).padStart(4), side)} - ${trade.isMaker ? "Maker" : "Taker"} - ${fmt8(trade.quantity)} @ ${fmt8(trade.price)} - Fee: ${fmt8(trade.commission)} ${trade.commissionAsset.padStart(5)} [ID: ${trade.id}]`;
  }

  accountTrades(trades: AccountTrade[]): string[] {
    if (trades.length === 0) return [NONE];
    return trades.map(t => this.accountTrade(t));
  }

  deposits(deposits: Deposit[]): string[] {
    if (deposits.length === 0) return [NONE];
    return deposits.map(
      d => `  ${fmtTime(d.insertTime)} - ${d.asset.padStart(4)} - ${fmt8(d.amount)} - Status: ${d.status}`,
    );
  }

  withdrawals(withdrawals: Withdrawal[]): string[] {
    if (withdrawals.length === 0) return [NONE];
    return withdrawals.map(
      w => `  ${w.applyTime} - ${w.asset.padStart(4)} - ${fmt8(w.amount)} => ${w.address} - Status: ${w.status}`,
    );
  }

  withdrawReceipt(asset: string, address: string, amount: string, id: string): string {
    return `  Withdraw request successful: ${amount} ${asset} => ${address} (ID: ${id})`;
  }

  testMode(enabled: boolean): string[] {
    const lines = [`  Test orders: ${enabled ? "ON" : "OFF"}`];
    if (!enabled) {
      lines.push(this.style.alert("  !! Market and Limit orders WILL be placed !!"));
    }
    return lines;
  }

  // ===========================================================================
  // Live session
  // ===========================================================================

  liveStarted(spec: LiveStreamSpec): string {
    const what =
      spec.kind === "userData" ?
        "live account feed enabled"
      : `live ${describeStream(spec)} feed enabled`;
    return `  ...${what} ...use 'live off' to disable.`;
  }

  liveStopped(spec: LiveStreamSpec): string {
    return `  ...live ${describeStream(spec)} feed disabled.`;
  }

  alreadyActive(active: SessionView): string {
    return this.error(`A live task is currently active (${describeStream(active.spec)}) ...use 'live off' to disable.`);
  }

  liveStatus(view: SessionView | undefined): string {
    if (!view) return "  Live: off";
    const state = view.stopping ? "stopping" : "active";
    return `  Live: ${describeStream(view.spec)} (${state}, ${view.updateCount} updates since ${fmtTime(view.startedAt)} UTC)`;
  }

  streamFault(fault: StreamFault): string {
    if (fault.reason === "stop_timeout") {
      return this.error(`Live ${describeStream(fault.session.spec)} feed did not stop in time: ${fault.message}`);
    }
    return this.error(`Live ${describeStream(fault.session.spec)} feed ended: ${fault.message}`);
  }

  /**
   * One line per pushed update
   */
  liveUpdate(snapshot: LiveSnapshot): string {
    switch (snapshot.kind) {
      case "orderBook":
        return this.liveBook(snapshot.book);
      case "candlesticks": {
        const last = snapshot.candles.at(-1);
        return last ? this.candle(last, `${snapshot.symbol} ${snapshot.interval}`) : `  ${snapshot.symbol} - [no candles]`;
      }
      case "trades": {
        const last = snapshot.trades.at(-1);
        return last ? this.trade(last, snapshot.symbol) : `  ${snapshot.symbol} - [no trades]`;
      }
      case "userData":
        return this.accountEvent(snapshot.event);
    }
  }

  accountEvent(event: AccountEvent): string {
    switch (event.type) {
      case "account":
        return `  Account update: ${event.balances.length} balances - ${fmtTime(event.time)}`;
      case "balance":
        return `  Balance update: ${event.asset} ${this.style.signed(event.delta, event.delta)} - ${fmtTime(event.time)}`;
      case "order":
        return `  Order [${event.order.orderId}] update: ${event.order.executionType} - ${event.order.symbol} ${event.order.status}`;
      case "trade":
        return `  Order [${event.order.orderId}] update: ${event.order.executionType} - ${fmt8(event.order.lastExecutedQty)} ${event.order.symbol} @ ${fmt8(event.order.lastExecutedPrice)}`;
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private level(label: string, level: PriceLevel, side: "buy" | "sell"): string {
    return `  ${this.style.side(label, side)}  ${fmt8(level.price).padStart(LEVEL_WIDTH)}${fmt8(level.quantity).padStart(LEVEL_WIDTH)}`;
  }

  private liveBook(book: OrderBook): string {
    const bid = book.bids[0];
    const ask = book.asks[0];
    if (!bid || !ask) return `  ${book.symbol}  -  [one-sided book]`;
    const bidPx = tryParseDecimal(bid.price);
    const askPx = tryParseDecimal(ask.price);
    const mid = bidPx && askPx ? bidPx.plus(askPx).div(2).toFixed(8) : "-";
    return `  ${book.symbol}  -  Bid: ${fmt8(bid.price)}  |  ${mid}  |  Ask: ${fmt8(ask.price)}  -  Spread: ${spread8(ask.price, bid.price)}`;
  }
}
