/**
 * Help text and the API credentials notice
 */

import { DEFAULT_LIMIT, DEFAULT_SYMBOL } from "@spot-console/core";

type HelpEntry = readonly [usage: string, description: string];

interface HelpSection {
  title: string;
  entries: readonly HelpEntry[];
}

const SECTIONS: readonly HelpSection[] = [
  {
    title: "Connectivity",
    entries: [
      ["ping", "test connection to server."],
      ["time", "display the current server time (UTC)."],
    ],
  },
  {
    title: "Market Data",
    entries: [
      ["stats <symbol>", "display 24h stats for symbol."],
      ["depth|book <symbol> [limit]", "display symbol order book."],
      ["top <symbol>", "display best bid and ask for symbol."],
      ["trades <symbol> [limit]", "display latest trades, newest first."],
      ["tradesIn <symbol> <start> <end>", "display trades within a time range (epoch ms, inclusive)."],
      ["tradesFrom <symbol> <tradeId> [limit]", "display trades beginning with trade ID."],
      ["candles|klines <symbol> <interval> [limit]", "display candlestick bars for a symbol."],
      ["candlesIn|klinesIn <symbol> <interval> <start> <end>", "display candlestick bars in a time range."],
      ["symbols", "display all symbols."],
      ["prices", "display current price for all symbols."],
      ["tops", "display order book top price and quantity for all symbols."],
    ],
  },
  {
    title: "Live Feed (one at a time)",
    entries: [
      ["live depth|book <symbol>", "enable order book live feed for a symbol."],
      ["live kline|candle <symbol> <interval>", "enable candlestick live feed for a symbol and interval."],
      ["live trades <symbol>", "enable trades live feed for a symbol."],
      ["live account|user", "enable account live feed (api key required)."],
      ["live status", "display the active live feed."],
      ["live off", "disable the live feed."],
    ],
  },
  {
    title: "Account (authentication required)",
    entries: [
      ["market <side> <symbol> <qty> [stop]", "create a market order."],
      ["limit <side> <symbol> <qty> <price> [stop]", "create a limit order."],
      ["orders <symbol> [limit]", "display orders for a symbol."],
      ["orders <symbol> open", "display all open orders for a symbol."],
      ["order <symbol> <ID>", "display an order by ID (or client order ID)."],
      ["order <symbol> <ID> cancel", "cancel an order by ID."],
      ["account|balances|positions", "display account information (including balances)."],
      ["myTrades <symbol> [limit]", "display account trades of a symbol."],
      ["deposits [asset]", "display deposits of an asset or all deposits."],
      ["withdrawals [asset]", "display withdrawals of an asset or all withdrawals."],
      ["withdraw <asset> <address> <amount>", "submit a withdraw request (NOTE: 'test only' does NOT apply)."],
      ["test <on|off>", "determines if orders are test only (default: on)."],
    ],
  },
];

const USAGE_WIDTH = 53;

export function helpLines(): string[] {
  const lines = ["", "Usage: <command> <args>", "", "Commands:", ""];
  for (const section of SECTIONS) {
    lines.push(` ${section.title}:`);
    for (const [usage, description] of section.entries) {
      lines.push(`  ${usage.padEnd(USAGE_WIDTH)}${description}`);
    }
    lines.push("");
  }
  lines.push(`  ${"help".padEnd(USAGE_WIDTH)}display this text.`);
  lines.push(`  ${"quit | exit".padEnd(USAGE_WIDTH)}terminate the application.`);
  lines.push("");
  lines.push(` * default symbol: ${DEFAULT_SYMBOL}`);
  lines.push(` * default limit: ${DEFAULT_LIMIT}`);
  lines.push("");
  return lines;
}

export const API_NOTICE_LINES: readonly string[] = [
  "* NOTICE: Orders, account data and the account live feed require an API key and secret.",
  "",
  "  Set SPOT_API_KEY and SPOT_API_SECRET in the environment or in a .env file",
  "  in the working directory (see .env.example), then restart the console.",
  "",
];
