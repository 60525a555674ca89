/**
 * Command Interpreter
 *
 * - Parses one input line and routes it to the resolver, the session manager,
 *   the market data port or the account port
 * - Renders every result through the OutputSink
 * - Per-command failures become outcomes; the read loop keeps going
 */

import type { ResultAsync } from "neverthrow";
import type { CommandType, LiveStreamSpec, Ms, OrderIntent, ParsedCommand } from "@spot-console/core";
import { AUTHENTICATED_COMMANDS, describeStream, parseCommand } from "@spot-console/core";
import type { AccountPort, MarketDataPort, VenueError } from "@spot-console/adapters";
import { logger } from "@spot-console/utils";

import type { ConsoleFormatter } from "./formatters";
import { API_NOTICE_LINES, helpLines } from "./help";
import type { LiveSessionManager, SessionError } from "./live-session-manager";
import type { OutputSink } from "./output-sink";
import type { QueryResolver } from "./query-resolver";

const log = logger;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type CommandOutcome =
  | { type: "ok" }
  | { type: "quit" }
  | { type: "unrecognized"; input: string }
  | { type: "argument_error"; message: string }
  | { type: "session_error"; error: SessionError }
  | { type: "credentials_required"; command: CommandType }
  | { type: "remote_error"; error: VenueError };

export type AccountCommand = Extract<
  ParsedCommand,
  { type: "placeOrder" | "orders" | "order" | "account" | "myTrades" | "deposits" | "withdrawals" | "withdraw" }
>;

export interface CommandInterpreterOptions {
  marketData: MarketDataPort;

  /**
   * Absent when no API credentials are configured
   */
  account?: AccountPort;

  sessions: LiveSessionManager;
  resolver: QueryResolver;
  output: OutputSink;
  formatter: ConsoleFormatter;

  /**
   * Initial test-order mode (default: on)
   */
  testOnly?: boolean;

  now?: () => Ms;
}

const OK: CommandOutcome = { type: "ok" };

function isAccountCommand(command: ParsedCommand): command is AccountCommand {
  return AUTHENTICATED_COMMANDS.has(command.type);
}

// ─────────────────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────────────────

export class CommandInterpreter {
  private readonly marketData: MarketDataPort;
  private readonly account: AccountPort | undefined;
  private readonly sessions: LiveSessionManager;
  private readonly resolver: QueryResolver;
  private readonly output: OutputSink;
  private readonly formatter: ConsoleFormatter;
  private readonly now: () => Ms;

  private testOnly: boolean;

  constructor(options: CommandInterpreterOptions) {
    this.marketData = options.marketData;
    this.account = options.account;
    this.sessions = options.sessions;
    this.resolver = options.resolver;
    this.output = options.output;
    this.formatter = options.formatter;
    this.testOnly = options.testOnly ?? true;
    this.now = options.now ?? Date.now;
  }

  isTestOnly(): boolean {
    return this.testOnly;
  }

  async execute(line: string): Promise<CommandOutcome> {
    const parsed = parseCommand(line);

    if (parsed.isErr()) {
      const error = parsed.error;
      if (error.type === "unrecognized") {
        this.output.write([this.formatter.unrecognized(error.input), ...helpLines()]);
        return { type: "unrecognized", input: error.input };
      }
      this.output.write(error.message);
      return { type: "argument_error", message: error.message };
    }

    const command = parsed.value;
    log.debug("Executing command", { type: command.type });

    if (isAccountCommand(command)) {
      return this.account ? this.executeAccount(command, this.account) : this.credentialsRequired(command.type);
    }

    // The account stream needs a listen key, which needs credentials.
    // An active session is reported first, by liveStart.
    if (
      command.type === "liveStart" &&
      command.spec.kind === "userData" &&
      !this.account &&
      this.sessions.activeView() === undefined
    ) {
      return this.credentialsRequired(command.type);
    }

    return this.executePublic(command);
  }

  // ===========================================================================
  // Public commands
  // ===========================================================================

  private async executePublic(command: Exclude<ParsedCommand, AccountCommand>): Promise<CommandOutcome> {
    switch (command.type) {
      case "help":
        this.output.write(helpLines());
        return OK;
      case "quit":
        return { type: "quit" };
      case "ping":
        return this.ping();
      case "time":
        return this.render(this.marketData.getServerTime(), ms => this.formatter.serverTime(ms, this.now()));
      case "stats":
        return this.render(this.marketData.get24hStats(command.symbol), stats => this.formatter.stats(stats));
      case "query":
        return this.render(this.resolver.resolve(command.request), result => this.formatter.queryResult(result));
      case "tradesIn":
        return this.render(
          this.marketData.getAggregateTrades({
            symbol: command.symbol,
            startTime: command.startTime,
            endTime: command.endTime,
          }),
          trades => this.formatter.trades(trades, command.symbol),
        );
      case "tradesFrom":
        return this.render(
          this.marketData.getAggregateTrades({ symbol: command.symbol, fromId: command.fromId, limit: command.limit }),
          trades => this.formatter.trades(trades, command.symbol),
        );
      case "candlesIn":
        return this.render(
          this.marketData.getCandlesticks({
            symbol: command.symbol,
            interval: command.interval,
            startTime: command.startTime,
            endTime: command.endTime,
          }),
          candles => this.formatter.candles(candles, command.symbol),
        );
      case "symbols":
        return this.render(this.marketData.getSymbols(), symbols => this.formatter.symbols(symbols));
      case "prices":
        return this.render(this.marketData.getPrices(), prices => this.formatter.prices(prices));
      case "tops":
        return this.render(this.marketData.getOrderBookTops(), tops => this.formatter.tops(tops));
      case "liveStart":
        return this.liveStart(command.spec);
      case "liveOff":
        return this.liveOff();
      case "liveStatus":
        this.output.write(this.formatter.liveStatus(this.sessions.activeView()));
        return OK;
      case "testMode":
        this.testOnly = command.enabled;
        this.output.write(this.formatter.testMode(command.enabled));
        return OK;
    }
  }

  private async ping(): Promise<CommandOutcome> {
    const result = await this.marketData.ping();
    if (result.isErr()) {
      this.output.write([this.formatter.ping(false), this.formatter.venueError(result.error)]);
      return { type: "remote_error", error: result.error };
    }
    this.output.write(this.formatter.ping(true));
    return OK;
  }

  // ===========================================================================
  // Live session
  // ===========================================================================

  private liveStart(spec: LiveStreamSpec): CommandOutcome {
    const started = this.sessions.start(spec);
    if (started.isErr()) {
      this.output.write(this.formatter.alreadyActive(started.error.active));
      return { type: "session_error", error: started.error };
    }
    this.output.write(this.formatter.liveStarted(spec));
    return OK;
  }

  private async liveOff(): Promise<CommandOutcome> {
    const active = this.sessions.activeView();
    if (!active) {
      this.output.write("  No live feed is active.");
      return OK;
    }
    await this.sessions.stop();
    log.debug("Live feed disabled", { stream: describeStream(active.spec) });
    this.output.write(this.formatter.liveStopped(active.spec));
    return OK;
  }

  // ===========================================================================
  // Account commands
  // ===========================================================================

  private executeAccount(command: AccountCommand, account: AccountPort): Promise<CommandOutcome> {
    switch (command.type) {
      case "placeOrder": {
        const intent: OrderIntent = { ...command.order, isTestOnly: this.testOnly };
        return this.render(account.placeOrder(intent), placed => this.formatter.placedOrder(intent, placed));
      }
      case "orders":
        return command.openOnly ?
            this.render(account.getOpenOrders(command.symbol), orders => this.formatter.orders(orders))
          : this.render(account.getOrders(command.symbol, command.limit), orders => this.formatter.orders(orders));
      case "order":
        return command.cancel ?
            this.render(account.cancelOrder(command.symbol, command.ref), order => [
              "  Canceled:",
              this.formatter.order(order),
            ])
          : this.render(account.getOrder(command.symbol, command.ref), order => this.formatter.order(order));
      case "account":
        return this.render(account.getAccountInfo(), info => this.formatter.account(info));
      case "myTrades":
        return this.render(account.getAccountTrades(command.symbol, command.limit), trades =>
          this.formatter.accountTrades(trades),
        );
      case "deposits":
        return this.render(account.getDeposits(command.asset), deposits => this.formatter.deposits(deposits));
      case "withdrawals":
        return this.render(account.getWithdrawals(command.asset), withdrawals =>
          this.formatter.withdrawals(withdrawals),
        );
      case "withdraw":
        return this.render(
          account.withdraw({ asset: command.asset, address: command.address, amount: command.amount }),
          receipt => this.formatter.withdrawReceipt(command.asset, command.address, command.amount, receipt.id),
        );
    }
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  private credentialsRequired(command: CommandType): CommandOutcome {
    this.output.write(API_NOTICE_LINES);
    return { type: "credentials_required", command };
  }

  private async render<T>(
    result: ResultAsync<T, VenueError>,
    format: (value: T) => string | readonly string[],
  ): Promise<CommandOutcome> {
    const settled = await result;
    if (settled.isErr()) {
      this.output.write(this.formatter.venueError(settled.error));
      return { type: "remote_error", error: settled.error };
    }
    this.output.write(format(settled.value));
    return OK;
  }
}
