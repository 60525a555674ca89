/**
 * Account Port - Interface for authenticated account operations
 *
 * - Orders, balances, trade history, deposits and withdrawals
 * - User data stream keys for the live account stream
 */

import type { ResultAsync } from "neverthrow";
import type { Ms, OrderIntent, OrderRef, PriceStr, QtyStr, Side } from "@spot-console/core";

import type { VenueError } from "./market-data-port";

/**
 * Order as reported by the venue
 */
export interface Order {
  symbol: string;
  orderId: number;
  clientOrderId: string;
  side: Side;
  type: string;
  status: string;
  price: PriceStr;
  stopPrice?: PriceStr;
  origQty: QtyStr;
  executedQty: QtyStr;
  time: Ms;
}

/**
 * Result of placing an order. Test-only orders are validated by the venue but
 * never reach the matching engine, so they carry no order.
 */
export type PlacedOrder = { isTestOnly: true } | { isTestOnly: false; order: Order };

export interface Balance {
  asset: string;
  free: QtyStr;
  locked: QtyStr;
}

export interface AccountInfo {
  canTrade: boolean;
  canWithdraw: boolean;
  canDeposit: boolean;
  updateTime: Ms;
  balances: Balance[];
}

/**
 * A fill of one of the account's orders
 */
export interface AccountTrade {
  id: number;
  symbol: string;
  orderId: number;
  price: PriceStr;
  quantity: QtyStr;
  commission: QtyStr;
  commissionAsset: string;
  time: Ms;
  isBuyer: boolean;
  isMaker: boolean;
}

export interface Deposit {
  asset: string;
  amount: QtyStr;
  address: string;
  txId: string;
  status: number;
  insertTime: Ms;
}

export interface Withdrawal {
  id: string;
  asset: string;
  amount: QtyStr;
  address: string;
  txId?: string;
  status: number;
  applyTime: string;
}

export interface WithdrawRequest {
  asset: string;
  address: string;
  amount: QtyStr;
}

/**
 * Account Port interface
 */
export interface AccountPort {
  /**
   * Place an order, or only validate it when `isTestOnly` is set
   */
  placeOrder(intent: OrderIntent): ResultAsync<PlacedOrder, VenueError>;

  /**
   * Most recent orders for a symbol, newest last
   */
  getOrders(symbol: string, limit: number): ResultAsync<Order[], VenueError>;

  getOpenOrders(symbol: string): ResultAsync<Order[], VenueError>;

  getOrder(symbol: string, ref: OrderRef): ResultAsync<Order, VenueError>;

  cancelOrder(symbol: string, ref: OrderRef): ResultAsync<Order, VenueError>;

  getAccountInfo(): ResultAsync<AccountInfo, VenueError>;

  getAccountTrades(symbol: string, limit: number): ResultAsync<AccountTrade[], VenueError>;

  getDeposits(asset?: string): ResultAsync<Deposit[], VenueError>;

  getWithdrawals(asset?: string): ResultAsync<Withdrawal[], VenueError>;

  /**
   * Submit a withdrawal. Never test-only.
   */
  withdraw(request: WithdrawRequest): ResultAsync<{ id: string }, VenueError>;

  // User data stream

  openUserStream(): ResultAsync<string, VenueError>;

  keepAliveUserStream(listenKey: string): ResultAsync<void, VenueError>;

  closeUserStream(listenKey: string): ResultAsync<void, VenueError>;
}
