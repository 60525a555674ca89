/**
 * Spot Account Adapter
 *
 * - Signed order, account, history and capital endpoints
 * - Test-only orders go to the venue's order test endpoint
 * - User data stream listen keys (API key header, unsigned)
 */

import type { ResultAsync } from "neverthrow";
import type { OrderIntent, OrderRef } from "@spot-console/core";
import { z } from "zod";

import type {
  AccountInfo,
  AccountPort,
  AccountTrade,
  Deposit,
  Order,
  PlacedOrder,
  VenueError,
  Withdrawal,
  WithdrawRequest,
} from "../ports";
import { toOrder } from "./mappers";
import type { QueryParams, SpotRestClient } from "./rest-client";
import {
  AccountSchema,
  DepositSchema,
  EmptySchema,
  ListenKeySchema,
  MyTradeSchema,
  OrderSchema,
  WithdrawalSchema,
  WithdrawReceiptSchema,
} from "./types";

/**
 * Venue order type for an intent. A stop price turns it into a stop-loss order.
 */
export function venueOrderType(intent: OrderIntent): string {
  if (intent.type === "market") {
    return intent.stopPrice === undefined ? "MARKET" : "STOP_LOSS";
  }
  return intent.stopPrice === undefined ? "LIMIT" : "STOP_LOSS_LIMIT";
}

function orderRefParams(ref: OrderRef): QueryParams {
  return "orderId" in ref ? { orderId: ref.orderId } : { origClientOrderId: ref.clientOrderId };
}

export class SpotAccountAdapter implements AccountPort {
  private client: SpotRestClient;

  constructor(client: SpotRestClient) {
    this.client = client;
  }

  placeOrder(intent: OrderIntent): ResultAsync<PlacedOrder, VenueError> {
    const params: QueryParams = {
      symbol: intent.symbol,
      side: intent.side.toUpperCase(),
      type: venueOrderType(intent),
      timeInForce: intent.type === "limit" ? "GTC" : undefined,
      quantity: intent.quantity,
      price: intent.price,
      stopPrice: intent.stopPrice,
      newOrderRespType: "RESULT",
    };

    if (intent.isTestOnly) {
      return this.client
        .signed("POST", "/api/v3/order/test", params, EmptySchema)
        .map((): PlacedOrder => ({ isTestOnly: true }));
    }

    return this.client
      .signed("POST", "/api/v3/order", params, OrderSchema)
      .map((order): PlacedOrder => ({ isTestOnly: false, order: toOrder(order) }));
  }

  getOrders(symbol: string, limit: number): ResultAsync<Order[], VenueError> {
    return this.client
      .signed("GET", "/api/v3/allOrders", { symbol, limit }, z.array(OrderSchema))
      .map(orders => orders.map(toOrder));
  }

  getOpenOrders(symbol: string): ResultAsync<Order[], VenueError> {
    return this.client
      .signed("GET", "/api/v3/openOrders", { symbol }, z.array(OrderSchema))
      .map(orders => orders.map(toOrder));
  }

  getOrder(symbol: string, ref: OrderRef): ResultAsync<Order, VenueError> {
    return this.client.signed("GET", "/api/v3/order", { symbol, ...orderRefParams(ref) }, OrderSchema).map(toOrder);
  }

  cancelOrder(symbol: string, ref: OrderRef): ResultAsync<Order, VenueError> {
    return this.client.signed("DELETE", "/api/v3/order", { symbol, ...orderRefParams(ref) }, OrderSchema).map(toOrder);
  }

  getAccountInfo(): ResultAsync<AccountInfo, VenueError> {
    return this.client.signed("GET", "/api/v3/account", {}, AccountSchema);
  }

  getAccountTrades(symbol: string, limit: number): ResultAsync<AccountTrade[], VenueError> {
    return this.client.signed("GET", "/api/v3/myTrades", { symbol, limit }, z.array(MyTradeSchema)).map(trades =>
      trades.map(trade => ({
        id: trade.id,
        symbol: trade.symbol,
        orderId: trade.orderId,
        price: trade.price,
        quantity: trade.qty,
        commission: trade.commission,
        commissionAsset: trade.commissionAsset,
        time: trade.time,
        isBuyer: trade.isBuyer,
        isMaker: trade.isMaker,
      })),
    );
  }

  getDeposits(asset?: string): ResultAsync<Deposit[], VenueError> {
    return this.client
      .signed("GET", "/sapi/v1/capital/deposit/hisrec", { coin: asset }, z.array(DepositSchema))
      .map(deposits =>
        deposits.map(({ coin, ...deposit }) => ({
          asset: coin,
          ...deposit,
        })),
      );
  }

  getWithdrawals(asset?: string): ResultAsync<Withdrawal[], VenueError> {
    return this.client
      .signed("GET", "/sapi/v1/capital/withdraw/history", { coin: asset }, z.array(WithdrawalSchema))
      .map(withdrawals =>
        withdrawals.map(({ coin, ...withdrawal }) => ({
          asset: coin,
          ...withdrawal,
        })),
      );
  }

  withdraw(request: WithdrawRequest): ResultAsync<{ id: string }, VenueError> {
    return this.client.signed(
      "POST",
      "/sapi/v1/capital/withdraw/apply",
      { coin: request.asset, address: request.address, amount: request.amount },
      WithdrawReceiptSchema,
    );
  }

  // ============================================================================
  // User data stream
  // ============================================================================

  openUserStream(): ResultAsync<string, VenueError> {
    return this.client
      .withApiKey("POST", "/api/v3/userDataStream", {}, ListenKeySchema)
      .map(response => response.listenKey);
  }

  keepAliveUserStream(listenKey: string): ResultAsync<void, VenueError> {
    return this.client.withApiKey("PUT", "/api/v3/userDataStream", { listenKey }, EmptySchema).map(() => undefined);
  }

  closeUserStream(listenKey: string): ResultAsync<void, VenueError> {
    return this.client
      .withApiKey("DELETE", "/api/v3/userDataStream", { listenKey }, EmptySchema)
      .map(() => undefined);
  }
}
