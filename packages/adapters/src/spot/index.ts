/**
 * Spot venue adapters
 */

export { SpotAccountAdapter, venueOrderType } from "./account-adapter";
export { SpotLiveStreams, StreamBootstrapError, mergeCandle, toAccountEvent, MAX_HISTORY, SNAPSHOT_DEPTH } from "./live-streams";
export type { SpotLiveStreamsOptions } from "./live-streams";
export { SpotMarketDataAdapter, DEPTH_LIMITS, roundDepthLimit } from "./market-data-adapter";
export { LocalOrderBook } from "./order-book";
export type { ApplyOutcome, DepthDiff } from "./order-book";
export { SpotRestClient, buildQuery, mapStatusError, mapTransportError, signQuery } from "./rest-client";
export type { HttpMethod, QueryParams, SpotRestClientOptions } from "./rest-client";
export { SpotConfigSchema } from "./types";
export type { SpotConfig } from "./types";
export { WsConnection, SpotStreamPaths, defaultConnectionFactory } from "./ws-connection";
export type { IWsConnection, WsConnectionFactory, WsConnectionOptions } from "./ws-connection";
