/**
 * packages/adapters - Venue Adapters
 *
 * - Port interfaces for venue-agnostic market data, account and live streams
 * - Spot venue implementations (REST + WebSocket)
 */

// Port interfaces
export * from "./ports";

// Spot adapter
export * from "./spot";
