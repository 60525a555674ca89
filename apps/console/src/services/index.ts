/**
 * Console Services
 */

export { CommandInterpreter, type AccountCommand, type CommandInterpreterOptions, type CommandOutcome } from "./command-interpreter";
export { ConsoleFormatter, fmt8, fmtPercent, fmtTime } from "./formatters";
export { API_NOTICE_LINES, helpLines } from "./help";
export {
  DEFAULT_STOP_TIMEOUT_MS,
  LiveSessionManager,
  type LiveSessionManagerOptions,
  type SessionError,
  type SessionHandle,
  type SessionState,
  type SessionView,
  type StreamFault,
  type StreamFaultReason,
} from "./live-session-manager";
export { StreamOutputSink, type OutputSink } from "./output-sink";
export {
  lastCandles,
  newestTrades,
  QueryResolver,
  topOfBook,
  truncateBook,
  type QueryResult,
  type QuerySource,
  type SnapshotSource,
} from "./query-resolver";
