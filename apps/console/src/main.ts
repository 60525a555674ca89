/**
 * Console Main Entry Point
 *
 * - Composition root: REST client, ports, live session manager, resolver, interpreter
 * - Line-oriented read loop; each command is awaited before the next line is read
 * - Live updates, faults and log lines go through the same OutputSink
 * - SIGINT/SIGTERM and `quit` stop the live session before exiting
 */

import { createInterface } from "node:readline";

import {
  SpotAccountAdapter,
  SpotConfigSchema,
  SpotLiveStreams,
  SpotMarketDataAdapter,
  SpotRestClient,
} from "@spot-console/adapters";
import { formatLogRecord, logger, Style } from "@spot-console/utils";

import { resolveCredentials } from "./config";
import { env } from "./env";
import {
  API_NOTICE_LINES,
  CommandInterpreter,
  ConsoleFormatter,
  helpLines,
  LiveSessionManager,
  QueryResolver,
  StreamOutputSink,
} from "./services";

/**
 * Main console function
 */
async function main(): Promise<void> {
  const style = new Style({ noColor: env.NO_COLOR !== undefined });
  const output = new StreamOutputSink();

  logger.setLevel(env.LOG_LEVEL);
  logger.setSink({
    write: record => {
      output.write(formatLogRecord(record, { color: style.enabled() }));
    },
  });

  // Initialize adapters
  const credentials = resolveCredentials(env);
  const spotConfig = SpotConfigSchema.parse({
    restUrl: env.SPOT_REST_URL,
    streamUrl: env.SPOT_STREAM_URL,
    apiKey: credentials?.apiKey,
    apiSecret: credentials?.apiSecret,
    recvWindowMs: env.SPOT_RECV_WINDOW_MS,
    requestTimeoutMs: env.SPOT_REQUEST_TIMEOUT_MS,
  });
  const client = new SpotRestClient(spotConfig);
  const marketData = new SpotMarketDataAdapter(client);
  const account = credentials ? new SpotAccountAdapter(client) : undefined;
  const streams = new SpotLiveStreams({ streamUrl: spotConfig.streamUrl, marketData, account });

  // Session / query coordination
  const sessions = new LiveSessionManager({ streams, stopTimeoutMs: env.LIVE_STOP_TIMEOUT_MS });
  const resolver = new QueryResolver(sessions, marketData);
  const formatter = new ConsoleFormatter(style);
  const interpreter = new CommandInterpreter({
    marketData,
    account,
    sessions,
    resolver,
    output,
    formatter,
  });

  sessions.onUpdate(snapshot => {
    output.write(formatter.liveUpdate(snapshot));
  });
  sessions.onFault(fault => {
    output.write(formatter.streamFault(fault));
  });

  logger.info("Starting console", { restUrl: env.SPOT_REST_URL, streamUrl: env.SPOT_STREAM_URL });

  output.write(helpLines());
  if (!credentials) {
    output.write(API_NOTICE_LINES);
  }

  const input = createInterface({ input: process.stdin, terminal: false });

  // Graceful shutdown
  let shuttingDown: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    shuttingDown ??= (async () => {
      logger.info("Shutting down...");
      input.close();
      await sessions.stop();
      logger.info("Shutdown complete");
    })();
    return shuttingDown;
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  for await (const line of input) {
    try {
      const outcome = await interpreter.execute(line);
      if (outcome.type === "quit") break;
    } catch (error) {
      logger.error("Command failed", { error });
    }
  }

  await shutdown();
}

// Run
main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exitCode = 1;
});
