/**
 * Console Environment Configuration
 *
 * - Type-safe environment variables with Zod validation
 * - Venue endpoints, optional API credentials, timeouts and output settings
 *
 * See .env.example for the template.
 */

import { createEnv } from "@t3-oss/env-core";
import { LogLevel } from "@spot-console/utils";
import { z } from "zod";

type RuntimeEnv = Record<string, string | undefined>;

/**
 * Validate a runtime environment. Throws when a value is present but invalid.
 */
export function createConsoleEnv(runtimeEnv: RuntimeEnv) {
  return createEnv({
    server: {
      // =========================================================================
      // Venue
      // =========================================================================

      /**
       * REST base URL, without the /api path
       */
      SPOT_REST_URL: z.url().default("https://api.binance.com"),

      /**
       * WebSocket base URL; streams are opened under /ws
       */
      SPOT_STREAM_URL: z.url().default("wss://stream.binance.com:9443"),

      // =========================================================================
      // Credentials
      // =========================================================================

      /**
       * Both key and secret are needed for orders, account reads and the account stream.
       * Never commit real values.
       */
      SPOT_API_KEY: z.string().optional(),
      SPOT_API_SECRET: z.string().optional(),

      /**
       * Window in which the venue accepts a signed request (ms)
       */
      SPOT_RECV_WINDOW_MS: z.coerce.number().int().positive().max(60_000).default(5_000),

      SPOT_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

      // =========================================================================
      // Live session
      // =========================================================================

      /**
       * Upper bound on waiting for a live worker to finish after `live off`
       */
      LIVE_STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

      // =========================================================================
      // Output
      // =========================================================================

      /**
       * ERROR | WARN | LOG | INFO | DEBUG
       */
      LOG_LEVEL: z.enum(LogLevel).default(LogLevel.INFO),

      /**
       * Any value disables ANSI colours
       */
      NO_COLOR: z.string().optional(),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
  });
}

export type ConsoleEnv = ReturnType<typeof createConsoleEnv>;

export interface ApiCredentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Credentials when both halves are configured, otherwise undefined
 */
export function resolveCredentials(env: Pick<ConsoleEnv, "SPOT_API_KEY" | "SPOT_API_SECRET">): ApiCredentials | undefined {
  if (env.SPOT_API_KEY === undefined || env.SPOT_API_SECRET === undefined) return undefined;
  return { apiKey: env.SPOT_API_KEY, apiSecret: env.SPOT_API_SECRET };
}
