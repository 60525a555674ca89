/**
 * Validated environment, loaded once at start-up.
 *
 * Import `env` instead of reading `process.env` directly.
 */

import "dotenv/config";

import { createConsoleEnv } from "./config";

export const env = createConsoleEnv(process.env);

export type Env = typeof env;
