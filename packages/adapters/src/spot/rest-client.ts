/**
 * SpotRestClient - REST transport for a Binance-compatible spot API
 *
 * - Public, API-key and signed (HMAC-SHA256) endpoints
 * - Responses validated with zod before they reach the adapters
 * - Transport and HTTP failures mapped to VenueError, never thrown
 */

import { createHmac } from "node:crypto";

import { err, errAsync, ok, ResultAsync, type Result } from "neverthrow";
import { errors, request, type Dispatcher } from "undici";
import type { z } from "zod";
import { logger } from "@spot-console/utils";

import type { VenueError } from "../ports";
import { VenueErrorBodySchema } from "./types";

const log = logger;

const USER_AGENT = "spot-console/0.1";

/** Venue error codes that mean the key, signature or permissions were rejected */
const AUTH_ERROR_CODES = new Set([-1002, -1022, -2014, -2015]);

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface SpotRestClientOptions {
  restUrl: string;
  apiKey?: string;
  apiSecret?: string;
  recvWindowMs: number;
  requestTimeoutMs: number;

  /**
   * Optional undici dispatcher (for testing)
   */
  dispatcher?: Dispatcher;

  /**
   * Clock for request timestamps (for testing)
   */
  now?: () => number;
}

type Security = "none" | "apiKey" | "signed";

interface RawResponse {
  status: number;
  text: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Encode params in insertion order, skipping undefined values
 */
export function buildQuery(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, String(value));
  }
  return search.toString();
}

export function signQuery(query: string, secret: string): string {
  return createHmac("sha256", secret).update(query).digest("hex");
}

function parseJson(text: string): unknown {
  if (text.trim() === "") return {};
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Map a non-2xx response to a VenueError
 */
export function mapStatusError(status: number, body: unknown): VenueError {
  const parsed = VenueErrorBodySchema.safeParse(body);
  const code = parsed.success ? parsed.data.code : undefined;
  const message = parsed.success ? parsed.data.msg : `HTTP ${status}`;

  if (status === 429 || status === 418) {
    return { type: "rate_limit", message, status, code };
  }
  if (status === 401 || (code !== undefined && AUTH_ERROR_CODES.has(code))) {
    return { type: "auth", message, status, code };
  }
  if (status >= 500) {
    return { type: "exchange_error", message, status, code };
  }
  // -11xx are malformed-request codes; other codes are venue rejections
  if (code === undefined || (code <= -1100 && code >= -1199)) {
    return { type: "invalid_request", message, status, code };
  }
  return { type: "exchange_error", message, status, code };
}

export function mapTransportError(error: unknown): VenueError {
  if (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError
  ) {
    return { type: "timeout", message: error.message };
  }
  if (error instanceof Error) {
    return { type: "network", message: error.message };
  }
  return { type: "unknown", message: String(error) };
}

// ============================================================================
// SpotRestClient
// ============================================================================

export class SpotRestClient {
  private restUrl: string;
  private apiKey: string | undefined;
  private apiSecret: string | undefined;
  private recvWindowMs: number;
  private requestTimeoutMs: number;
  private dispatcher: Dispatcher | undefined;
  private now: () => number;

  constructor(options: SpotRestClientOptions) {
    this.restUrl = options.restUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.recvWindowMs = options.recvWindowMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.dispatcher = options.dispatcher;
    this.now = options.now ?? Date.now;
  }

  /**
   * Unauthenticated GET
   */
  public<T>(path: string, params: QueryParams, schema: z.ZodType<T>): ResultAsync<T, VenueError> {
    return this.send("GET", path, params, "none", schema);
  }

  /**
   * Request carrying the API key header but no signature (user data stream keys)
   */
  withApiKey<T>(method: HttpMethod, path: string, params: QueryParams, schema: z.ZodType<T>): ResultAsync<T, VenueError> {
    return this.send(method, path, params, "apiKey", schema);
  }

  signed<T>(method: HttpMethod, path: string, params: QueryParams, schema: z.ZodType<T>): ResultAsync<T, VenueError> {
    return this.send(method, path, params, "signed", schema);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private send<T>(
    method: HttpMethod,
    path: string,
    params: QueryParams,
    security: Security,
    schema: z.ZodType<T>,
  ): ResultAsync<T, VenueError> {
    const query = this.buildRequestQuery(params, security);
    if (query.isErr()) {
      return errAsync(query.error);
    }

    const headers: Record<string, string> = { "User-Agent": USER_AGENT };
    if (security !== "none" && this.apiKey !== undefined) {
      headers["X-MBX-APIKEY"] = this.apiKey;
    }

    const url = query.value === "" ? `${this.restUrl}${path}` : `${this.restUrl}${path}?${query.value}`;
    log.debug("REST request", { method, path });

    return ResultAsync.fromPromise(this.execute(method, url, headers), mapTransportError).andThen(response =>
      this.parseResponse(path, response, schema),
    );
  }

  private buildRequestQuery(params: QueryParams, security: Security): Result<string, VenueError> {
    if (security === "none") {
      return ok(buildQuery(params));
    }

    if (this.apiKey === undefined) {
      return err({ type: "auth", message: "An API key is required for this request" });
    }
    if (security === "apiKey") {
      return ok(buildQuery(params));
    }

    if (this.apiSecret === undefined) {
      return err({ type: "auth", message: "An API secret is required to sign this request" });
    }

    const query = buildQuery({ ...params, recvWindow: this.recvWindowMs, timestamp: this.now() });
    return ok(`${query}&signature=${signQuery(query, this.apiSecret)}`);
  }

  private async execute(method: HttpMethod, url: string, headers: Record<string, string>): Promise<RawResponse> {
    const response = await request(url, {
      method,
      headers,
      dispatcher: this.dispatcher,
      headersTimeout: this.requestTimeoutMs,
      bodyTimeout: this.requestTimeoutMs,
    });
    const text = await response.body.text();
    return { status: response.statusCode, text };
  }

  private parseResponse<T>(path: string, response: RawResponse, schema: z.ZodType<T>): Result<T, VenueError> {
    const body = parseJson(response.text);

    if (response.status < 200 || response.status >= 300) {
      const error = mapStatusError(response.status, body);
      log.debug("REST request failed", { path, status: response.status, type: error.type });
      return err(error);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return err({
        type: "invalid_response",
        message: `Unexpected response from ${path}${issue ? `: ${issue.message}` : ""}`,
      });
    }

    return ok(parsed.data);
  }
}
