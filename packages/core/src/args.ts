/**
 * Positional argument parsing.
 *
 * Optional numeric arguments that do not parse fall back to a default rather than
 * failing the command. Callers that need a hard failure check for `undefined`.
 */

import Decimal from "decimal.js";

export const DEFAULT_SYMBOL = "BTCUSDT";
export const DEFAULT_LIMIT = 10;

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a whole number. Returns undefined for anything else, including values
 * outside the safe integer range.
 */
export function tryParseInt(token: string | undefined): number | undefined {
  if (token === undefined || !INTEGER_RE.test(token)) return undefined;
  const n = Number(token);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function tryParseDecimal(token: string | undefined): Decimal | undefined {
  if (token === undefined || !DECIMAL_RE.test(token)) return undefined;
  return new Decimal(token);
}

/**
 * A decimal strictly greater than zero, as a normalized string.
 */
export function parsePositiveDecimal(token: string | undefined): string | undefined {
  const d = tryParseDecimal(token);
  return d !== undefined && d.gt(0) ? d.toString() : undefined;
}

/**
 * Limit argument: a positive integer, else the fallback.
 */
export function parseLimit(token: string | undefined, fallback: number = DEFAULT_LIMIT): number {
  const n = tryParseInt(token);
  return n !== undefined && n >= 1 ? n : fallback;
}

export function normalizeSymbol(token: string | undefined): string {
  return token === undefined || token === "" ? DEFAULT_SYMBOL : token.toUpperCase();
}

/**
 * Disambiguate an overloaded `<symbol> [limit]` slot.
 *
 * Phase 1: an integer token is the limit, and the symbol takes its default.
 * Phase 2: anything else is the symbol, and the limit takes its default.
 */
export function parseSymbolOrLimit(token: string | undefined): { symbol: string; limit: number } {
  if (token === undefined) {
    return { symbol: DEFAULT_SYMBOL, limit: DEFAULT_LIMIT };
  }

  const n = tryParseInt(token);
  if (n !== undefined) {
    return { symbol: DEFAULT_SYMBOL, limit: n >= 1 ? n : DEFAULT_LIMIT };
  }

  return { symbol: normalizeSymbol(token), limit: DEFAULT_LIMIT };
}

/**
 * Epoch-millisecond time argument; unparsable values are omitted.
 */
export function parseTimeMs(token: string | undefined): number | undefined {
  const n = tryParseInt(token);
  return n !== undefined && n >= 0 ? n : undefined;
}
