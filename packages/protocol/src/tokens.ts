/**
 * Token types and decimal ↔ base-unit conversion.
 *
 * Amounts cross the wire and the config as decimal strings ("0.01") and
 * are converted to bigint base units (10^-18) before any chain call.
 */

import { TOKEN_DECIMALS, LEDGER_DECIMALS } from "./constants.js";

export const TOKENS = ["ETH", "STRK"] as const;
export type Token = (typeof TOKENS)[number];
export type TokenSelection = Token | "BOTH";

/** Dispatch order for a BOTH request. */
export const BOTH_DISPATCH_ORDER: readonly Token[] = ["STRK", "ETH"];

export function isToken(value: string): value is Token {
  return value === "ETH" || value === "STRK";
}

/** Case-insensitive parse of a requested token. Null when unknown. */
export function parseTokenSelection(raw: string): TokenSelection | null {
  const upper = raw.trim().toUpperCase();
  if (upper === "BOTH") return "BOTH";
  return isToken(upper) ? upper : null;
}

/** Tokens dispatched for a selection, in order. */
export function tokensFor(selection: TokenSelection): Token[] {
  return selection === "BOTH" ? [...BOTH_DISPATCH_ORDER] : [selection];
}

const DECIMAL_RE = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a non-negative decimal string into integer units of 10^-decimals.
 * Throws on malformed input or excess precision.
 */
export function parseUnits(amount: string, decimals: number = TOKEN_DECIMALS): bigint {
  const match = DECIMAL_RE.exec(amount.trim());
  if (!match) {
    throw new Error(`Invalid decimal amount: "${amount}"`);
  }
  const whole = match[1] ?? "0";
  const fraction = match[2] ?? "";
  if (fraction.length > decimals) {
    throw new Error(`Amount "${amount}" has more than ${decimals} decimal places`);
  }
  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

/**
 * Format integer units back to a decimal string.
 * Trailing fractional zeros are dropped; `maxFractionDigits` truncates.
 */
export function formatUnits(
  value: bigint,
  decimals: number = TOKEN_DECIMALS,
  maxFractionDigits: number = decimals,
): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const fraction = (abs % base)
    .toString()
    .padStart(decimals, "0")
    .slice(0, maxFractionDigits)
    .replace(/0+$/, "");
  const sign = negative ? "-" : "";
  if (fraction.length === 0) return `${sign}${whole}`;
  return `${sign}${whole}.${fraction}`;
}

/**
 * Convert a decimal token amount to global ledger units (10^-6 token).
 * Ledger units are plain numbers so the store can add them atomically.
 */
export function toLedgerUnits(amount: string): number {
  const units = parseUnits(amount, LEDGER_DECIMALS);
  if (units > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new Error(`Amount "${amount}" exceeds ledger range`);
  }
  return Number(units);
}
