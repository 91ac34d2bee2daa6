/**
 * Faucet proof of work.
 *
 * pow_hash = hex(SHA256(utf8(payload || decimal(nonce))))
 * valid if: pow_hash starts with `difficulty` hex zeros
 *
 * Expected attempts scale as 16^difficulty.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { POW_MAX_ATTEMPTS, POW_HASHES_PER_SECOND_ESTIMATE } from "./constants.js";

/**
 * Compute the PoW hash for a challenge payload and nonce.
 * The nonce is appended in decimal form, no separator.
 */
export function computePowHash(payload: string, nonce: number): string {
  return bytesToHex(sha256(utf8ToBytes(`${payload}${nonce}`)));
}

/** Number of leading '0' characters in a hex digest. */
export function leadingZeroHexCount(hashHex: string): number {
  let count = 0;
  while (count < hashHex.length && hashHex[count] === "0") {
    count++;
  }
  return count;
}

/** Check if a hex digest meets a leading-zero difficulty. */
export function powMeetsDifficulty(hashHex: string, difficulty: number): boolean {
  return leadingZeroHexCount(hashHex) >= difficulty;
}

/** Valid nonces are non-negative safe integers. */
export function isValidNonce(nonce: number): boolean {
  return Number.isSafeInteger(nonce) && nonce >= 0;
}

export interface SolveOptions {
  /** Give up after this many hashes. Default POW_MAX_ATTEMPTS. */
  maxAttempts?: number;
  /** First nonce to try. Default 0. */
  startNonce?: number;
  /** Called every `progressInterval` attempts with the attempt count. */
  onProgress?: (attempts: number) => void;
  progressInterval?: number;
}

export interface PowSolution {
  nonce: number;
  powHash: string;
  attempts: number;
}

/**
 * Brute-force the smallest nonce (from startNonce) whose hash meets difficulty.
 * Throws after maxAttempts.
 */
export function solvePow(
  payload: string,
  difficulty: number,
  opts: SolveOptions = {},
): PowSolution {
  const maxAttempts = opts.maxAttempts ?? POW_MAX_ATTEMPTS;
  const progressInterval = opts.progressInterval ?? 10_000;
  const start = opts.startNonce ?? 0;

  for (let attempts = 1; attempts <= maxAttempts; attempts++) {
    const nonce = start + attempts - 1;
    const powHash = computePowHash(payload, nonce);
    if (powMeetsDifficulty(powHash, difficulty)) {
      return { nonce, powHash, attempts };
    }
    if (opts.onProgress && attempts % progressInterval === 0) {
      opts.onProgress(attempts);
    }
  }
  throw new Error(`PoW: no valid nonce found in ${maxAttempts} attempts`);
}

/**
 * Rough solve-time estimate in seconds (16^d attempts, +20% buffer, min 1s).
 */
export function estimateSolveSeconds(
  difficulty: number,
  hashesPerSecond: number = POW_HASHES_PER_SECOND_ESTIMATE,
): number {
  const attempts = 16 ** difficulty;
  const seconds = Math.floor((attempts / hashesPerSecond) * 1.2);
  return Math.max(1, seconds);
}
