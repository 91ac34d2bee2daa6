/**
 * Protocol constants and faucet defaults.
 *
 * Defaults are overridable through the faucet config; the protocol
 * package only carries the values clients and server must agree on.
 */

// ── Proof of work ──────────────────────────────────────────────────
export const POW_DIFFICULTY_DEFAULT = 4;
export const POW_MAX_ATTEMPTS = 100_000_000;
export const POW_HASHES_PER_SECOND_ESTIMATE = 500_000;
export const CHALLENGE_TTL_SECONDS_DEFAULT = 300; // 5 min
export const CHALLENGE_PAYLOAD_BYTES = 32; // 256 bits
export const CHALLENGE_ID_BYTES = 16;

// ── Rate limits ────────────────────────────────────────────────────
export const MAX_REQUESTS_PER_DAY_IP_DEFAULT = 5;
export const MAX_CHALLENGES_PER_HOUR_DEFAULT = 8;
export const DAILY_WINDOW_MS = 24 * 60 * 60_000;
export const HOURLY_WINDOW_MS = 60 * 60_000;
export const DAILY_COOLDOWN_MS = DAILY_WINDOW_MS;
export const TOKEN_THROTTLE_MS = HOURLY_WINDOW_MS;

// ── Tokens ─────────────────────────────────────────────────────────
export const TOKEN_DECIMALS = 18; // ETH and STRK on Starknet
/** Global distribution ledger precision: 1 ledger unit = 10^-6 token. */
export const LEDGER_DECIMALS = 6;
export const DRIP_AMOUNT_STRK_DEFAULT = "10";
export const DRIP_AMOUNT_ETH_DEFAULT = "0.01";
export const MIN_BALANCE_PROTECT_PCT_DEFAULT = 20;

// ── Starknet Sepolia token contracts ───────────────────────────────
export const ETH_TOKEN_ADDRESS_DEFAULT =
  "0x049d36570d4e46f48e99674bd3fcc84644ddd6b96f7c741b1562b82f9e004dc7";
export const STRK_TOKEN_ADDRESS_DEFAULT =
  "0x04718f5a0fc34cc1af16a1cdee98ffb20c31f5cd61d6ab07201858f4287c938d";
