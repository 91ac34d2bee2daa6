/**
 * Faucet configuration.
 * All env access centralized here; no direct process.env elsewhere.
 */

import {
  POW_DIFFICULTY_DEFAULT,
  CHALLENGE_TTL_SECONDS_DEFAULT,
  DRIP_AMOUNT_STRK_DEFAULT,
  DRIP_AMOUNT_ETH_DEFAULT,
  MAX_REQUESTS_PER_DAY_IP_DEFAULT,
  MAX_CHALLENGES_PER_HOUR_DEFAULT,
  MIN_BALANCE_PROTECT_PCT_DEFAULT,
  ETH_TOKEN_ADDRESS_DEFAULT,
  STRK_TOKEN_ADDRESS_DEFAULT,
} from "@starkdrip/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export interface FaucetConfig {
  port: number;
  host: string;
  logLevel: string;
  /** Trust X-Forwarded-For when behind a reverse proxy. */
  trustProxy: boolean;
  /** "sepolia" | "mainnet"; selects the explorer. */
  network: string;
  /** Empty = in-memory quota store (dev mode, single process only). */
  redisUrl: string;

  starknetRpcUrl: string;
  faucetAddress: string;
  faucetPrivateKey: string;
  ethTokenAddress: string;
  strkTokenAddress: string;

  powDifficulty: number;
  challengeTtlSeconds: number;
  /** Decimal token amounts per request. */
  dripAmountStrk: string;
  dripAmountEth: string;

  maxRequestsPerDayIp: number;
  maxChallengesPerHour: number;

  /** Global distribution caps in decimal tokens. "0" = disabled. */
  maxTokensPerHourStrk: string;
  maxTokensPerDayStrk: string;
  maxTokensPerHourEth: string;
  maxTokensPerDayEth: string;
  /** Refuse transfers that would leave less than this % of the pre-transfer balance. */
  minBalanceProtectPct: number;
  /** Chain transfer deadline; a timeout counts as a failed transfer. */
  transferTimeoutMs: number;
}

export const config: Readonly<FaucetConfig> = Object.freeze({
  port: parseInt(env("FAUCET_PORT", "3000"), 10),
  host: env("FAUCET_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  trustProxy: env("TRUST_PROXY", "false") === "true",
  network: env("NETWORK", "sepolia"),
  redisUrl: env("REDIS_URL", ""),

  starknetRpcUrl: env("STARKNET_RPC_URL", ""),
  faucetAddress: env("FAUCET_ADDRESS", ""),
  faucetPrivateKey: env("FAUCET_PRIVATE_KEY", ""),
  ethTokenAddress: env("ETH_TOKEN_ADDRESS", ETH_TOKEN_ADDRESS_DEFAULT),
  strkTokenAddress: env("STRK_TOKEN_ADDRESS", STRK_TOKEN_ADDRESS_DEFAULT),

  powDifficulty: parseInt(env("POW_DIFFICULTY", String(POW_DIFFICULTY_DEFAULT)), 10),
  challengeTtlSeconds: parseInt(env("CHALLENGE_TTL", String(CHALLENGE_TTL_SECONDS_DEFAULT)), 10),
  dripAmountStrk: env("DRIP_AMOUNT_STRK", DRIP_AMOUNT_STRK_DEFAULT),
  dripAmountEth: env("DRIP_AMOUNT_ETH", DRIP_AMOUNT_ETH_DEFAULT),

  maxRequestsPerDayIp: parseInt(
    env("MAX_REQUESTS_PER_DAY_IP", String(MAX_REQUESTS_PER_DAY_IP_DEFAULT)),
    10,
  ),
  maxChallengesPerHour: parseInt(
    env("MAX_CHALLENGES_PER_HOUR", String(MAX_CHALLENGES_PER_HOUR_DEFAULT)),
    10,
  ),

  maxTokensPerHourStrk: env("MAX_TOKENS_PER_HOUR_STRK", "0"),
  maxTokensPerDayStrk: env("MAX_TOKENS_PER_DAY_STRK", "0"),
  maxTokensPerHourEth: env("MAX_TOKENS_PER_HOUR_ETH", "0"),
  maxTokensPerDayEth: env("MAX_TOKENS_PER_DAY_ETH", "0"),
  minBalanceProtectPct: parseInt(
    env("MIN_BALANCE_PROTECT_PCT", String(MIN_BALANCE_PROTECT_PCT_DEFAULT)),
    10,
  ),
  transferTimeoutMs: parseInt(env("TRANSFER_TIMEOUT_MS", "60000"), 10),
});

/** Block explorer link for a transaction on the configured network. */
export function explorerUrl(network: string, txHash: string): string {
  if (network === "mainnet") {
    return `https://voyager.online/tx/${txHash}`;
  }
  return `https://sepolia.voyager.online/tx/${txHash}`;
}
