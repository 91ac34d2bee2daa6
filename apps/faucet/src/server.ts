/**
 * Faucet server — proof-of-work gated Starknet token dispenser.
 *
 * Routes:
 *   POST /challenge         — issue a PoW challenge
 *   POST /request           — solve → dispatch ETH, STRK or BOTH
 *   GET  /status/:address   — per-IP quota plus "can request now"
 *   GET  /quota             — per-IP quota
 *   GET  /info              — amounts, limits, live reserve
 *   GET  /health            — liveness + quota store ping
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError } from "fastify";
import { StarknetRpcClient, type ChainClient } from "@starkdrip/chain-client";
import { config as defaultConfig, type FaucetConfig } from "./config.js";
import type { Clock, QuotaStore } from "./store/quota-store.js";
import { MemoryQuotaStore } from "./store/memory-store.js";
import { RedisQuotaStore, createRedisClient } from "./store/redis-store.js";
import { ChallengeEngine } from "./challenge/engine.js";
import { RateLimiter } from "./limits/rate-limiter.js";
import { DistributionGuard } from "./limits/distribution-guard.js";
import { DispatchOrchestrator } from "./dispatch/orchestrator.js";
import type { FaucetRouteContext } from "./routes/context.js";
import { challengeRoutes } from "./routes/challenge.js";
import { requestRoutes } from "./routes/request.js";
import { quotaRoutes } from "./routes/quota.js";
import { infoRoutes } from "./routes/info.js";
import { healthRoutes } from "./routes/health.js";

export interface FaucetDeps {
  quotaStore?: QuotaStore;
  chainClient?: ChainClient;
  /** Overrides on top of the env-derived config. */
  config?: Partial<FaucetConfig>;
  now?: Clock;
}

/** Real Starknet client from config. Throws if the account is not configured. */
export function createChainClient(cfg: Readonly<FaucetConfig>): ChainClient {
  const missing = [
    ["STARKNET_RPC_URL", cfg.starknetRpcUrl],
    ["FAUCET_ADDRESS", cfg.faucetAddress],
    ["FAUCET_PRIVATE_KEY", cfg.faucetPrivateKey],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new Error(`Missing env: ${missing.join(", ")}`);
  }
  return new StarknetRpcClient({
    rpcUrl: cfg.starknetRpcUrl,
    accountAddress: cfg.faucetAddress,
    privateKey: cfg.faucetPrivateKey,
    tokenAddresses: { ETH: cfg.ethTokenAddress, STRK: cfg.strkTokenAddress },
  });
}

/** Redis when REDIS_URL is set, otherwise in-memory (dev mode). */
function createQuotaStore(cfg: Readonly<FaucetConfig>, now: Clock): QuotaStore {
  if (!cfg.redisUrl) return new MemoryQuotaStore(now);
  return new RedisQuotaStore(createRedisClient(cfg.redisUrl));
}

export async function buildApp(deps?: FaucetDeps) {
  const cfg: Readonly<FaucetConfig> = { ...defaultConfig, ...deps?.config };
  const now: Clock = deps?.now ?? (() => Date.now());

  const app = Fastify({
    logger: { level: cfg.logLevel },
    trustProxy: cfg.trustProxy,
  });

  const store = deps?.quotaStore ?? createQuotaStore(cfg, now);
  const chain = deps?.chainClient ?? createChainClient(cfg);

  if (!deps?.quotaStore && !cfg.redisUrl) {
    app.log.warn("REDIS_URL not set, using in-memory quota store (single process only)");
  }

  const challenges = new ChallengeEngine({
    store,
    difficulty: cfg.powDifficulty,
    ttlMs: cfg.challengeTtlSeconds * 1000,
    now,
  });
  const limiter = new RateLimiter({
    store,
    maxRequestsPerDay: cfg.maxRequestsPerDayIp,
    maxChallengesPerHour: cfg.maxChallengesPerHour,
    now,
  });
  const guard = new DistributionGuard({
    store,
    chain,
    faucetAddress: cfg.faucetAddress,
    minBalanceProtectPct: cfg.minBalanceProtectPct,
  });
  const orchestrator = new DispatchOrchestrator({
    challenges,
    limiter,
    guard,
    chain,
    settings: {
      network: cfg.network,
      dripAmounts: { ETH: cfg.dripAmountEth, STRK: cfg.dripAmountStrk },
      caps: {
        ETH: { hourly: cfg.maxTokensPerHourEth, daily: cfg.maxTokensPerDayEth },
        STRK: { hourly: cfg.maxTokensPerHourStrk, daily: cfg.maxTokensPerDayStrk },
      },
      transferTimeoutMs: cfg.transferTimeoutMs,
    },
    log: app.log,
    now,
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({
        error: "invalid_request",
        message: error.message,
        gate: "validation",
      });
    }
    // Fastify's own client errors: unparseable JSON, oversized body, bad content type
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: "invalid_request",
        message: error.message,
        gate: "validation",
      });
    }
    request.log.error({ err: error }, "unhandled error");
    return reply.status(500).send({
      error: "internal_error",
      message: "Internal server error",
    });
  });

  // Evict expired in-memory entries (every 60s)
  if (store instanceof MemoryQuotaStore) {
    const cleanupInterval = setInterval(() => store.cleanup(), 60_000);
    app.addHook("onClose", async () => clearInterval(cleanupInterval));
  }
  if (!deps?.quotaStore) {
    app.addHook("onClose", async () => store.close());
  }

  const ctx: FaucetRouteContext = { config: cfg, orchestrator, limiter, chain, store };
  challengeRoutes(app, ctx);
  requestRoutes(app, ctx);
  quotaRoutes(app, ctx);
  infoRoutes(app, ctx);
  healthRoutes(app, ctx);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── faucet config ───");
  console.log(`  port:              ${defaultConfig.port}`);
  console.log(`  network:           ${defaultConfig.network}`);
  console.log(`  redis:             ${defaultConfig.redisUrl || "(none, in-memory)"}`);
  console.log(`  faucet_address:    ${defaultConfig.faucetAddress || "(not set)"}`);
  console.log(`  pow_difficulty:    ${defaultConfig.powDifficulty}`);
  console.log(`  drip_strk:         ${defaultConfig.dripAmountStrk}`);
  console.log(`  drip_eth:          ${defaultConfig.dripAmountEth}`);
  console.log(`  daily_per_ip:      ${defaultConfig.maxRequestsPerDayIp}`);
  console.log(`  reserve_protect:   ${defaultConfig.minBalanceProtectPct}%`);
  console.log("─────────────────────");

  const app = await buildApp();
  app.listen({ port: defaultConfig.port, host: defaultConfig.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
