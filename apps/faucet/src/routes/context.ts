import type { ChainClient } from "@starkdrip/chain-client";
import type { FaucetConfig } from "../config.js";
import type { DispatchOrchestrator } from "../dispatch/orchestrator.js";
import type { RateLimiter } from "../limits/rate-limiter.js";
import type { QuotaStore } from "../store/quota-store.js";

/** Collaborators shared by every faucet route. */
export interface FaucetRouteContext {
  config: Readonly<FaucetConfig>;
  orchestrator: DispatchOrchestrator;
  limiter: RateLimiter;
  chain: ChainClient;
  store: QuotaStore;
}
