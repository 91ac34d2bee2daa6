/**
 * GET /info
 * Amounts, limits, PoW settings and live reserve balances.
 */

import type { FastifyInstance } from "fastify";
import {
  TOKEN_THROTTLE_MS,
  formatUnits,
  parseUnits,
  type InfoResponseV1,
  type Token,
} from "@starkdrip/protocol";
import type { FaucetRouteContext } from "./context.js";

const BALANCE_FRACTION_DIGITS = 6;

export function infoRoutes(app: FastifyInstance, ctx: FaucetRouteContext): void {
  const { config } = ctx;

  app.get("/info", async (request, reply) => {
    const balanceOf = async (token: Token): Promise<string | null> => {
      try {
        const balance = await ctx.chain.getBalance(config.faucetAddress, token);
        return formatUnits(balance, undefined, BALANCE_FRACTION_DIGITS);
      } catch (err) {
        request.log.warn({ err, token }, "faucet balance unavailable");
        return null;
      }
    };
    const [strk, eth] = await Promise.all([balanceOf("STRK"), balanceOf("ETH")]);

    const body: InfoResponseV1 = {
      network: config.network,
      limits: {
        strk_per_request: formatUnits(parseUnits(config.dripAmountStrk)),
        eth_per_request: formatUnits(parseUnits(config.dripAmountEth)),
        daily_requests_per_ip: config.maxRequestsPerDayIp,
        token_throttle_hours: TOKEN_THROTTLE_MS / 3_600_000,
        challenges_per_hour: config.maxChallengesPerHour,
      },
      pow: {
        enabled: config.powDifficulty > 0,
        difficulty: config.powDifficulty,
      },
      faucet_balance: { strk, eth },
    };
    return reply.send(body);
  });
}
