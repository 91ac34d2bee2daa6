/**
 * Quota read routes.
 *
 * GET /quota            — limits for the calling IP
 * GET /status/:address  — same, plus whether a request would pass right now
 */

import type { FastifyInstance } from "fastify";
import {
  validateStarknetAddress,
  type QuotaResponseV1,
  type StatusResponseV1,
} from "@starkdrip/protocol";
import type { QuotaSnapshot } from "../limits/rate-limiter.js";
import type { FaucetRouteContext } from "./context.js";

export function toQuotaResponse(snapshot: QuotaSnapshot): QuotaResponseV1 {
  return {
    daily_limit: {
      total: snapshot.daily.total,
      used: snapshot.daily.used,
      remaining: snapshot.daily.remaining,
      cooldown_end: snapshot.daily.cooldownUntil,
    },
    hourly_throttle: {
      strk: {
        available: snapshot.throttle.STRK.allowed,
        next_request_at: snapshot.throttle.STRK.nextAvailable,
      },
      eth: {
        available: snapshot.throttle.ETH.allowed,
        next_request_at: snapshot.throttle.ETH.nextAvailable,
      },
    },
  };
}

export function quotaRoutes(app: FastifyInstance, ctx: FaucetRouteContext): void {
  app.get("/quota", async (request, reply) => {
    const snapshot = await ctx.limiter.getQuota(request.ip);
    return reply.send(toQuotaResponse(snapshot));
  });

  app.get<{ Params: { address: string } }>("/status/:address", async (request, reply) => {
    const check = validateStarknetAddress(request.params.address);
    if (!check.ok) {
      return reply.status(400).send({
        error: "invalid_address",
        message: check.reason,
        gate: "validation",
      });
    }

    const snapshot = await ctx.limiter.getQuota(request.ip);
    const anyTokenAvailable = snapshot.throttle.ETH.allowed || snapshot.throttle.STRK.allowed;
    const body: StatusResponseV1 = {
      address: check.address,
      can_request:
        snapshot.daily.cooldownUntil === null &&
        snapshot.daily.remaining > 0 &&
        anyTokenAvailable,
      ...toQuotaResponse(snapshot),
    };
    return reply.send(body);
  });
}
