/**
 * GET /health — liveness plus a quota store round trip.
 */

import type { FastifyInstance } from "fastify";
import type { HealthResponseV1 } from "@starkdrip/protocol";
import type { FaucetRouteContext } from "./context.js";

export function healthRoutes(app: FastifyInstance, ctx: FaucetRouteContext): void {
  app.get("/health", async (request, reply) => {
    try {
      await ctx.store.ping();
    } catch (err) {
      request.log.error({ err }, "quota store unreachable");
      const body: HealthResponseV1 = {
        status: "unavailable",
        timestamp: Date.now(),
        error: "quota_store_unreachable",
      };
      return reply.status(503).send(body);
    }
    const body: HealthResponseV1 = { status: "ok", timestamp: Date.now() };
    return reply.send(body);
  });
}
