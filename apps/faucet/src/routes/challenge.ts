/**
 * POST /challenge — issue a proof-of-work challenge.
 * Limited per IP per hour; rejected attempts are not counted.
 */

import type { FastifyInstance } from "fastify";
import { rejectionBody } from "../dispatch/gate.js";
import type { FaucetRouteContext } from "./context.js";

export function challengeRoutes(app: FastifyInstance, ctx: FaucetRouteContext): void {
  app.post("/challenge", async (request, reply) => {
    const result = await ctx.orchestrator.issueChallenge(request.ip);
    if (!result.ok) {
      return reply.status(result.rejection.status).send(rejectionBody(result.rejection));
    }
    return reply.send(result.value);
  });
}
