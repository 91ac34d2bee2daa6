/**
 * POST /request — dispatch tokens to an address.
 *
 * Body: { address, token: "ETH" | "STRK" | "BOTH", challenge_id, nonce, difficulty? }
 * The orchestrator decides the status code; see dispatch/orchestrator.ts.
 */

import type { FastifyInstance } from "fastify";
import { DispatchRequestV1 } from "@starkdrip/protocol";
import { rejectionBody } from "../dispatch/gate.js";
import type { FaucetRouteContext } from "./context.js";

export function requestRoutes(app: FastifyInstance, ctx: FaucetRouteContext): void {
  app.post<{ Body: DispatchRequestV1 }>(
    "/request",
    { schema: { body: DispatchRequestV1 } },
    async (request, reply) => {
      const { address, token, challenge_id, nonce, difficulty } = request.body;
      const result = await ctx.orchestrator.dispatch(
        {
          ip: request.ip,
          address,
          token,
          challengeId: challenge_id,
          nonce,
          difficulty,
        },
        request.log,
      );

      if (!result.ok) {
        const { rejection } = result;
        request.log.info(
          { gate: rejection.gate, code: rejection.code, ip: request.ip },
          "request rejected",
        );
        return reply.status(rejection.status).send(rejectionBody(rejection));
      }
      return reply.send(result.value);
    },
  );
}
