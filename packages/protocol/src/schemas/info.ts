/**
 * Faucet info + health — GET /info, GET /health.
 */

import { Type, type Static } from "@sinclair/typebox";

export const InfoResponseV1 = Type.Object({
  network: Type.String(),
  limits: Type.Object({
    strk_per_request: Type.String(),
    eth_per_request: Type.String(),
    daily_requests_per_ip: Type.Integer(),
    token_throttle_hours: Type.Number(),
    challenges_per_hour: Type.Integer(),
  }),
  pow: Type.Object({
    enabled: Type.Boolean(),
    difficulty: Type.Integer(),
  }),
  /** Live reserve balances as decimal strings; null when the chain read failed. */
  faucet_balance: Type.Object({
    strk: Type.Union([Type.String(), Type.Null()]),
    eth: Type.Union([Type.String(), Type.Null()]),
  }),
});

export type InfoResponseV1 = Static<typeof InfoResponseV1>;

export const HealthResponseV1 = Type.Object({
  status: Type.Union([Type.Literal("ok"), Type.Literal("unavailable")]),
  timestamp: Type.Integer(),
  error: Type.Optional(Type.String()),
});

export type HealthResponseV1 = Static<typeof HealthResponseV1>;
