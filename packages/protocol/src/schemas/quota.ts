/**
 * Quota read models — GET /quota and GET /status/:address.
 * Timestamps are unix ms.
 */

import { Type, type Static } from "@sinclair/typebox";

export const DailyLimitV1 = Type.Object({
  total: Type.Integer({ minimum: 0 }),
  used: Type.Integer({ minimum: 0 }),
  remaining: Type.Integer({ minimum: 0 }),
  cooldown_end: Type.Union([Type.Integer(), Type.Null()]),
});

export type DailyLimitV1 = Static<typeof DailyLimitV1>;

export const TokenThrottleV1 = Type.Object({
  available: Type.Boolean(),
  next_request_at: Type.Union([Type.Integer(), Type.Null()]),
});

export type TokenThrottleV1 = Static<typeof TokenThrottleV1>;

export const QuotaResponseV1 = Type.Object({
  daily_limit: DailyLimitV1,
  hourly_throttle: Type.Object({
    strk: TokenThrottleV1,
    eth: TokenThrottleV1,
  }),
});

export type QuotaResponseV1 = Static<typeof QuotaResponseV1>;

export const StatusResponseV1 = Type.Intersect([
  Type.Object({
    address: Type.String(),
    can_request: Type.Boolean(),
  }),
  QuotaResponseV1,
]);

export type StatusResponseV1 = Static<typeof StatusResponseV1>;
