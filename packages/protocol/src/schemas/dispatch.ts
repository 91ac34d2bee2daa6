/**
 * Dispatch wire types — POST /request.
 *
 * `token` and `address` are plain strings on the wire; the orchestrator
 * validates them so a malformed value gets a specific error code.
 */

import { Type, type Static } from "@sinclair/typebox";

export const DispatchRequestV1 = Type.Object(
  {
    address: Type.String({ maxLength: 256 }),
    token: Type.String({ maxLength: 16 }),
    challenge_id: Type.String({ minLength: 1, maxLength: 128 }),
    nonce: Type.Integer({ minimum: 0 }),
    /** Difficulty the client solved for. Defaults to the challenge's own. */
    difficulty: Type.Optional(Type.Integer({ minimum: 0, maximum: 64 })),
  },
  { additionalProperties: false },
);

export type DispatchRequestV1 = Static<typeof DispatchRequestV1>;

export const TokenName = Type.Union([Type.Literal("ETH"), Type.Literal("STRK")]);

export const TransactionInfoV1 = Type.Object({
  token: TokenName,
  amount: Type.String(),
  tx_hash: Type.String(),
  explorer_url: Type.String(),
});

export type TransactionInfoV1 = Static<typeof TransactionInfoV1>;

export const DispatchFailureV1 = Type.Object({
  token: TokenName,
  error: Type.String(),
  message: Type.String(),
});

export type DispatchFailureV1 = Static<typeof DispatchFailureV1>;

export const SingleDispatchResponseV1 = Type.Object({
  success: Type.Literal(true),
  tx_hash: Type.String(),
  amount: Type.String(),
  token: TokenName,
  explorer_url: Type.String(),
  message: Type.String(),
});

export type SingleDispatchResponseV1 = Static<typeof SingleDispatchResponseV1>;

export const MultiDispatchResponseV1 = Type.Object({
  success: Type.Literal(true),
  transactions: Type.Array(TransactionInfoV1),
  message: Type.String(),
  failures: Type.Optional(Type.Array(DispatchFailureV1)),
});

export type MultiDispatchResponseV1 = Static<typeof MultiDispatchResponseV1>;

export const DispatchResponseV1 = Type.Union([SingleDispatchResponseV1, MultiDispatchResponseV1]);

export type DispatchResponseV1 = Static<typeof DispatchResponseV1>;

/** Every rejection names the gate that failed plus structured retry detail. */
export const ErrorResponseV1 = Type.Object({
  error: Type.String(),
  message: Type.String(),
  gate: Type.Optional(Type.String()),
  used: Type.Optional(Type.Integer()),
  limit: Type.Optional(Type.Integer()),
  cooldown_end: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
  remaining_hours: Type.Optional(Type.Number()),
  token: Type.Optional(Type.String()),
  next_request_at: Type.Optional(Type.Integer()),
  remaining_minutes: Type.Optional(Type.Number()),
  reset_at: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
});

export type ErrorResponseV1 = Static<typeof ErrorResponseV1>;
