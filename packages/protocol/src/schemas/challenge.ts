/**
 * Challenge wire types — POST /challenge.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex = Type.String({ pattern: "^[0-9a-f]+$" });

export const ChallengeResponseV1 = Type.Object(
  {
    challenge_id: Hex,
    challenge: Hex,
    difficulty: Type.Integer({ minimum: 0, maximum: 64 }),
    /** Unix ms after which the challenge can no longer be redeemed. */
    expires_at: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type ChallengeResponseV1 = Static<typeof ChallengeResponseV1>;
