/**
 * Challenge engine — issues and verifies proof-of-work challenges.
 *
 * Records live in the quota store under `challenge:<id>` with a TTL.
 * verify() is pure; single use is enforced by the orchestrator calling
 * consume() right after a successful verification.
 */

import { randomBytes as nodeRandomBytes } from "node:crypto";
import {
  CHALLENGE_ID_BYTES,
  CHALLENGE_PAYLOAD_BYTES,
  computePowHash,
  isValidNonce,
  powMeetsDifficulty,
} from "@starkdrip/protocol";
import type { Clock, QuotaStore } from "../store/quota-store.js";

export interface ChallengeRecord {
  id: string;
  payload: string;
  difficulty: number;
  createdAt: number;
  expiresAt: number;
}

export interface ChallengeEngineOptions {
  store: QuotaStore;
  difficulty: number;
  ttlMs: number;
  now?: Clock;
  randomBytes?: (size: number) => Buffer;
}

export function challengeKey(id: string): string {
  return `challenge:${id}`;
}

export class ChallengeEngine {
  private readonly store: QuotaStore;
  private readonly now: Clock;
  private readonly randomBytes: (size: number) => Buffer;
  readonly difficulty: number;
  readonly ttlMs: number;

  constructor(opts: ChallengeEngineOptions) {
    this.store = opts.store;
    this.difficulty = opts.difficulty;
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? (() => Date.now());
    this.randomBytes = opts.randomBytes ?? nodeRandomBytes;
  }

  /** Generate a fresh challenge and persist it with the configured TTL. */
  async issue(): Promise<ChallengeRecord> {
    const createdAt = this.now();
    const record: ChallengeRecord = {
      id: this.randomBytes(CHALLENGE_ID_BYTES).toString("hex"),
      payload: this.randomBytes(CHALLENGE_PAYLOAD_BYTES).toString("hex"),
      difficulty: this.difficulty,
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    };

    await this.store.set(
      challengeKey(record.id),
      JSON.stringify({
        payload: record.payload,
        difficulty: record.difficulty,
        created_at: record.createdAt,
      }),
      this.ttlMs,
    );
    return record;
  }

  /** Fetch a live challenge. Missing, expired, or unreadable → null. */
  async lookup(id: string): Promise<ChallengeRecord | null> {
    const raw = await this.store.get(challengeKey(id));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }
    if (typeof parsed !== "object" || parsed === null) return null;

    const payload = "payload" in parsed ? parsed.payload : undefined;
    const difficulty = "difficulty" in parsed ? parsed.difficulty : undefined;
    const createdAt = "created_at" in parsed ? parsed.created_at : undefined;
    if (
      typeof payload !== "string" ||
      typeof difficulty !== "number" ||
      typeof createdAt !== "number"
    ) {
      return null;
    }

    return { id, payload, difficulty, createdAt, expiresAt: createdAt + this.ttlMs };
  }

  /**
   * Check a solution. False when the claimed difficulty (or the record's)
   * differs from the configured difficulty, so a client cannot solve an
   * easier puzzle than the server demands.
   */
  verify(record: ChallengeRecord, nonce: number, claimedDifficulty: number): boolean {
    if (claimedDifficulty !== this.difficulty) return false;
    if (record.difficulty !== this.difficulty) return false;
    if (!isValidNonce(nonce)) return false;
    return powMeetsDifficulty(computePowHash(record.payload, nonce), record.difficulty);
  }

  /** Delete a challenge so it cannot be replayed. Returns whether it existed. */
  async consume(id: string): Promise<boolean> {
    return this.store.del(challengeKey(id));
  }
}
