/**
 * Per-IP rate limits.
 *
 *   daily quota      — N successful dispatch units per 24 h, then a 24 h cooldown
 *   token throttle   — one successful dispatch per token per hour
 *   challenge issue  — M challenges per hour
 *
 * Checks are reads; commits happen only after a successful transfer.
 */

import {
  DAILY_COOLDOWN_MS,
  DAILY_WINDOW_MS,
  HOURLY_WINDOW_MS,
  TOKEN_THROTTLE_MS,
  TOKENS,
  type Token,
} from "@starkdrip/protocol";
import { parseCounter, type Clock, type QuotaStore, type QuotaTransition } from "../store/quota-store.js";

export interface RateLimiterOptions {
  store: QuotaStore;
  maxRequestsPerDay: number;
  maxChallengesPerHour: number;
  now?: Clock;
}

export interface DailyLimitCheck {
  allowed: boolean;
  used: number;
  limit: number;
  /** Unix ms; set while a cooldown is active. */
  cooldownUntil: number | null;
}

export interface ThrottleCheck {
  allowed: boolean;
  /** Unix ms the token becomes available again; null when available. */
  nextAvailable: number | null;
}

export interface IssuanceCheck {
  allowed: boolean;
  used: number;
  limit: number;
  /** Unix ms the hourly issuance window resets; null when nothing was counted. */
  resetAt: number | null;
}

export interface QuotaSnapshot {
  daily: {
    total: number;
    used: number;
    remaining: number;
    cooldownUntil: number | null;
  };
  throttle: Record<Token, ThrottleCheck>;
}

export const dailyCounterKey = (ip: string): string => `ratelimit:ip:day:${ip}`;
export const dailyCooldownKey = (ip: string): string => `cooldown:ip:day:${ip}`;
export const tokenThrottleKey = (ip: string, token: Token): string =>
  `throttle:ip:token:${ip}:${token}`;
export const challengeIssuanceKey = (ip: string): string => `ratelimit:challenge:hour:${ip}`;

export class RateLimiter {
  private readonly store: QuotaStore;
  private readonly now: Clock;
  readonly maxRequestsPerDay: number;
  readonly maxChallengesPerHour: number;

  constructor(opts: RateLimiterOptions) {
    this.store = opts.store;
    this.maxRequestsPerDay = opts.maxRequestsPerDay;
    this.maxChallengesPerHour = opts.maxChallengesPerHour;
    this.now = opts.now ?? (() => Date.now());
  }

  /** An active cooldown denies regardless of the counter. */
  async checkDailyLimit(ip: string, cost: number): Promise<DailyLimitCheck> {
    const limit = this.maxRequestsPerDay;
    const cooldownUntil = await this.activeCooldown(ip);
    if (cooldownUntil !== null) {
      return { allowed: false, used: limit, limit, cooldownUntil };
    }

    const used = parseCounter(await this.store.get(dailyCounterKey(ip)));
    return { allowed: used + cost <= limit, used, limit, cooldownUntil: null };
  }

  /**
   * Record `cost` successful units. Reaching the limit clears the counter
   * and starts the cooldown in the same store step.
   */
  async consumeDailyQuota(ip: string, cost: number): Promise<QuotaTransition> {
    return this.store.transitionQuota({
      counterKey: dailyCounterKey(ip),
      cooldownKey: dailyCooldownKey(ip),
      cost,
      max: this.maxRequestsPerDay,
      counterTtlMs: DAILY_WINDOW_MS,
      cooldownMs: DAILY_COOLDOWN_MS,
      nowMs: this.now(),
    });
  }

  async checkTokenThrottle(ip: string, token: Token): Promise<ThrottleCheck> {
    const ttl = await this.store.pttl(tokenThrottleKey(ip, token));
    if (ttl === null) return { allowed: true, nextAvailable: null };
    // Marker without expiry: treat as a full throttle window from now.
    const remaining = ttl < 0 ? TOKEN_THROTTLE_MS : ttl;
    return { allowed: false, nextAvailable: this.now() + remaining };
  }

  async setTokenThrottle(ip: string, token: Token): Promise<void> {
    await this.store.set(tokenThrottleKey(ip, token), String(this.now()), TOKEN_THROTTLE_MS);
  }

  /** Count one issuance if still within the hourly limit. */
  async checkChallengeIssuance(ip: string): Promise<IssuanceCheck> {
    const key = challengeIssuanceKey(ip);
    const limit = this.maxChallengesPerHour;
    const allowed = await this.store.reserve([
      { key, amount: 1, limit, ttlMs: HOURLY_WINDOW_MS },
    ]);

    const [raw, ttl] = await Promise.all([this.store.get(key), this.store.pttl(key)]);
    const resetAt = ttl !== null && ttl >= 0 ? this.now() + ttl : null;
    return { allowed, used: parseCounter(raw), limit, resetAt };
  }

  /** Hand back an issuance slot when the challenge could not be stored. */
  async releaseChallengeIssuance(ip: string): Promise<void> {
    await this.store.release([{ key: challengeIssuanceKey(ip), amount: 1 }]);
  }

  /** Read model for GET /quota and GET /status/:address. */
  async getQuota(ip: string): Promise<QuotaSnapshot> {
    const total = this.maxRequestsPerDay;
    const cooldownUntil = await this.activeCooldown(ip);
    const used =
      cooldownUntil !== null ? total : parseCounter(await this.store.get(dailyCounterKey(ip)));

    const entries = await Promise.all(
      TOKENS.map(async (token) => [token, await this.checkTokenThrottle(ip, token)] as const),
    );
    const throttle: Record<Token, ThrottleCheck> = {
      ETH: { allowed: true, nextAvailable: null },
      STRK: { allowed: true, nextAvailable: null },
    };
    for (const [token, check] of entries) throttle[token] = check;

    return {
      daily: {
        total,
        used: Math.min(used, total),
        remaining: Math.max(0, total - used),
        cooldownUntil,
      },
      throttle,
    };
  }

  private async activeCooldown(ip: string): Promise<number | null> {
    const raw = await this.store.get(dailyCooldownKey(ip));
    if (raw === null) return null;
    const until = parseCounter(raw);
    if (until > this.now()) return until;
    // Stored timestamp passed but key not yet expired: fall back to its TTL.
    const ttl = await this.store.pttl(dailyCooldownKey(ip));
    return ttl !== null && ttl > 0 ? this.now() + ttl : null;
  }
}
