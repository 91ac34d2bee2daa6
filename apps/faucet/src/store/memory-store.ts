/**
 * In-memory quota store with TTL.
 *
 * Each method runs to completion without awaiting, so within one process
 * every call is atomic. Restart drops all counters (acceptable for dev and
 * tests; production uses RedisQuotaStore).
 */

import {
  parseCounter,
  type Clock,
  type QuotaStore,
  type QuotaTransition,
  type QuotaTransitionInput,
  type Reservation,
  type ReleaseEntry,
} from "./quota-store.js";

interface Entry {
  value: string;
  expiresAt: number | null;
}

export class MemoryQuotaStore implements QuotaStore {
  private readonly entries = new Map<string, Entry>();
  private readonly now: Clock;

  constructor(now: Clock = () => Date.now()) {
    this.now = now;
  }

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async del(key: string): Promise<boolean> {
    const existed = this.read(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async pttl(key: string): Promise<number | null> {
    const entry = this.read(key);
    if (!entry) return null;
    if (entry.expiresAt === null) return -1;
    return entry.expiresAt - this.now();
  }

  async incrBy(key: string, by: number, ttlMs: number): Promise<number> {
    return this.add(key, by, ttlMs);
  }

  async reserve(entries: Reservation[]): Promise<boolean> {
    for (const r of entries) {
      if (parseCounter(this.read(r.key)?.value ?? null) + r.amount > r.limit) {
        return false;
      }
    }
    for (const r of entries) {
      this.add(r.key, r.amount, r.ttlMs);
    }
    return true;
  }

  async release(entries: ReleaseEntry[]): Promise<void> {
    for (const r of entries) {
      const entry = this.read(r.key);
      if (!entry) continue;
      const next = Math.max(0, parseCounter(entry.value) - r.amount);
      entry.value = String(next);
    }
  }

  async transitionQuota(input: QuotaTransitionInput): Promise<QuotaTransition> {
    const cooling = this.read(input.cooldownKey);
    if (cooling) {
      return { kind: "cooling", cooldownUntil: parseCounter(cooling.value) };
    }

    const used = this.add(input.counterKey, input.cost, input.counterTtlMs);
    if (used < input.max) {
      return { kind: "counted", used };
    }

    const cooldownUntil = input.nowMs + input.cooldownMs;
    this.entries.delete(input.counterKey);
    this.entries.set(input.cooldownKey, {
      value: String(cooldownUntil),
      expiresAt: this.now() + input.cooldownMs,
    });
    return { kind: "cooldown", used: Math.min(used, input.max), cooldownUntil };
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** Evict expired entries. Call periodically. */
  cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  /** Number of live keys (test helper). */
  size(): number {
    this.cleanup();
    return this.entries.size;
  }

  private read(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private add(key: string, by: number, ttlMs: number): number {
    const entry = this.read(key);
    if (!entry) {
      this.entries.set(key, { value: String(by), expiresAt: this.now() + ttlMs });
      return by;
    }
    const next = parseCounter(entry.value) + by;
    entry.value = String(next);
    return next;
  }
}
