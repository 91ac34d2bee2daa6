/**
 * Quota store contract. The single shared mutable resource of the faucet.
 *
 * Every method is atomic per call. Multi-key operations (reserve,
 * transitionQuota) are all-or-nothing, so concurrent flows for the same
 * identity can never both observe "under limit" and both commit.
 */

export type Clock = () => number;

/** One window of an all-or-nothing reservation. */
export interface Reservation {
  key: string;
  /** Integer amount to add. */
  amount: number;
  /** Reject when current + amount would exceed this. */
  limit: number;
  /** Expiry applied when the key is created. */
  ttlMs: number;
}

export interface ReleaseEntry {
  key: string;
  amount: number;
}

export interface QuotaTransitionInput {
  counterKey: string;
  cooldownKey: string;
  cost: number;
  max: number;
  /** Counter expiry applied when the counter is created. */
  counterTtlMs: number;
  cooldownMs: number;
  nowMs: number;
}

/**
 * Outcome of an atomic counter → cooldown transition:
 *   counted  — cost added, still under max
 *   cooldown — max reached: counter cleared, cooldown set until `cooldownUntil`;
 *              `used` is capped at max
 *   cooling  — a cooldown was already active; nothing was added
 */
export type QuotaTransition =
  | { kind: "counted"; used: number }
  | { kind: "cooldown"; used: number; cooldownUntil: number }
  | { kind: "cooling"; cooldownUntil: number };

export interface QuotaStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Returns true if the key existed. */
  del(key: string): Promise<boolean>;
  /** Remaining ms; null if missing; -1 if the key has no expiry. */
  pttl(key: string): Promise<number | null>;
  /** Increment by `by`; `ttlMs` is applied only when the key is created. */
  incrBy(key: string, by: number, ttlMs: number): Promise<number>;
  /** Add every entry's amount iff every entry stays within its limit. */
  reserve(entries: Reservation[]): Promise<boolean>;
  /** Subtract amounts, clamped at zero. */
  release(entries: ReleaseEntry[]): Promise<void>;
  transitionQuota(input: QuotaTransitionInput): Promise<QuotaTransition>;
  /** Throws when the backing store is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** Parse a stored counter; missing or garbage reads as zero, never negative. */
export function parseCounter(raw: string | null): number {
  if (raw === null) return 0;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : 0;
}
