/**
 * Redis quota store (ioredis).
 *
 * Multi-step operations run as Lua scripts so Redis executes them
 * atomically; expiry is applied only when a key is created, giving fixed
 * windows rather than sliding ones.
 */

import { Redis } from "ioredis";
import {
  parseCounter,
  type QuotaStore,
  type QuotaTransition,
  type QuotaTransitionInput,
  type Reservation,
  type ReleaseEntry,
} from "./quota-store.js";

/** KEYS[1]; ARGV = by, ttlMs */
const INCR_WITH_TTL = `
local v = redis.call('INCRBY', KEYS[1], ARGV[1])
if redis.call('PTTL', KEYS[1]) < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return v
`;

/** KEYS = windows; ARGV = (amount, limit, ttlMs) per key */
const RESERVE = `
for i, key in ipairs(KEYS) do
  local base = (i - 1) * 3
  local current = tonumber(redis.call('GET', key) or '0') or 0
  if current + tonumber(ARGV[base + 1]) > tonumber(ARGV[base + 2]) then
    return 0
  end
end
for i, key in ipairs(KEYS) do
  local base = (i - 1) * 3
  redis.call('INCRBY', key, ARGV[base + 1])
  if redis.call('PTTL', key) < 0 then
    redis.call('PEXPIRE', key, ARGV[base + 3])
  end
end
return 1
`;

/** KEYS = counters; ARGV = amount per key */
const RELEASE = `
for i, key in ipairs(KEYS) do
  local current = tonumber(redis.call('GET', key) or '0') or 0
  local dec = math.min(current, tonumber(ARGV[i]))
  if dec > 0 then
    redis.call('DECRBY', key, dec)
  end
end
return 1
`;

/**
 * KEYS[1] = counter, KEYS[2] = cooldown
 * ARGV = cost, max, counterTtlMs, cooldownMs, cooldownUntil
 */
const TRANSITION = `
local cooling = redis.call('GET', KEYS[2])
if cooling then
  return {'cooling', 0, cooling}
end
local used = redis.call('INCRBY', KEYS[1], ARGV[1])
if redis.call('PTTL', KEYS[1]) < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[3])
end
if used >= tonumber(ARGV[2]) then
  redis.call('DEL', KEYS[1])
  redis.call('SET', KEYS[2], ARGV[5], 'PX', ARGV[4])
  return {'cooldown', math.min(used, tonumber(ARGV[2])), ARGV[5]}
end
return {'counted', used, ''}
`;

/** The slice of the ioredis client the store uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  pttl(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  ping(): Promise<unknown>;
  quit(): Promise<unknown>;
}

export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
  });
}

export class RedisQuotaStore implements QuotaStore {
  constructor(private readonly redis: RedisLike) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(key, value, "PX", ttlMs);
  }

  async del(key: string): Promise<boolean> {
    return (await this.redis.del(key)) > 0;
  }

  async pttl(key: string): Promise<number | null> {
    const ms = await this.redis.pttl(key);
    if (ms === -2) return null;
    return ms;
  }

  async incrBy(key: string, by: number, ttlMs: number): Promise<number> {
    const result = await this.redis.eval(INCR_WITH_TTL, 1, key, by, ttlMs);
    return toInteger(result, "incrBy");
  }

  async reserve(entries: Reservation[]): Promise<boolean> {
    if (entries.length === 0) return true;
    const keys = entries.map((e) => e.key);
    const args = entries.flatMap((e) => [e.amount, e.limit, e.ttlMs]);
    const result = await this.redis.eval(RESERVE, keys.length, ...keys, ...args);
    return toInteger(result, "reserve") === 1;
  }

  async release(entries: ReleaseEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const keys = entries.map((e) => e.key);
    const args = entries.map((e) => e.amount);
    await this.redis.eval(RELEASE, keys.length, ...keys, ...args);
  }

  async transitionQuota(input: QuotaTransitionInput): Promise<QuotaTransition> {
    const result = await this.redis.eval(
      TRANSITION,
      2,
      input.counterKey,
      input.cooldownKey,
      input.cost,
      input.max,
      input.counterTtlMs,
      input.cooldownMs,
      String(input.nowMs + input.cooldownMs),
    );
    return parseTransition(result);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function toInteger(result: unknown, op: string): number {
  if (typeof result === "number") return result;
  if (typeof result === "string" && /^-?\d+$/.test(result)) return Number(result);
  throw new Error(`redis ${op}: unexpected script result ${String(result)}`);
}

/** Decode the {kind, used, cooldownUntil} reply of the transition script. */
export function parseTransition(result: unknown): QuotaTransition {
  if (!Array.isArray(result) || result.length !== 3) {
    throw new Error("redis transitionQuota: malformed script result");
  }
  const [kind, used, until] = result;
  if (kind === "counted") {
    return { kind, used: toInteger(used, "transitionQuota") };
  }
  if (kind === "cooldown") {
    return {
      kind,
      used: toInteger(used, "transitionQuota"),
      cooldownUntil: parseCounter(typeof until === "string" ? until : null),
    };
  }
  if (kind === "cooling") {
    return { kind, cooldownUntil: parseCounter(typeof until === "string" ? until : null) };
  }
  throw new Error(`redis transitionQuota: unknown kind ${String(kind)}`);
}
