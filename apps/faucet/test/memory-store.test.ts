/**
 * In-memory quota store: TTL expiry, fixed windows, all-or-nothing
 * reservations, and the counter → cooldown transition.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MemoryQuotaStore } from "../src/store/memory-store.js";
import { parseCounter } from "../src/store/quota-store.js";

const T0 = 1_700_000_000_000;

describe("MemoryQuotaStore", () => {
  let t: number;
  let store: MemoryQuotaStore;

  beforeEach(() => {
    t = T0;
    store = new MemoryQuotaStore(() => t);
  });

  it("expires values at their TTL", async () => {
    await store.set("k", "v", 1000);
    t += 999;
    expect(await store.get("k")).toBe("v");
    expect(await store.pttl("k")).toBe(1);
    t += 1;
    expect(await store.get("k")).toBeNull();
    expect(await store.pttl("k")).toBeNull();
  });

  it("del reports whether the key existed", async () => {
    await store.set("k", "v", 1000);
    expect(await store.del("k")).toBe(true);
    expect(await store.del("k")).toBe(false);
  });

  it("incrBy keeps the TTL from key creation (fixed window)", async () => {
    expect(await store.incrBy("c", 1, 10_000)).toBe(1);
    t += 6_000;
    expect(await store.incrBy("c", 2, 10_000)).toBe(3);
    expect(await store.pttl("c")).toBe(4_000);
    t += 4_000;
    expect(await store.get("c")).toBeNull();
    expect(await store.incrBy("c", 1, 10_000)).toBe(1);
  });

  it("reserve is all-or-nothing across keys", async () => {
    await store.incrBy("hour", 80, 60_000);

    const ok = await store.reserve([
      { key: "hour", amount: 30, limit: 100, ttlMs: 60_000 },
      { key: "day", amount: 30, limit: 1000, ttlMs: 600_000 },
    ]);
    expect(ok).toBe(false);
    expect(await store.get("hour")).toBe("80");
    expect(await store.get("day")).toBeNull();

    const ok2 = await store.reserve([
      { key: "hour", amount: 20, limit: 100, ttlMs: 60_000 },
      { key: "day", amount: 20, limit: 1000, ttlMs: 600_000 },
    ]);
    expect(ok2).toBe(true);
    expect(await store.get("hour")).toBe("100");
    expect(await store.get("day")).toBe("20");
  });

  it("release clamps at zero", async () => {
    await store.incrBy("c", 5, 60_000);
    await store.release([{ key: "c", amount: 8 }, { key: "missing", amount: 1 }]);
    expect(await store.get("c")).toBe("0");
    expect(await store.get("missing")).toBeNull();
  });

  describe("transitionQuota", () => {
    const input = {
      counterKey: "ratelimit:ip:day:1.2.3.4",
      cooldownKey: "cooldown:ip:day:1.2.3.4",
      cost: 1,
      max: 3,
      counterTtlMs: 86_400_000,
      cooldownMs: 86_400_000,
    };

    it("counts until max, then swaps the counter for a cooldown", async () => {
      expect(await store.transitionQuota({ ...input, nowMs: t })).toEqual({ kind: "counted", used: 1 });
      expect(await store.transitionQuota({ ...input, nowMs: t })).toEqual({ kind: "counted", used: 2 });
      expect(await store.transitionQuota({ ...input, nowMs: t })).toEqual({
        kind: "cooldown",
        used: 3,
        cooldownUntil: T0 + 86_400_000,
      });
      expect(await store.get(input.counterKey)).toBeNull();
      expect(await store.get(input.cooldownKey)).toBe(String(T0 + 86_400_000));
    });

    it("drops increments while cooling and caps reported usage at max", async () => {
      await store.transitionQuota({ ...input, cost: 2, nowMs: t });
      expect(await store.transitionQuota({ ...input, cost: 2, nowMs: t })).toEqual({
        kind: "cooldown",
        used: 3,
        cooldownUntil: T0 + 86_400_000,
      });

      t += 60_000;
      expect(await store.transitionQuota({ ...input, nowMs: t })).toEqual({
        kind: "cooling",
        cooldownUntil: T0 + 86_400_000,
      });
      expect(await store.get(input.counterKey)).toBeNull();
    });

    it("cooldown lapses after its duration", async () => {
      await store.transitionQuota({ ...input, cost: 3, nowMs: t });
      t += 86_400_000;
      expect(await store.transitionQuota({ ...input, nowMs: t })).toEqual({ kind: "counted", used: 1 });
    });
  });

  it("cleanup evicts expired entries", async () => {
    await store.set("a", "1", 100);
    await store.set("b", "1", 1000);
    t += 500;
    expect(store.size()).toBe(1);
  });
});

describe("parseCounter", () => {
  it("reads missing, garbage, and negative values as zero", () => {
    expect(parseCounter(null)).toBe(0);
    expect(parseCounter("abc")).toBe(0);
    expect(parseCounter("-4")).toBe(0);
    expect(parseCounter("12")).toBe(12);
  });
});
