/**
 * Dispatch orchestrator: gate order, commit-after-success, BOTH partial
 * success, and failure paths that must leave quota untouched.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import Fastify, { type FastifyBaseLogger } from "fastify";
import { solvePow } from "@starkdrip/protocol";
import { MockChainClient } from "@starkdrip/chain-client";
import { ChallengeEngine } from "../src/challenge/engine.js";
import {
  RateLimiter,
  challengeIssuanceKey,
  dailyCounterKey,
  tokenThrottleKey,
} from "../src/limits/rate-limiter.js";
import { DistributionGuard, hourlyDistributionKey } from "../src/limits/distribution-guard.js";
import {
  DispatchOrchestrator,
  type DispatchSettings,
} from "../src/dispatch/orchestrator.js";
import { MemoryQuotaStore } from "../src/store/memory-store.js";
import type { QuotaTransition, QuotaTransitionInput } from "../src/store/quota-store.js";

const T0 = 1_700_000_000_000;
const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;
const IP = "203.0.113.7";
const FAUCET = "0xfa0cee";
const RECIPIENT = "0xabc";
const RECIPIENT_NORMALIZED = "0x" + "abc".padStart(64, "0");
const ONE = 10n ** 18n;

class FlakyDeleteStore extends MemoryQuotaStore {
  override async del(key: string): Promise<boolean> {
    if (key.startsWith("challenge:")) throw new Error("store blip");
    return super.del(key);
  }
}

class FailingChallengeStore extends MemoryQuotaStore {
  override async set(key: string, value: string, ttlMs: number): Promise<void> {
    if (key.startsWith("challenge:")) throw new Error("store unavailable");
    return super.set(key, value, ttlMs);
  }
}

/** Another request from the same IP starts the cooldown between check and commit. */
class ConcurrentCooldownStore extends MemoryQuotaStore {
  override async transitionQuota(input: QuotaTransitionInput): Promise<QuotaTransition> {
    await this.set(input.cooldownKey, String(input.nowMs + DAY_MS), DAY_MS);
    return super.transitionQuota(input);
  }
}

interface Harness {
  store: MemoryQuotaStore;
  chain: MockChainClient;
  orchestrator: DispatchOrchestrator;
  log: FastifyBaseLogger;
  advance(ms: number): void;
}

function setup(
  opts: { settings?: Partial<DispatchSettings>; store?: MemoryQuotaStore } = {},
): Harness {
  let t = T0;
  const now = () => t;
  const store = opts.store ?? new MemoryQuotaStore(now);
  const chain = new MockChainClient(FAUCET);
  chain.setBalance(FAUCET, "STRK", 1000n * ONE);
  chain.setBalance(FAUCET, "ETH", 10n * ONE);
  const log = Fastify({ logger: false }).log;

  const orchestrator = new DispatchOrchestrator({
    challenges: new ChallengeEngine({ store, difficulty: 1, ttlMs: 300_000, now }),
    limiter: new RateLimiter({ store, maxRequestsPerDay: 5, maxChallengesPerHour: 100, now }),
    guard: new DistributionGuard({ store, chain, faucetAddress: FAUCET, minBalanceProtectPct: 20 }),
    chain,
    settings: {
      network: "sepolia",
      dripAmounts: { STRK: "10", ETH: "0.01" },
      caps: { STRK: { hourly: "0", daily: "0" }, ETH: { hourly: "0", daily: "0" } },
      transferTimeoutMs: 1_000,
      ...opts.settings,
    },
    log,
    now,
  });

  return {
    store,
    chain,
    orchestrator,
    log,
    advance: (ms) => {
      t += ms;
    },
  };
}

/** Issue a challenge and solve it like a client would. */
async function solved(h: Harness, ip = IP): Promise<{ challengeId: string; nonce: number }> {
  const issued = await h.orchestrator.issueChallenge(ip);
  if (!issued.ok) throw new Error(`challenge refused: ${issued.rejection.code}`);
  const { nonce } = solvePow(issued.value.challenge, issued.value.difficulty);
  return { challengeId: issued.value.challenge_id, nonce };
}

async function request(h: Harness, token: string, ip = IP) {
  const proof = await solved(h, ip);
  return h.orchestrator.dispatch({ ip, address: RECIPIENT, token, ...proof });
}

describe("DispatchOrchestrator", () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  // ── Validation ───────────────────────────────────────────────

  it("rejects malformed addresses and unknown tokens before any state change", async () => {
    const bad = await h.orchestrator.dispatch({
      ip: IP,
      address: "abc",
      token: "STRK",
      challengeId: "x",
      nonce: 0,
    });
    expect(bad).toEqual({
      ok: false,
      rejection: {
        gate: "validation",
        status: 400,
        code: "invalid_address",
        message: "address must start with 0x",
        detail: {},
      },
    });

    const token = await h.orchestrator.dispatch({
      ip: IP,
      address: RECIPIENT,
      token: "DOGE",
      challengeId: "x",
      nonce: 0,
    });
    expect(token.ok).toBe(false);
    if (!token.ok) expect(token.rejection.code).toBe("invalid_token");
  });

  it("accepts lowercase token names", async () => {
    const result = await request(h, "strk");
    expect(result.ok).toBe(true);
  });

  // ── Single token success ─────────────────────────────────────

  it("sends the configured amount and commits quota and throttle", async () => {
    const result = await request(h, "STRK");
    const [transfer] = h.chain.transfers;
    expect(transfer).toMatchObject({ recipient: RECIPIENT_NORMALIZED, token: "STRK", amount: 10n * ONE });
    if (!transfer) return;

    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        tx_hash: transfer.txHash,
        amount: "10",
        token: "STRK",
        explorer_url: `https://sepolia.voyager.online/tx/${transfer.txHash}`,
        message: `Sent 10 STRK to ${RECIPIENT_NORMALIZED}`,
      },
    });
    expect(await h.store.get(dailyCounterKey(IP))).toBe("1");
    expect(await h.store.pttl(tokenThrottleKey(IP, "STRK"))).toBe(HOUR_MS);
    expect(await h.store.get(tokenThrottleKey(IP, "ETH"))).toBeNull();
  });

  // ── Daily limit ──────────────────────────────────────────────

  it("cools down after five successes and reports the same window later", async () => {
    for (let i = 0; i < 5; i++) {
      const result = await request(h, i % 2 === 0 ? "STRK" : "ETH");
      expect(result.ok).toBe(true);
      h.advance(HOUR_MS);
    }
    // Fifth success happened at T0 + 4h
    const cooldownEnd = T0 + 4 * HOUR_MS + DAY_MS;

    const sixth = await request(h, "ETH");
    expect(sixth).toEqual({
      ok: false,
      rejection: {
        gate: "daily_limit",
        status: 429,
        code: "daily_limit_exceeded",
        message: "Daily limit of 5 requests reached. Try again in 23h",
        detail: { used: 5, limit: 5, cooldown_end: cooldownEnd, remaining_hours: 23 },
      },
    });

    h.advance(60_000);
    const seventh = await request(h, "STRK");
    expect(seventh.ok).toBe(false);
    if (!seventh.ok) {
      expect(seventh.rejection.detail.cooldown_end).toBe(cooldownEnd);
    }
    expect(h.chain.transfers).toHaveLength(5);
  });

  it("charges BOTH two units up front", async () => {
    for (let i = 0; i < 4; i++) {
      await request(h, i % 2 === 0 ? "STRK" : "ETH");
      h.advance(HOUR_MS);
    }
    const result = await request(h, "BOTH");
    expect(result).toEqual({
      ok: false,
      rejection: {
        gate: "daily_limit",
        status: 429,
        code: "daily_limit_exceeded",
        message: "Request needs 2 of 5 daily requests; 4 already used",
        detail: { used: 4, limit: 5, cooldown_end: null },
      },
    });
  });

  // ── Token throttle ───────────────────────────────────────────

  it("throttles STRK for an hour while ETH stays available", async () => {
    expect((await request(h, "STRK")).ok).toBe(true);
    h.advance(30 * 60_000);

    const again = await request(h, "STRK");
    expect(again).toEqual({
      ok: false,
      rejection: {
        gate: "token_throttle",
        status: 429,
        code: "token_throttled",
        message: "STRK already sent to this IP within the last hour. Try again in 30 min",
        detail: { token: "STRK", next_request_at: T0 + HOUR_MS, remaining_minutes: 30 },
      },
    });

    const eth = await request(h, "ETH");
    expect(eth.ok).toBe(true);
  });

  it("rejects BOTH when either token is throttled", async () => {
    await request(h, "ETH");
    const both = await request(h, "BOTH");
    expect(both.ok).toBe(false);
    if (!both.ok) expect(both.rejection.detail.token).toBe("ETH");
  });

  // ── Proof of work ────────────────────────────────────────────

  it("rejects unknown challenges and wrong nonces", async () => {
    const unknown = await h.orchestrator.dispatch({
      ip: IP,
      address: RECIPIENT,
      token: "STRK",
      challengeId: "missing",
      nonce: 0,
    });
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) {
      expect(unknown.rejection).toMatchObject({
        gate: "pow",
        status: 400,
        code: "invalid_challenge",
        message: "Invalid or expired challenge",
      });
    }

    const proof = await solved(h);
    const wrong = await h.orchestrator.dispatch({
      ip: IP,
      address: RECIPIENT,
      token: "STRK",
      challengeId: proof.challengeId,
      nonce: proof.nonce,
      difficulty: 0,
    });
    expect(wrong.ok).toBe(false);
    if (!wrong.ok) expect(wrong.rejection.code).toBe("invalid_pow");
    expect(h.chain.transfers).toHaveLength(0);
  });

  it("accepts a challenge once", async () => {
    const proof = await solved(h);
    const first = await h.orchestrator.dispatch({ ip: IP, address: RECIPIENT, token: "STRK", ...proof });
    expect(first.ok).toBe(true);

    const replay = await h.orchestrator.dispatch({ ip: IP, address: RECIPIENT, token: "ETH", ...proof });
    expect(replay.ok).toBe(false);
    if (!replay.ok) expect(replay.rejection.code).toBe("invalid_challenge");
  });

  it("lets only one of two concurrent submissions of a challenge through", async () => {
    const proof = await solved(h);
    const results = await Promise.all([
      h.orchestrator.dispatch({ ip: IP, address: RECIPIENT, token: "STRK", ...proof }),
      h.orchestrator.dispatch({ ip: IP, address: RECIPIENT, token: "ETH", ...proof }),
    ]);
    const codes = results.map((r) => (r.ok ? "ok" : r.rejection.code)).sort();
    expect(codes).toEqual(["invalid_challenge", "ok"]);
    expect(h.chain.transfers).toHaveLength(1);
  });

  it("rejects an expired challenge", async () => {
    const proof = await solved(h);
    h.advance(300_000);
    const result = await h.orchestrator.dispatch({ ip: IP, address: RECIPIENT, token: "STRK", ...proof });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.rejection.code).toBe("invalid_challenge");
  });

  it("continues when the challenge cannot be deleted", async () => {
    const flaky = setup({ store: new FlakyDeleteStore(() => T0) });
    const warn = vi.spyOn(flaky.log, "warn");

    const result = await request(flaky, "STRK");
    expect(result.ok).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      "challenge delete failed; continuing",
    );
  });

  // ── Guards ───────────────────────────────────────────────────

  it("refuses transfers that would drain the reserve", async () => {
    h.chain.setBalance(FAUCET, "STRK", 12n * ONE);
    const result = await request(h, "STRK");
    expect(result).toEqual({
      ok: false,
      rejection: {
        gate: "reserve_protection",
        status: 503,
        code: "insufficient_reserve",
        message: "Faucet STRK reserve too low",
        detail: { token: "STRK" },
      },
    });
    expect(await h.store.get(dailyCounterKey(IP))).toBeNull();
  });

  it("refuses transfers over the global cap and returns the reservation on reserve failure", async () => {
    const capped = setup({
      settings: {
        caps: { STRK: { hourly: "15", daily: "0" }, ETH: { hourly: "0", daily: "0" } },
      },
    });
    expect((await request(capped, "STRK", "198.51.100.1")).ok).toBe(true);

    const over = await request(capped, "STRK", "198.51.100.2");
    expect(over.ok).toBe(false);
    if (!over.ok) expect(over.rejection.code).toBe("distribution_cap_reached");
    expect(await capped.store.get(hourlyDistributionKey("STRK"))).toBe("10000000");
  });

  it("maps balance read failures to a 500", async () => {
    h.chain.failNext("getBalance", new Error("rpc down"), "STRK");
    const result = await request(h, "STRK");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.rejection).toMatchObject({ status: 500, code: "chain_unavailable" });
    }
  });

  // ── Transfer failure ─────────────────────────────────────────

  it.each([
    ["failure", "transfer_failed"],
    ["timeout", "transfer_timeout"],
  ])("commits nothing on transfer %s", async (kind, code) => {
    const f = setup({
      settings: {
        caps: { STRK: { hourly: "100", daily: "1000" }, ETH: { hourly: "0", daily: "0" } },
        transferTimeoutMs: 20,
      },
    });
    if (kind === "failure") f.chain.failNext("transfer");
    else f.chain.setTransferDelay(200);

    const result = await request(f, "STRK");
    expect(result).toEqual({
      ok: false,
      rejection: {
        gate: "transfer",
        status: 500,
        code,
        message: kind === "failure" ? "STRK transfer failed" : "STRK transfer timed out",
        detail: { token: "STRK" },
      },
    });
    expect(await f.store.get(dailyCounterKey(IP))).toBeNull();
    expect(await f.store.get(tokenThrottleKey(IP, "STRK"))).toBeNull();
    expect(await f.store.get(hourlyDistributionKey("STRK"))).toBe("0");
  });

  // ── BOTH ─────────────────────────────────────────────────────

  it("sends STRK then ETH for BOTH and commits two units", async () => {
    const result = await request(h, "BOTH");
    expect(h.chain.transfers.map((t) => t.token)).toEqual(["STRK", "ETH"]);
    expect(result.ok).toBe(true);
    if (result.ok && "transactions" in result.value) {
      expect(result.value.transactions.map((t) => [t.token, t.amount])).toEqual([
        ["STRK", "10"],
        ["ETH", "0.01"],
      ]);
      expect(result.value.message).toBe(`Sent 10 STRK and 0.01 ETH to ${RECIPIENT_NORMALIZED}`);
      expect(result.value.failures).toBeUndefined();
    }
    expect(await h.store.get(dailyCounterKey(IP))).toBe("2");
  });

  it("reports partial success when the ETH guard fails", async () => {
    h.chain.setBalance(FAUCET, "ETH", 10n ** 16n); // exactly one drip: would empty the reserve
    const result = await request(h, "BOTH");

    const [strk] = h.chain.transfers;
    if (!strk) throw new Error("expected STRK transfer");
    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        transactions: [
          {
            token: "STRK",
            amount: "10",
            tx_hash: strk.txHash,
            explorer_url: `https://sepolia.voyager.online/tx/${strk.txHash}`,
          },
        ],
        message: `Sent 10 STRK to ${RECIPIENT_NORMALIZED}; ETH failed`,
        failures: [
          { token: "ETH", error: "insufficient_reserve", message: "Faucet ETH reserve too low" },
        ],
      },
    });
    expect(await h.store.get(dailyCounterKey(IP))).toBe("1");
    expect(await h.store.get(tokenThrottleKey(IP, "STRK"))).not.toBeNull();
    expect(await h.store.get(tokenThrottleKey(IP, "ETH"))).toBeNull();
  });

  it("returns the first rejection when no BOTH token goes out", async () => {
    h.chain.setBalance(FAUCET, "STRK", 0n);
    h.chain.failNext("transfer", new Error("nonce clash"), "ETH");
    const result = await request(h, "BOTH");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.rejection.code).toBe("insufficient_reserve");
    expect(await h.store.get(dailyCounterKey(IP))).toBeNull();
  });

  // ── Challenge issuance ───────────────────────────────────────

  it("rate limits challenge issuance", async () => {
    const tight = new DispatchOrchestrator({
      challenges: new ChallengeEngine({ store: h.store, difficulty: 1, ttlMs: 300_000 }),
      limiter: new RateLimiter({ store: h.store, maxRequestsPerDay: 5, maxChallengesPerHour: 1 }),
      guard: new DistributionGuard({ store: h.store, chain: h.chain, faucetAddress: FAUCET, minBalanceProtectPct: 20 }),
      chain: h.chain,
      settings: {
        network: "sepolia",
        dripAmounts: { STRK: "10", ETH: "0.01" },
        caps: { STRK: { hourly: "0", daily: "0" }, ETH: { hourly: "0", daily: "0" } },
        transferTimeoutMs: 1_000,
      },
      log: h.log,
    });
    expect((await tight.issueChallenge(IP)).ok).toBe(true);
    const second = await tight.issueChallenge(IP);
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.rejection).toMatchObject({
        gate: "challenge_issuance",
        status: 429,
        code: "challenge_rate_limited",
        detail: { used: 1, limit: 1 },
      });
    }
  });

  it("returns the issuance slot when the challenge cannot be stored", async () => {
    const failing = setup({ store: new FailingChallengeStore(() => T0) });
    await expect(failing.orchestrator.issueChallenge(IP)).rejects.toThrow("store unavailable");
    expect(await failing.store.get(challengeIssuanceKey(IP))).toBe("0");
  });

  // ── Commit ───────────────────────────────────────────────────

  it("flags transfers that land after a concurrent request started the cooldown", async () => {
    const racing = setup({ store: new ConcurrentCooldownStore(() => T0) });
    const warn = vi.spyOn(racing.log, "warn");

    const result = await request(racing, "STRK");
    expect(result.ok).toBe(true);
    const [transfer] = racing.chain.transfers;
    if (!transfer) throw new Error("expected a transfer");

    expect(warn).toHaveBeenCalledWith(
      {
        ip: IP,
        cooldownUntil: T0 + DAY_MS,
        transferred: [{ token: "STRK", amount: "10", txHash: transfer.txHash }],
      },
      "quota exceeded by concurrent dispatch",
    );
    expect(await racing.store.get(dailyCounterKey(IP))).toBeNull();
  });

  it("fails fast on a malformed drip amount", () => {
    expect(() =>
      setup({ settings: { dripAmounts: { STRK: "ten", ETH: "0.01" } } }),
    ).toThrow('Invalid decimal amount: "ten"');
  });
});
