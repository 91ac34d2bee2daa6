/**
 * Dispatch orchestrator — drives one faucet request through its gates:
 *
 *   RECEIVED → VALIDATED → LIMIT_CHECKED → POW_VERIFIED
 *            → GUARD_CHECKED → TRANSFER_SUBMITTED → COMMITTED
 *
 * Quota and throttle are committed only after a transfer lands. A BOTH
 * request runs the guard → transfer steps once per token (STRK then ETH)
 * and reports whatever succeeded; transfers are irreversible, so there is
 * no rollback of an earlier token when a later one fails.
 */

import type { FastifyBaseLogger } from "fastify";
import {
  TOKENS,
  formatUnits,
  parseTokenSelection,
  parseUnits,
  toLedgerUnits,
  tokensFor,
  validateStarknetAddress,
  type ChallengeResponseV1,
  type DispatchFailureV1,
  type DispatchResponseV1,
  type Token,
  type TransactionInfoV1,
} from "@starkdrip/protocol";
import type { ChainClient } from "@starkdrip/chain-client";
import type { ChallengeEngine, ChallengeRecord } from "../challenge/engine.js";
import type { RateLimiter } from "../limits/rate-limiter.js";
import type {
  DistributionCaps,
  DistributionGuard,
  DistributionReservation,
  ReserveDecision,
} from "../limits/distribution-guard.js";
import type { Clock } from "../store/quota-store.js";
import { explorerUrl } from "../config.js";
import { pass, reject, type GateResult, type Rejection } from "./gate.js";

export interface DispatchSettings {
  network: string;
  /** Decimal amount sent per request, per token. */
  dripAmounts: Record<Token, string>;
  caps: Record<Token, DistributionCaps>;
  transferTimeoutMs: number;
}

export interface DispatchOrchestratorOptions {
  challenges: ChallengeEngine;
  limiter: RateLimiter;
  guard: DistributionGuard;
  chain: ChainClient;
  settings: DispatchSettings;
  log: FastifyBaseLogger;
  now?: Clock;
}

export interface DispatchInput {
  ip: string;
  address: string;
  token: string;
  challengeId: string;
  nonce: number;
  /** Difficulty the client claims to have solved; defaults to the challenge's. */
  difficulty?: number;
}

interface TokenDispatch {
  token: Token;
  amount: bigint;
  display: string;
  txHash: string;
}

export class TransferTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`transfer timed out after ${timeoutMs}ms`);
    this.name = "TransferTimeoutError";
  }
}

const HOUR_MS = 60 * 60_000;
const MINUTE_MS = 60_000;

export class DispatchOrchestrator {
  private readonly challenges: ChallengeEngine;
  private readonly limiter: RateLimiter;
  private readonly guard: DistributionGuard;
  private readonly chain: ChainClient;
  private readonly settings: DispatchSettings;
  private readonly log: FastifyBaseLogger;
  private readonly now: Clock;
  private readonly amounts: Record<Token, bigint>;

  constructor(opts: DispatchOrchestratorOptions) {
    this.challenges = opts.challenges;
    this.limiter = opts.limiter;
    this.guard = opts.guard;
    this.chain = opts.chain;
    this.settings = opts.settings;
    this.log = opts.log;
    this.now = opts.now ?? (() => Date.now());

    // Parse once so a bad amount or cap fails at startup, not per request.
    this.amounts = { ETH: 0n, STRK: 0n };
    for (const token of TOKENS) {
      this.amounts[token] = parseUnits(opts.settings.dripAmounts[token]);
      toLedgerUnits(opts.settings.dripAmounts[token]);
      toLedgerUnits(opts.settings.caps[token].hourly);
      toLedgerUnits(opts.settings.caps[token].daily);
    }
  }

  /** POST /challenge: issuance limit, then a fresh challenge. */
  async issueChallenge(ip: string): Promise<GateResult<ChallengeResponseV1>> {
    const issuance = await this.limiter.checkChallengeIssuance(ip);
    if (!issuance.allowed) {
      return reject(
        "challenge_issuance",
        429,
        "challenge_rate_limited",
        `Too many challenges requested. Limit is ${issuance.limit} per hour`,
        { used: issuance.used, limit: issuance.limit, reset_at: issuance.resetAt },
      );
    }

    let record: ChallengeRecord;
    try {
      record = await this.challenges.issue();
    } catch (err) {
      try {
        await this.limiter.releaseChallengeIssuance(ip);
      } catch (releaseErr) {
        this.log.error({ err: releaseErr, ip }, "challenge issuance release failed");
      }
      throw err;
    }
    return pass<ChallengeResponseV1>({
      challenge_id: record.id,
      challenge: record.payload,
      difficulty: record.difficulty,
      expires_at: record.expiresAt,
    });
  }

  /** POST /request. */
  async dispatch(
    input: DispatchInput,
    log: FastifyBaseLogger = this.log,
  ): Promise<GateResult<DispatchResponseV1>> {
    // VALIDATED
    const address = validateStarknetAddress(input.address);
    if (!address.ok) {
      return reject("validation", 400, "invalid_address", address.reason);
    }
    const selection = parseTokenSelection(input.token);
    if (selection === null) {
      return reject("validation", 400, "invalid_token", "token must be ETH, STRK or BOTH");
    }
    const tokens = tokensFor(selection);

    // LIMIT_CHECKED
    const limits = await this.checkLimits(input.ip, tokens);
    if (!limits.ok) return limits;

    // POW_VERIFIED
    const pow = await this.verifyPow(input, log);
    if (!pow.ok) return pow;

    // GUARD_CHECKED → TRANSFER_SUBMITTED, once per token
    const sent: TokenDispatch[] = [];
    const failed: Array<{ token: Token; rejection: Rejection }> = [];
    for (const token of tokens) {
      const result = await this.dispatchToken(address.address, token, log);
      if (result.ok) sent.push(result.value);
      else failed.push({ token, rejection: result.rejection });
    }

    if (sent.length === 0) {
      const [first] = failed;
      if (first) return { ok: false, rejection: first.rejection };
      return reject("transfer", 500, "internal_error", "no token was dispatched");
    }

    // COMMITTED
    await this.commit(input.ip, sent, log);

    if (selection !== "BOTH") {
      const [only] = sent;
      if (only) {
        return pass<DispatchResponseV1>({
          success: true,
          tx_hash: only.txHash,
          amount: only.display,
          token: only.token,
          explorer_url: explorerUrl(this.settings.network, only.txHash),
          message: `Sent ${only.display} ${only.token} to ${address.address}`,
        });
      }
    }

    const transactions: TransactionInfoV1[] = sent.map((s) => ({
      token: s.token,
      amount: s.display,
      tx_hash: s.txHash,
      explorer_url: explorerUrl(this.settings.network, s.txHash),
    }));
    const summary = sent.map((s) => `${s.display} ${s.token}`).join(" and ");
    if (failed.length === 0) {
      return pass<DispatchResponseV1>({
        success: true,
        transactions,
        message: `Sent ${summary} to ${address.address}`,
      });
    }

    const failures: DispatchFailureV1[] = failed.map(({ token, rejection }) => ({
      token,
      error: rejection.code,
      message: rejection.message,
    }));
    return pass<DispatchResponseV1>({
      success: true,
      transactions,
      message: `Sent ${summary} to ${address.address}; ${failures.map((f) => f.token).join(", ")} failed`,
      failures,
    });
  }

  private async checkLimits(ip: string, tokens: Token[]): Promise<GateResult<null>> {
    const daily = await this.limiter.checkDailyLimit(ip, tokens.length);
    if (!daily.allowed) {
      if (daily.cooldownUntil !== null) {
        const remainingHours = roundTo(1, (daily.cooldownUntil - this.now()) / HOUR_MS);
        return reject(
          "daily_limit",
          429,
          "daily_limit_exceeded",
          `Daily limit of ${daily.limit} requests reached. Try again in ${remainingHours}h`,
          {
            used: daily.used,
            limit: daily.limit,
            cooldown_end: daily.cooldownUntil,
            remaining_hours: remainingHours,
          },
        );
      }
      return reject(
        "daily_limit",
        429,
        "daily_limit_exceeded",
        `Request needs ${tokens.length} of ${daily.limit} daily requests; ${daily.used} already used`,
        { used: daily.used, limit: daily.limit, cooldown_end: null },
      );
    }

    for (const token of tokens) {
      const throttle = await this.limiter.checkTokenThrottle(ip, token);
      if (!throttle.allowed && throttle.nextAvailable !== null) {
        const remainingMinutes = Math.ceil((throttle.nextAvailable - this.now()) / MINUTE_MS);
        return reject(
          "token_throttle",
          429,
          "token_throttled",
          `${token} already sent to this IP within the last hour. Try again in ${remainingMinutes} min`,
          {
            token,
            next_request_at: throttle.nextAvailable,
            remaining_minutes: remainingMinutes,
          },
        );
      }
    }
    return pass(null);
  }

  private async verifyPow(input: DispatchInput, log: FastifyBaseLogger): Promise<GateResult<null>> {
    const record = await this.challenges.lookup(input.challengeId);
    if (!record) {
      return reject("pow", 400, "invalid_challenge", "Invalid or expired challenge");
    }

    const claimed = input.difficulty ?? record.difficulty;
    if (!this.challenges.verify(record, input.nonce, claimed)) {
      return reject("pow", 400, "invalid_pow", "Invalid proof of work", {
        difficulty: this.challenges.difficulty,
      });
    }

    try {
      const existed = await this.challenges.consume(record.id);
      if (!existed) {
        // Another request consumed it between lookup and delete.
        return reject("pow", 400, "invalid_challenge", "Invalid or expired challenge");
      }
    } catch (err) {
      log.warn({ err, challengeId: record.id }, "challenge delete failed; continuing");
    }
    return pass(null);
  }

  private async dispatchToken(
    recipient: string,
    token: Token,
    log: FastifyBaseLogger,
  ): Promise<GateResult<TokenDispatch>> {
    const amount = this.amounts[token];
    const display = formatUnits(amount);

    const reservation = await this.guard.tryReserve(
      token,
      this.settings.dripAmounts[token],
      this.settings.caps[token],
    );
    if (!reservation) {
      return reject(
        "distribution_cap",
        503,
        "distribution_cap_reached",
        `Global ${token} distribution limit reached. Try again later`,
        { token },
      );
    }

    let reserve: ReserveDecision;
    try {
      reserve = await this.guard.checkReserveProtection(token, amount);
    } catch (err) {
      await this.releaseQuietly(reservation, log);
      log.error({ err, token }, "faucet balance read failed");
      return reject(
        "reserve_protection",
        500,
        "chain_unavailable",
        `Could not read the faucet ${token} balance`,
        { token },
      );
    }
    if (!reserve.allowed) {
      await this.releaseQuietly(reservation, log);
      return reject(
        "reserve_protection",
        503,
        "insufficient_reserve",
        `Faucet ${token} reserve too low`,
        { token },
      );
    }

    let txHash: string;
    try {
      txHash = await withTimeout(
        this.chain.transfer(recipient, token, amount),
        this.settings.transferTimeoutMs,
      );
    } catch (err) {
      await this.releaseQuietly(reservation, log);
      const timedOut = err instanceof TransferTimeoutError;
      log.error({ err, token, recipient }, timedOut ? "transfer timed out" : "transfer failed");
      return reject(
        "transfer",
        500,
        timedOut ? "transfer_timeout" : "transfer_failed",
        timedOut ? `${token} transfer timed out` : `${token} transfer failed`,
        { token },
      );
    }

    log.info({ token, recipient, amount: display, txHash }, "dispatched");
    return pass({ token, amount, display, txHash });
  }

  private async commit(ip: string, sent: TokenDispatch[], log: FastifyBaseLogger): Promise<void> {
    try {
      const transition = await this.limiter.consumeDailyQuota(ip, sent.length);
      if (transition.kind === "cooldown") {
        log.info({ ip, cooldownUntil: transition.cooldownUntil }, "daily limit reached; cooldown started");
      } else if (transition.kind === "cooling") {
        // Transfers already went out; a concurrent request from this IP started the cooldown first.
        log.warn(
          {
            ip,
            cooldownUntil: transition.cooldownUntil,
            transferred: sent.map((s) => ({ token: s.token, amount: s.display, txHash: s.txHash })),
          },
          "quota exceeded by concurrent dispatch",
        );
      }
    } catch (err) {
      log.error({ err, ip }, "daily quota commit failed");
    }

    for (const { token } of sent) {
      try {
        await this.limiter.setTokenThrottle(ip, token);
      } catch (err) {
        log.error({ err, ip, token }, "token throttle commit failed");
      }
    }
  }

  private async releaseQuietly(
    reservation: DistributionReservation,
    log: FastifyBaseLogger,
  ): Promise<void> {
    try {
      await this.guard.release(reservation);
    } catch (err) {
      log.error({ err, token: reservation.token }, "distribution release failed");
    }
  }
}

async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, rejectTimeout) => {
    timer = setTimeout(() => rejectTimeout(new TransferTimeoutError(ms)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function roundTo(digits: number, value: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
