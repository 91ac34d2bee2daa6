/**
 * Distribution guard — global per-token caps and reserve protection.
 *
 * Caps are tracked in ledger units (10^-6 token) so the store adds
 * integers. The reserve check runs on base units (10^-18) against the
 * live chain balance.
 */

import {
  DAILY_WINDOW_MS,
  HOURLY_WINDOW_MS,
  toLedgerUnits,
  type Token,
} from "@starkdrip/protocol";
import type { ChainClient } from "@starkdrip/chain-client";
import type { QuotaStore, Reservation } from "../store/quota-store.js";

export interface DistributionGuardOptions {
  store: QuotaStore;
  chain: ChainClient;
  faucetAddress: string;
  minBalanceProtectPct: number;
}

/** Caps in decimal tokens; "0" disables a window. */
export interface DistributionCaps {
  hourly: string;
  daily: string;
}

/** What tryReserve added, so a failed transfer can hand it back. */
export interface DistributionReservation {
  token: Token;
  entries: Reservation[];
}

export interface ReserveDecision {
  allowed: boolean;
  balance: bigint;
  minRequired: bigint;
}

export const hourlyDistributionKey = (token: Token): string =>
  `global:distributed:hour:${token}`;
export const dailyDistributionKey = (token: Token): string =>
  `global:distributed:day:${token}`;

/**
 * Pure reserve check: the transfer must leave at least `protectPct` percent
 * of the current balance behind.
 */
export function checkReserve(
  amount: bigint,
  currentBalance: bigint,
  protectPct: number,
): { allowed: boolean; minRequired: bigint } {
  const pct = BigInt(Math.max(0, Math.floor(protectPct)));
  const minRequired = (currentBalance * pct) / 100n;
  if (amount > currentBalance) return { allowed: false, minRequired };
  const allowed = (currentBalance - amount) * 100n >= currentBalance * pct;
  return { allowed, minRequired };
}

export class DistributionGuard {
  private readonly store: QuotaStore;
  private readonly chain: ChainClient;
  private readonly faucetAddress: string;
  private readonly protectPct: number;

  constructor(opts: DistributionGuardOptions) {
    this.store = opts.store;
    this.chain = opts.chain;
    this.faucetAddress = opts.faucetAddress;
    this.protectPct = opts.minBalanceProtectPct;
  }

  /**
   * Reserve `amount` against every enabled window, all or nothing.
   * Returns null when a cap would be exceeded.
   */
  async tryReserve(
    token: Token,
    amount: string,
    caps: DistributionCaps,
  ): Promise<DistributionReservation | null> {
    const units = toLedgerUnits(amount);
    const hourlyCap = toLedgerUnits(caps.hourly);
    const dailyCap = toLedgerUnits(caps.daily);

    const entries: Reservation[] = [];
    if (hourlyCap > 0) {
      entries.push({
        key: hourlyDistributionKey(token),
        amount: units,
        limit: hourlyCap,
        ttlMs: HOURLY_WINDOW_MS,
      });
    }
    if (dailyCap > 0) {
      entries.push({
        key: dailyDistributionKey(token),
        amount: units,
        limit: dailyCap,
        ttlMs: DAILY_WINDOW_MS,
      });
    }
    if (entries.length === 0) return { token, entries };

    const ok = await this.store.reserve(entries);
    return ok ? { token, entries } : null;
  }

  /** Hand back a reservation after a failed transfer. */
  async release(reservation: DistributionReservation): Promise<void> {
    if (reservation.entries.length === 0) return;
    await this.store.release(
      reservation.entries.map((e) => ({ key: e.key, amount: e.amount })),
    );
  }

  /** Read the live faucet balance and apply checkReserve. */
  async checkReserveProtection(token: Token, amount: bigint): Promise<ReserveDecision> {
    const balance = await this.chain.getBalance(this.faucetAddress, token);
    const { allowed, minRequired } = checkReserve(amount, balance, this.protectPct);
    return { allowed, balance, minRequired };
  }
}
