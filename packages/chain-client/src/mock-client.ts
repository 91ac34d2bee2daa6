/**
 * Mock chain client for testing.
 *
 * Holds balances in memory and debits them on transfer. Use failNext() to
 * make the next transfer or balance read reject, and the `transfers` log to
 * assert what was sent.
 */

import { createHash } from "node:crypto";
import type { Token } from "@starkdrip/protocol";
import type { ChainClient } from "./types.js";

export interface MockTransfer {
  recipient: string;
  token: Token;
  amount: bigint;
  txHash: string;
}

type FailureTarget = "transfer" | "getBalance";

export class MockChainClient implements ChainClient {
  readonly transfers: MockTransfer[] = [];
  private readonly balances = new Map<string, bigint>();
  private readonly failures: Array<{ target: FailureTarget; token?: Token; error: Error }> = [];
  private transferDelayMs = 0;

  constructor(private readonly faucetAddress: string) {}

  async transfer(recipient: string, token: Token, amount: bigint): Promise<string> {
    if (this.transferDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.transferDelayMs));
    }
    this.throwIfFailing("transfer", token);

    const balance = this.balanceOf(this.faucetAddress, token);
    if (balance < amount) {
      throw new Error(`MockChainClient: insufficient ${token} balance`);
    }
    this.balances.set(key(this.faucetAddress, token), balance - amount);
    this.balances.set(key(recipient, token), this.balanceOf(recipient, token) + amount);

    const txHash =
      "0x" +
      createHash("sha256")
        .update(`${this.transfers.length}:${recipient}:${token}:${amount}`)
        .digest("hex")
        .slice(0, 63);
    this.transfers.push({ recipient, token, amount, txHash });
    return txHash;
  }

  async getBalance(address: string, token: Token): Promise<bigint> {
    this.throwIfFailing("getBalance", token);
    return this.balanceOf(address, token);
  }

  /** Test helper: set a balance in base units. */
  setBalance(address: string, token: Token, amount: bigint): void {
    this.balances.set(key(address, token), amount);
  }

  /** Test helper: make the next matching call reject with `error`. */
  failNext(target: FailureTarget, error: Error = new Error(`mock ${target} failure`), token?: Token): void {
    this.failures.push({ target, token, error });
  }

  /** Test helper: delay every transfer (timeouts). */
  setTransferDelay(ms: number): void {
    this.transferDelayMs = ms;
  }

  private balanceOf(address: string, token: Token): bigint {
    return this.balances.get(key(address, token)) ?? 0n;
  }

  private throwIfFailing(target: FailureTarget, token: Token): void {
    const idx = this.failures.findIndex(
      (f) => f.target === target && (f.token === undefined || f.token === token),
    );
    if (idx === -1) return;
    const [failure] = this.failures.splice(idx, 1);
    if (failure) throw failure.error;
  }
}

function key(address: string, token: Token): string {
  return `${address.toLowerCase()}:${token}`;
}
