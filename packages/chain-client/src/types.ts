/**
 * Chain client interface over the Starknet RPC.
 *
 * The faucet transfers through transfer() and reads the live reserve
 * through getBalance(). Swap StarknetRpcClient for MockChainClient in tests.
 */

import type { Token } from "@starkdrip/protocol";

export interface ChainClient {
  /**
   * Send `amount` base units of `token` to `recipient`.
   * Resolves with the transaction hash once the invoke is accepted by the
   * node. Never retried by the caller.
   */
  transfer(recipient: string, token: Token, amount: bigint): Promise<string>;
  /** Current balance of `address` in base units (read at call time, never cached). */
  getBalance(address: string, token: Token): Promise<bigint>;
}

export interface StarknetRpcClientOptions {
  /** JSON-RPC endpoint of a Starknet node. */
  rpcUrl: string;
  /** Faucet account contract address. */
  accountAddress: string;
  /** Faucet account private key (hex). */
  privateKey: string;
  /** ERC-20 contract addresses per token. */
  tokenAddresses: Record<Token, string>;
}
