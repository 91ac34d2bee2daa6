/**
 * Starknet RPC client: starknet.js Account + RpcProvider.
 *
 * transfer() invokes the token contract's `transfer(recipient, u256)` from
 * the faucet account; getBalance() calls `balanceOf` and recombines the
 * (low, high) u256 halves.
 */

import { Account, CallData, RpcProvider, cairo, uint256 } from "starknet";
import type { Token } from "@starkdrip/protocol";
import type { ChainClient, StarknetRpcClientOptions } from "./types.js";

export class StarknetRpcClient implements ChainClient {
  private readonly provider: RpcProvider;
  private readonly account: Account;
  private readonly tokenAddresses: Record<Token, string>;

  constructor(opts: StarknetRpcClientOptions) {
    this.provider = new RpcProvider({ nodeUrl: opts.rpcUrl });
    this.account = new Account(this.provider, opts.accountAddress, opts.privateKey);
    this.tokenAddresses = opts.tokenAddresses;
  }

  async transfer(recipient: string, token: Token, amount: bigint): Promise<string> {
    const { transaction_hash } = await this.account.execute({
      contractAddress: this.tokenAddresses[token],
      entrypoint: "transfer",
      calldata: CallData.compile({
        recipient,
        amount: cairo.uint256(amount),
      }),
    });
    return transaction_hash;
  }

  async getBalance(address: string, token: Token): Promise<bigint> {
    const result = await this.provider.callContract(
      {
        contractAddress: this.tokenAddresses[token],
        entrypoint: "balanceOf",
        calldata: [address],
      },
      "latest",
    );

    const [low, high] = result;
    if (low === undefined || high === undefined) {
      throw new Error(`balanceOf(${token}): unexpected result length ${result.length}`);
    }
    return uint256.uint256ToBN({ low, high });
  }
}
