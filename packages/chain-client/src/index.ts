/**
 * @starkdrip/chain-client — Starknet token transfer abstraction.
 *
 * The faucet depends only on the ChainClient interface.
 * Swap StarknetRpcClient for MockChainClient in tests.
 */

export type { ChainClient, StarknetRpcClientOptions } from "./types.js";

export { StarknetRpcClient } from "./rpc-client.js";
export { MockChainClient, type MockTransfer } from "./mock-client.js";
