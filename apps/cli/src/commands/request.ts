/**
 * starkdrip request <address> [--token STRK|ETH|BOTH]
 *
 * POST /challenge → solve PoW locally → POST /request → print transactions.
 */

import {
  estimateSolveSeconds,
  parseTokenSelection,
  solvePow,
  validateStarknetAddress,
  type DispatchResponseV1,
} from "@starkdrip/protocol";
import type { FaucetApiClient } from "../lib/http.js";

export interface RequestOptions {
  token?: string;
  both?: boolean;
  json?: boolean;
}

export async function requestCommand(
  address: string,
  client: FaucetApiClient,
  opts: RequestOptions = {},
): Promise<DispatchResponseV1> {
  const check = validateStarknetAddress(address);
  if (!check.ok) {
    throw new Error(`Invalid address: ${check.reason}`);
  }
  const selection = opts.both ? "BOTH" : parseTokenSelection(opts.token ?? "STRK");
  if (selection === null) {
    throw new Error(`Invalid token: ${opts.token}. Use STRK, ETH or BOTH`);
  }
  const log = (line: string): void => {
    if (!opts.json) console.log(line);
  };

  log(`Requesting ${selection} for ${check.address}\n`);

  const challenge = await client.getChallenge();
  log(
    `  Solving proof of work (difficulty ${challenge.difficulty}, ~${estimateSolveSeconds(challenge.difficulty)}s)...`,
  );

  const started = Date.now();
  const solution = solvePow(challenge.challenge, challenge.difficulty, {
    onProgress: (attempts) => {
      if (!opts.json) process.stdout.write(`\r  ${attempts.toLocaleString("en-US")} hashes`);
    },
    progressInterval: 100_000,
  });
  log(
    `\r  Solved: nonce ${solution.nonce} after ${solution.attempts} attempts (${((Date.now() - started) / 1000).toFixed(1)}s)`,
  );

  const result = await client.requestTokens({
    address: check.address,
    token: selection,
    challenge_id: challenge.challenge_id,
    nonce: solution.nonce,
    difficulty: challenge.difficulty,
  });

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  console.log(`\n${result.message}`);
  if ("transactions" in result) {
    for (const tx of result.transactions) {
      console.log(`  ${tx.token}: ${tx.amount}`);
      console.log(`    tx:       ${tx.tx_hash}`);
      console.log(`    explorer: ${tx.explorer_url}`);
    }
    for (const failure of result.failures ?? []) {
      console.log(`  ${failure.token}: failed (${failure.message})`);
    }
  } else {
    console.log(`  tx:       ${result.tx_hash}`);
    console.log(`  explorer: ${result.explorer_url}`);
  }
  return result;
}
