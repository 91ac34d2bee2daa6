/**
 * starkdrip info
 *
 * GET /info → network, amounts, limits, reserve.
 */

import type { FaucetApiClient } from "../lib/http.js";

export async function infoCommand(client: FaucetApiClient, opts: { json?: boolean } = {}): Promise<void> {
  const info = await client.getInfo();
  if (opts.json) {
    console.log(JSON.stringify(info, null, 2));
    return;
  }

  console.log(`Faucet at ${client.baseUrl} (${info.network})\n`);
  console.log(`  Per request:`);
  console.log(`    STRK: ${info.limits.strk_per_request}`);
  console.log(`    ETH:  ${info.limits.eth_per_request}`);
  console.log(`\n  Limits:`);
  console.log(`    daily requests per IP: ${info.limits.daily_requests_per_ip}`);
  console.log(`    per-token throttle:    ${info.limits.token_throttle_hours}h`);
  console.log(`    challenges per hour:   ${info.limits.challenges_per_hour}`);
  console.log(`\n  Proof of work: ${info.pow.enabled ? `difficulty ${info.pow.difficulty}` : "disabled"}`);
  console.log(`\n  Faucet balance:`);
  console.log(`    STRK: ${info.faucet_balance.strk ?? "(unavailable)"}`);
  console.log(`    ETH:  ${info.faucet_balance.eth ?? "(unavailable)"}`);
}
