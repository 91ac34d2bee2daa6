/**
 * starkdrip limits
 *
 * Explain the rate-limit rules, with numbers from GET /info.
 */

import type { FaucetApiClient } from "../lib/http.js";

export async function limitsCommand(client: FaucetApiClient): Promise<void> {
  const { limits } = await client.getInfo();
  const daily = limits.daily_requests_per_ip;

  console.log(`Daily limit (per IP)`);
  console.log(`  ${daily} requests per day`);
  console.log(`  STRK or ETH counts as 1 request; BOTH counts as 2`);
  console.log(`  After request ${daily}: 24h cooldown, starting from that request`);
  console.log(`  Failed transfers do not count\n`);

  console.log(`Per-token throttle`);
  console.log(`  1 STRK request every ${limits.token_throttle_hours}h`);
  console.log(`  1 ETH request every ${limits.token_throttle_hours}h`);
  console.log(`  The two tokens are throttled independently\n`);

  console.log(`Proof-of-work challenges`);
  console.log(`  ${limits.challenges_per_hour} per hour; each challenge is single-use\n`);

  console.log(`Amounts`);
  console.log(`  STRK: ${limits.strk_per_request} per request`);
  console.log(`  ETH:  ${limits.eth_per_request} per request`);
}
