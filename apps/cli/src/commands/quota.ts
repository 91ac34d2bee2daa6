/**
 * starkdrip quota
 *
 * GET /quota → remaining daily requests and per-token throttle for this IP.
 */

import type { QuotaResponseV1, TokenThrottleV1 } from "@starkdrip/protocol";
import type { FaucetApiClient } from "../lib/http.js";
import { formatDuration } from "../lib/format.js";

export async function quotaCommand(client: FaucetApiClient, opts: { json?: boolean } = {}): Promise<void> {
  const quota = await client.getQuota();
  if (opts.json) {
    console.log(JSON.stringify(quota, null, 2));
    return;
  }
  printQuota(quota, Date.now());
}

export function printQuota(quota: QuotaResponseV1, now: number): void {
  const daily = quota.daily_limit;
  console.log(`  Daily: ${daily.used}/${daily.total} used, ${daily.remaining} remaining`);
  if (daily.cooldown_end !== null) {
    console.log(`    cooldown ends in ${formatDuration(daily.cooldown_end - now)}`);
  }
  console.log(`  STRK: ${throttleLine(quota.hourly_throttle.strk, now)}`);
  console.log(`  ETH:  ${throttleLine(quota.hourly_throttle.eth, now)}`);
}

function throttleLine(throttle: TokenThrottleV1, now: number): string {
  if (throttle.available || throttle.next_request_at === null) return "available";
  return `available in ${formatDuration(throttle.next_request_at - now)}`;
}
