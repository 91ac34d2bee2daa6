/**
 * starkdrip status <address>
 *
 * GET /status/:address → whether a request would pass right now.
 */

import { validateStarknetAddress } from "@starkdrip/protocol";
import type { FaucetApiClient } from "../lib/http.js";
import { printQuota } from "./quota.js";

export async function statusCommand(
  address: string,
  client: FaucetApiClient,
  opts: { json?: boolean } = {},
): Promise<void> {
  const check = validateStarknetAddress(address);
  if (!check.ok) {
    throw new Error(`Invalid address: ${check.reason}`);
  }

  const status = await client.getStatus(check.address);
  if (opts.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log(`Status for ${status.address}\n`);
  console.log(`  Can request now: ${status.can_request ? "yes" : "no"}`);
  printQuota(status, Date.now());
}
