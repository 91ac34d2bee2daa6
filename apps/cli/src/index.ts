#!/usr/bin/env node
/**
 * starkdrip CLI — request Starknet testnet tokens from a faucet.
 *
 * Commands:
 *   request <address>       Solve a PoW challenge → receive STRK, ETH or both
 *   quota                   Remaining daily requests + per-token throttle
 *   status <address>        Whether a request would pass right now
 *   info                    Amounts, limits, faucet balance
 *   limits                  Rate-limit rules explained
 *   config                  Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig } from "./lib/config.js";
import { FaucetApiClient, FaucetApiError } from "./lib/http.js";
import { describeApiError } from "./lib/format.js";
import { requestCommand } from "./commands/request.js";
import { quotaCommand } from "./commands/quota.js";
import { statusCommand } from "./commands/status.js";
import { infoCommand } from "./commands/info.js";
import { limitsCommand } from "./commands/limits.js";
import { configCommand } from "./commands/config-cmd.js";

interface GlobalOptions {
  api?: string;
  json?: boolean;
}

const program = new Command();

program
  .name("starkdrip")
  .description("Starknet testnet faucet client")
  .version("0.1.0")
  .option("-a, --api <url>", "Faucet API URL override")
  .option("--json", "Print raw JSON responses");

async function clientFor(): Promise<{ client: FaucetApiClient; json: boolean }> {
  const global = program.opts<GlobalOptions>();
  const config = await loadConfig({ api: global.api });
  return { client: new FaucetApiClient(config.api), json: global.json ?? false };
}

// ── request ─────────────────────────────────────────────────────────

program
  .command("request")
  .description("Request tokens: challenge → solve → dispatch")
  .argument("<address>", "Starknet address (0x…)")
  .option("-t, --token <token>", "STRK, ETH or BOTH", "STRK")
  .option("--both", "Request STRK and ETH (counts as 2 daily requests)")
  .action(async (address: string, opts: { token?: string; both?: boolean }) => {
    const { client, json } = await clientFor();
    await requestCommand(address, client, { token: opts.token, both: opts.both, json });
  });

// ── quota ───────────────────────────────────────────────────────────

program
  .command("quota")
  .description("Show your remaining quota")
  .action(async () => {
    const { client, json } = await clientFor();
    await quotaCommand(client, { json });
  });

// ── status ──────────────────────────────────────────────────────────

program
  .command("status")
  .description("Check whether an address can request now")
  .argument("<address>", "Starknet address (0x…)")
  .action(async (address: string) => {
    const { client, json } = await clientFor();
    await statusCommand(address, client, { json });
  });

// ── info ────────────────────────────────────────────────────────────

program
  .command("info")
  .description("Show faucet amounts, limits and balance")
  .action(async () => {
    const { client, json } = await clientFor();
    await infoCommand(client, { json });
  });

// ── limits ──────────────────────────────────────────────────────────

program
  .command("limits")
  .description("Explain the rate-limit rules")
  .action(async () => {
    const { client } = await clientFor();
    await limitsCommand(client);
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--set-api <url>", "Set the default faucet API URL")
  .action(async (opts: { setApi?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof FaucetApiError) {
    console.error(`\n${describeApiError(err)}`);
  } else {
    console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
});
