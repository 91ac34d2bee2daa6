/**
 * starkdrip config [--set-api url]
 *
 * Show or update CLI configuration.
 */

import { loadConfig, saveConfig, getConfigPath, normalizeApiUrl } from "../lib/config.js";

export async function configCommand(opts: { setApi?: string }): Promise<void> {
  const config = await loadConfig();

  if (opts.setApi) {
    config.api = normalizeApiUrl(opts.setApi);
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  api: ${config.api}`);
  if (process.env["FAUCET_API_URL"]) {
    console.log(`  (FAUCET_API_URL overrides the config file)`);
  }
}
