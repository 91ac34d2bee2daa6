/**
 * CLI configuration: loads from ~/.starkdrip/config.json + env overrides.
 *
 * Priority: --api flag > FAUCET_API_URL > config file > default.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

export interface CliConfig {
  /** Faucet API base URL, no trailing slash. */
  api: string;
}

const CONFIG_DIR = join(homedir(), ".starkdrip");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export const DEFAULT_API = "http://localhost:3000";

export function getConfigPath(): string {
  return CONFIG_FILE;
}

/** Strip trailing slashes so paths can be appended directly. */
export function normalizeApiUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

async function readConfigFile(path: string): Promise<Partial<CliConfig>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    // No config file yet
    return {};
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null) return {};
  const api = "api" in parsed ? parsed.api : undefined;
  return typeof api === "string" && api.length > 0 ? { api } : {};
}

/** Load config, merging env and flag overrides on top. */
export async function loadConfig(
  overrides: { api?: string } = {},
  path: string = CONFIG_FILE,
): Promise<CliConfig> {
  const fileConfig = await readConfigFile(path);
  const api =
    overrides.api ?? process.env["FAUCET_API_URL"] ?? fileConfig.api ?? DEFAULT_API;
  return { api: normalizeApiUrl(api) };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig, path: string = CONFIG_FILE): Promise<void> {
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
