/**
 * Shared console formatting for faucet commands.
 */

import { FaucetApiError } from "./http.js";

/** "3h 12m", "45m", "30s" */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.ceil(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  if (hours > 0) return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  if (minutes > 0) return `${minutes}m`;
  return `${totalSeconds}s`;
}

/** Human message for a rejected request, including when to retry. */
export function describeApiError(err: FaucetApiError): string {
  const { body } = err;
  const lines = [`${body.message} (${body.error}, HTTP ${err.status})`];
  if (body.remaining_hours !== undefined) {
    lines.push(`  Daily limit: ${body.used ?? "?"}/${body.limit ?? "?"} used, resets in ~${body.remaining_hours}h`);
  }
  if (body.remaining_minutes !== undefined && body.token !== undefined) {
    lines.push(`  ${body.token} available again in ~${body.remaining_minutes} min`);
  }
  return lines.join("\n");
}
