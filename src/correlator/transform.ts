/**
 * Correlator Module - Pure Transformations
 */
import type { CorrelatorConfig, CorrelatorRequest } from "./schema.js";

/**
 * Delay before attempt `attempt + 1`: base, 2×base, 4×base…
 */
export function backoffDelay(config: CorrelatorConfig, attempt: number): number {
  return config.retryBaseMs * 2 ** Math.max(0, attempt - 1);
}

/**
 * Whether a failed attempt may be sent again.
 *
 * @param retryEnabled - Writes the caller opted in to resending
 */
export function mayRetry(
  config: CorrelatorConfig,
  request: CorrelatorRequest,
  attempts: number,
  retryEnabled: ReadonlySet<string>,
): boolean {
  if (attempts >= config.readAttempts) return false;
  return request.kind === "read" || retryEnabled.has(request.name);
}
