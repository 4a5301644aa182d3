/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. The process stops immediately on invalid config - fail fast.
 *
 * iZone protocol engine configuration covering:
 * - Runtime and logging
 * - Request/response correlation (timeouts, read retries)
 * - Bridge endpoint names
 */
import { z } from "zod";

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime Configuration
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Correlation
  // ==========================================================================
  IZONE_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(3000)
    .describe("Per-attempt reply deadline (ms)"),
  IZONE_RETRY_BASE_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(250)
    .describe("Base delay for exponential read backoff (ms)"),
  IZONE_READ_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1)
    .max(10)
    .default(3)
    .describe("Total attempts for reads and opted-in idempotent writes"),

  // ==========================================================================
  // Bridge Endpoints
  // ==========================================================================
  IZONE_COMMAND_ENDPOINT: z
    .string()
    .min(1)
    .default("iZoneCommandV2")
    .describe("Endpoint for iZone commands"),
  IZONE_REQUEST_ENDPOINT: z
    .string()
    .min(1)
    .default("iZoneRequestV2")
    .describe("Endpoint for iZone status requests"),
  POWER_COMMAND_ENDPOINT: z
    .string()
    .min(1)
    .default("PowerCommand")
    .describe("Endpoint for power monitor commands"),
  POWER_REQUEST_ENDPOINT: z
    .string()
    .min(1)
    .default("PowerRequest")
    .describe("Endpoint for power monitor requests"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Correlator timing configuration.
 */
export function getCorrelatorConfig(): Readonly<{
  timeoutMs: number;
  retryBaseMs: number;
  readAttempts: number;
}> {
  return {
    timeoutMs: config.IZONE_REQUEST_TIMEOUT_MS,
    retryBaseMs: config.IZONE_RETRY_BASE_MS,
    readAttempts: config.IZONE_READ_ATTEMPTS,
  };
}

/**
 * Endpoint names keyed by the registry's endpoint kinds.
 */
export function getEndpointConfig(): Readonly<{
  izoneCommand: string;
  izoneRequest: string;
  powerCommand: string;
  powerRequest: string;
}> {
  return {
    izoneCommand: config.IZONE_COMMAND_ENDPOINT,
    izoneRequest: config.IZONE_REQUEST_ENDPOINT,
    powerCommand: config.POWER_COMMAND_ENDPOINT,
    powerRequest: config.POWER_REQUEST_ENDPOINT,
  };
}
