/**
 * Validator Module - Public API
 */

// Types
export type {
  ValidatedCommand,
  ValidatedRequest,
  ValidationContext,
  ZoneLimits,
} from "./schema.js";
export type { ValidationError, ValidationRule } from "./errors.js";

// Constants
export { MAX_ZONES, POWER_CHANNELS, POWER_DEVICES } from "./schema.js";

// Error utilities
export { formatValidationError } from "./errors.js";

// Service functions (shared registry)
export { validate, validateStatusRequest } from "./service.js";

// Pure transformations
export {
  checkValue,
  targetKeyOf,
  topologyLimit,
  validateCommand,
  validateRequest,
} from "./transform.js";
