/**
 * Validator Module - Error Types
 *
 * Typed error unions for command validation.
 * Errors are values, not exceptions.
 */
import {
  type RegistryError,
  formatRegistryError,
} from "../registry/index.js";

export type ValidationRule =
  | "type"
  | "shape"
  | "range"
  | "step"
  | "enum"
  | "length"
  | "crossField";

export type ValidationError =
  | RegistryError
  | {
      readonly type: "VALIDATION_FAILED";
      readonly field: string;
      readonly rule: ValidationRule;
      readonly reason: string;
    }
  | {
      readonly type: "INDEX_OUT_OF_RANGE";
      readonly field: string;
      readonly index: number;
      readonly limit: number;
    };

export const validationFailed = (
  field: string,
  rule: ValidationRule,
  reason: string,
): ValidationError => ({
  type: "VALIDATION_FAILED",
  field,
  rule,
  reason,
});

export const indexOutOfRange = (
  field: string,
  index: number,
  limit: number,
): ValidationError => ({
  type: "INDEX_OUT_OF_RANGE",
  field,
  index,
  limit,
});

/**
 * Format a ValidationError for logging.
 */
export function formatValidationError(error: ValidationError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `${error.field}: ${error.reason}`;
    case "INDEX_OUT_OF_RANGE":
      return `${error.field}: index ${error.index} outside 0..${error.limit - 1}`;
    default:
      return formatRegistryError(error);
  }
}
