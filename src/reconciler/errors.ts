/**
 * Reconciler Module - Error Types
 *
 * Payloads that cannot be decoded at all. Field-level failures inside an
 * otherwise good payload are reported as PARTIAL_DECODE_FAILURE events.
 */
import { type CodecError, formatCodecError } from "../codec/index.js";
import {
  type RegistryError,
  formatRegistryError,
} from "../registry/index.js";

export type StatusError = CodecError | RegistryError;

/**
 * Format a StatusError for logging.
 */
export function formatStatusError(error: StatusError): string {
  switch (error.type) {
    case "ENCODE_FAILED":
    case "DECODE_FAILED":
    case "FIELD_TOO_LONG":
    case "ARRAY_LENGTH_MISMATCH":
      return formatCodecError(error);
    default:
      return formatRegistryError(error);
  }
}
