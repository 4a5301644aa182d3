/**
 * Session Module - Error Types
 *
 * Everything a session call can fail with: rejected before sending,
 * failed in flight, or a reply that could not be used.
 */
import { type CodecError, formatCodecError } from "../codec/index.js";
import {
  type CorrelatorError,
  formatCorrelatorError,
} from "../correlator/index.js";
import {
  type ValidationError,
  formatValidationError,
} from "../validator/index.js";

export type SessionError =
  | ValidationError
  | CodecError
  | CorrelatorError
  | {
      readonly type: "UNEXPECTED_REPLY";
      readonly expected: string;
      readonly received: string | null;
    };

export function unexpectedReply(
  expected: string,
  received: string | null,
): SessionError {
  return { type: "UNEXPECTED_REPLY", expected, received };
}

/**
 * Format a SessionError for logging.
 */
export function formatSessionError(error: SessionError): string {
  switch (error.type) {
    case "UNEXPECTED_REPLY":
      return `Expected ${error.expected}, received ${error.received ?? "nothing usable"}`;
    case "ENCODE_FAILED":
    case "DECODE_FAILED":
    case "FIELD_TOO_LONG":
    case "ARRAY_LENGTH_MISMATCH":
      return formatCodecError(error);
    case "REQUEST_TIMEOUT":
    case "TRANSPORT_FAILURE":
    case "REQUEST_CANCELLED":
    case "SESSION_CLOSED":
    case "RETRY_NOT_ALLOWED":
      return formatCorrelatorError(error);
    default:
      return formatValidationError(error);
  }
}
