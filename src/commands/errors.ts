/**
 * Commands Module - Error Types
 */
import { type CodecError, formatCodecError } from "../codec/index.js";
import {
  type RegistryError,
  formatRegistryError,
} from "../registry/index.js";

export type CommandError = CodecError | RegistryError;

/**
 * Format a CommandError for logging.
 */
export function formatCommandError(error: CommandError): string {
  switch (error.type) {
    case "SCHEMA_NOT_FOUND":
    case "REGISTRY_INVALID":
    case "REGISTRY_UNREADABLE":
      return formatRegistryError(error);
    default:
      return formatCodecError(error);
  }
}
