/**
 * Registry Module - Error Types
 */

export type RegistryError =
  | {
      readonly type: "SCHEMA_NOT_FOUND";
      readonly name: string;
      readonly expected?: "status" | "request" | "command";
    }
  | {
      readonly type: "REGISTRY_INVALID";
      readonly issues: readonly string[];
    }
  | {
      readonly type: "REGISTRY_UNREADABLE";
      readonly message: string;
      readonly cause?: Error;
    };

export function schemaNotFound(
  name: string,
  expected?: "status" | "request" | "command",
): RegistryError {
  if (expected) {
    return { type: "SCHEMA_NOT_FOUND", name, expected };
  }
  return { type: "SCHEMA_NOT_FOUND", name };
}

export function registryInvalid(issues: readonly string[]): RegistryError {
  return { type: "REGISTRY_INVALID", issues };
}

export function registryUnreadable(
  message: string,
  cause?: Error,
): RegistryError {
  if (cause) {
    return { type: "REGISTRY_UNREADABLE", message, cause };
  }
  return { type: "REGISTRY_UNREADABLE", message };
}

/**
 * Format a RegistryError for logging.
 */
export function formatRegistryError(error: RegistryError): string {
  switch (error.type) {
    case "SCHEMA_NOT_FOUND":
      return error.expected
        ? `No ${error.expected} message named ${error.name}`
        : `No message named ${error.name}`;
    case "REGISTRY_INVALID":
      return `Registry invalid: ${error.issues.join("; ")}`;
    case "REGISTRY_UNREADABLE":
      return `Registry unreadable: ${error.message}`;
  }
}
