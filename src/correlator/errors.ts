/**
 * Correlator Module - Error Types
 */

export type CorrelatorError =
  | {
      readonly type: "REQUEST_TIMEOUT";
      readonly name: string;
      readonly attempts: number;
      /** UNKNOWN for writes: the device may have applied it, re-query status */
      readonly outcome: "UNKNOWN" | "NOT_APPLIED";
    }
  | {
      readonly type: "TRANSPORT_FAILURE";
      readonly name: string;
      readonly message: string;
      readonly attempts: number;
    }
  | {
      readonly type: "REQUEST_CANCELLED";
      readonly name: string;
    }
  | {
      readonly type: "SESSION_CLOSED";
      readonly name: string;
    }
  | {
      readonly type: "RETRY_NOT_ALLOWED";
      readonly name: string;
    };

export function requestTimeout(
  name: string,
  attempts: number,
  write: boolean,
): CorrelatorError {
  return {
    type: "REQUEST_TIMEOUT",
    name,
    attempts,
    outcome: write ? "UNKNOWN" : "NOT_APPLIED",
  };
}

export function transportFailure(
  name: string,
  message: string,
  attempts: number,
): CorrelatorError {
  return { type: "TRANSPORT_FAILURE", name, message, attempts };
}

export function requestCancelled(name: string): CorrelatorError {
  return { type: "REQUEST_CANCELLED", name };
}

export function sessionClosed(name: string): CorrelatorError {
  return { type: "SESSION_CLOSED", name };
}

export function retryNotAllowed(name: string): CorrelatorError {
  return { type: "RETRY_NOT_ALLOWED", name };
}

/**
 * Format a CorrelatorError for logging.
 */
export function formatCorrelatorError(error: CorrelatorError): string {
  switch (error.type) {
    case "REQUEST_TIMEOUT":
      return error.outcome === "UNKNOWN"
        ? `${error.name} timed out after ${error.attempts} attempt(s); outcome unknown`
        : `${error.name} timed out after ${error.attempts} attempt(s)`;
    case "TRANSPORT_FAILURE":
      return `${error.name} failed: ${error.message}`;
    case "REQUEST_CANCELLED":
      return `${error.name} cancelled`;
    case "SESSION_CLOSED":
      return `${error.name}: session closed`;
    case "RETRY_NOT_ALLOWED":
      return `${error.name} is not registered as safe to resend`;
  }
}
